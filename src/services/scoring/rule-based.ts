import { runTriage, type TriageOptions } from '../triage/index.js';
import { scoreSucceeded, type ScoreOutcome, type ScoreRequest, type SeverityScorer } from './types.js';

export class RuleBasedScorer implements SeverityScorer {
  readonly name = 'rules';

  constructor(private readonly options: TriageOptions = {}) {}

  async score(request: ScoreRequest): Promise<ScoreOutcome> {
    return scoreSucceeded(
      runTriage(
        { symptomText: request.symptomText, vitals: request.vitals, duration: request.context.duration },
        this.options,
      ),
    );
  }
}
