export { RuleBasedScorer } from './rule-based.js';
export { RemoteAiScorer, buildTriagePrompt, parseAiResponse, toAssessment, AiAssessmentSchema } from './remote-ai.js';
export { OpenAiCompletionClient } from './openai-client.js';
export { ScoringPolicy } from './policy.js';
export type {
  AiCompletionClient,
  CompletionRequest,
  ScoreFailure,
  ScoreFailureReason,
  ScoreOutcome,
  ScoreRequest,
  ScoringContext,
  SeverityScorer,
} from './types.js';
