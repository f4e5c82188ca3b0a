// Strategy selection: emergency keywords first, then the primary scorer under a
// bounded timeout, then fallback if enabled.

import { env } from '../../env.js';
import type { Logger } from '../../logger.js';
import { emergencyAssessment, findEmergencyKeywords } from '../triage/index.js';
import { scoreFailed, scoreSucceeded, type ScoreOutcome, type ScoreRequest, type SeverityScorer } from './types.js';

export interface ScoringPolicyOptions {
  primary: SeverityScorer;
  fallback?: SeverityScorer | null;
  timeoutMs: number;
  logger: Logger;
  emergencyKeywords?: readonly string[];
}

export class ScoringPolicy {
  private readonly primary: SeverityScorer;
  private readonly fallback: SeverityScorer | null;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly emergencyKeywords: readonly string[];

  constructor(options: ScoringPolicyOptions) {
    this.primary = options.primary;
    this.fallback = options.fallback ?? null;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.emergencyKeywords = options.emergencyKeywords ?? env.EMERGENCY_KEYWORDS;
  }

  get strategy(): string {
    return this.fallback ? `${this.primary.name}+${this.fallback.name}` : this.primary.name;
  }

  async score(request: ScoreRequest): Promise<ScoreOutcome> {
    // No scorer may downgrade an emergency keyword
    const flags = findEmergencyKeywords(request.symptomText, this.emergencyKeywords);
    if (flags.length > 0) {
      this.logger.warn({ flags }, 'Emergency keywords detected, skipping scorers');
      return scoreSucceeded(emergencyAssessment(flags));
    }

    const outcome = await this.runWithTimeout(this.primary, request);
    if (outcome.ok || !this.fallback) {
      if (!outcome.ok) {
        this.logger.warn({ scorer: this.primary.name, reason: outcome.failure.reason }, 'Scoring failed, no fallback');
      }
      return outcome;
    }

    this.logger.warn(
      { scorer: this.primary.name, fallback: this.fallback.name, reason: outcome.failure.reason },
      'Primary scorer failed, using fallback',
    );

    const fallbackOutcome = await this.runWithTimeout(this.fallback, request);
    if (!fallbackOutcome.ok) return fallbackOutcome;

    return {
      ok: true,
      result: { ...fallbackOutcome.result, fallbackReason: outcome.failure.reason },
    };
  }

  private async runWithTimeout(scorer: SeverityScorer, request: ScoreRequest): Promise<ScoreOutcome> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<ScoreOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(scoreFailed('timeout', `${scorer.name} scorer exceeded ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    const attempt = scorer.score(request, controller.signal).catch((err: unknown) =>
      scoreFailed('upstream_error', err instanceof Error ? err.message : String(err)),
    );

    try {
      return await Promise.race([attempt, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
