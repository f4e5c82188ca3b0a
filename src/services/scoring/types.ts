// Severity scorer contract
// Strategies return a ScoreOutcome instead of throwing so the policy can pick a fallback.

import type { Assessment, Vitals } from '../../models/types.js';

export interface ScoringContext {
  age?: number;
  painLevel?: number;
  duration?: string;
  comorbidities?: string[];
}

export interface ScoreRequest {
  symptomText: string;
  vitals: Vitals;
  context: ScoringContext;
}

export type ScoreFailureReason = 'timeout' | 'upstream_error' | 'malformed_response' | 'not_configured';

export interface ScoreFailure {
  reason: ScoreFailureReason;
  message: string;
}

export type ScoreOutcome =
  | { ok: true; result: Assessment }
  | { ok: false; failure: ScoreFailure };

export interface SeverityScorer {
  readonly name: string;
  score(request: ScoreRequest, signal?: AbortSignal): Promise<ScoreOutcome>;
}

export interface CompletionRequest {
  system: string;
  prompt: string;
  model: string;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

/**
 * Minimal chat-completion surface the remote scorer needs.
 * Returns the raw text content of the first choice.
 */
export interface AiCompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

export function scoreSucceeded(result: Assessment): ScoreOutcome {
  return { ok: true, result };
}

export function scoreFailed(reason: ScoreFailureReason, message: string): ScoreOutcome {
  return { ok: false, failure: { reason, message } };
}
