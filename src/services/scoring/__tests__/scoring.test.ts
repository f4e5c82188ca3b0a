import { describe, it, expect, vi } from 'vitest';
import { silentLogger } from '../../../__tests__/fixtures.js';
import { DEFAULT_EMERGENCY_KEYWORDS } from '../../../env.js';
import {
  RemoteAiScorer,
  RuleBasedScorer,
  ScoringPolicy,
  buildTriagePrompt,
  parseAiResponse,
  type AiCompletionClient,
  type ScoreOutcome,
  type ScoreRequest,
  type SeverityScorer,
} from '../index.js';
import { scoreFailed } from '../types.js';

const request: ScoreRequest = {
  symptomText: 'mild headache for two days',
  vitals: {},
  context: { age: 34, painLevel: 3 },
};

const aiConfig = { model: 'test-model', temperature: 0.2, maxTokens: 500 };

function clientReturning(content: string): AiCompletionClient {
  return { complete: vi.fn(async () => content) };
}

function validResponse(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    severity_score: 72.4,
    severity_level: 'moderate',
    priority: 2,
    detected_symptoms: ['headache'],
    recommendations: ['See a physician within the hour'],
    reasoning: 'Persistent headache with elevated pain.',
    confidence: 80,
    ...overrides,
  });
}

describe('parseAiResponse', () => {
  it('accepts a JSON object wrapped in prose', () => {
    const parsed = parseAiResponse(`Here is the assessment:\n${validResponse()}\nThanks.`);
    expect(parsed?.severity_score).toBe(72.4);
    expect(parsed?.emergency_flags).toEqual([]);
  });

  it('rejects text with no JSON object', () => {
    expect(parseAiResponse('I cannot help with that')).toBeNull();
  });

  it('rejects an out-of-range score', () => {
    expect(parseAiResponse(validResponse({ severity_score: 140 }))).toBeNull();
  });

  it('rejects a missing reasoning field', () => {
    expect(parseAiResponse(JSON.stringify({ severity_score: 20 }))).toBeNull();
  });
});

describe('buildTriagePrompt', () => {
  it('marks missing vitals as not recorded', () => {
    const prompt = buildTriagePrompt(request);
    expect(prompt).toContain('- Age: 34 years old');
    expect(prompt).toContain('- Heart Rate: Not recorded bpm');
    expect(prompt).toContain('- Pre-existing Conditions: None reported');
  });
});

describe('RemoteAiScorer', () => {
  it('re-derives level and priority from the rounded score', async () => {
    const scorer = new RemoteAiScorer(clientReturning(validResponse()), aiConfig, silentLogger);
    const outcome = await scorer.score(request);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.result.score).toBe(72);
    expect(outcome.result.level).toBe('critical');
    expect(outcome.result.priority).toBe(1);
    expect(outcome.result.source).toBe('ai');
    expect(outcome.result.recommendation).toBe('See a physician within the hour');
  });

  it('reports not_configured without a client', async () => {
    const scorer = new RemoteAiScorer(null, aiConfig, silentLogger);
    const outcome = await scorer.score(request);
    expect(outcome).toEqual({
      ok: false,
      failure: { reason: 'not_configured', message: 'Remote AI scorer is not configured' },
    });
  });

  it('reports malformed_response for unparseable output', async () => {
    const scorer = new RemoteAiScorer(clientReturning('not json'), aiConfig, silentLogger);
    const outcome = await scorer.score(request);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.reason).toBe('malformed_response');
  });

  it('reports upstream_error when the client throws', async () => {
    const client: AiCompletionClient = {
      complete: vi.fn(async () => {
        throw new Error('503 Service Unavailable');
      }),
    };
    const outcome = await new RemoteAiScorer(client, aiConfig, silentLogger).score(request);
    expect(outcome).toEqual({
      ok: false,
      failure: { reason: 'upstream_error', message: '503 Service Unavailable' },
    });
  });
});

describe('ScoringPolicy', () => {
  const rules = new RuleBasedScorer({ emergencyKeywords: DEFAULT_EMERGENCY_KEYWORDS });

  it('uses the primary result when it succeeds', async () => {
    const primary = new RemoteAiScorer(clientReturning(validResponse()), aiConfig, silentLogger);
    const policy = new ScoringPolicy({ primary, fallback: rules, timeoutMs: 1000, logger: silentLogger });

    const outcome = await policy.score(request);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.result.source).toBe('ai');
    expect(outcome.result.fallbackReason).toBeUndefined();
    expect(policy.strategy).toBe('ai+rules');
  });

  it('returns the emergency result without asking the primary scorer', async () => {
    const client = clientReturning(validResponse({ severity_score: 30, severity_level: 'normal' }));
    const primary = new RemoteAiScorer(client, aiConfig, silentLogger);
    const policy = new ScoringPolicy({
      primary,
      fallback: rules,
      timeoutMs: 1000,
      logger: silentLogger,
      emergencyKeywords: DEFAULT_EMERGENCY_KEYWORDS,
    });

    const outcome = await policy.score({ ...request, symptomText: 'sudden chest pain since this morning' });
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.result).toMatchObject({
      score: 100,
      level: 'critical',
      priority: 1,
      ruleBasedOverride: true,
      emergencyFlags: ['chest pain'],
      source: 'rules',
    });
    expect(client.complete).not.toHaveBeenCalled();
  });

  it('falls back to rules and records why', async () => {
    const primary = new RemoteAiScorer(clientReturning('garbage'), aiConfig, silentLogger);
    const policy = new ScoringPolicy({ primary, fallback: rules, timeoutMs: 1000, logger: silentLogger });

    const outcome = await policy.score(request);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.result.source).toBe('rules');
    expect(outcome.result.score).toBe(18);
    expect(outcome.result.fallbackReason).toBe('malformed_response');
  });

  it('times out a hanging primary and aborts it', async () => {
    const seen: { signal?: AbortSignal } = {};
    const hanging: SeverityScorer = {
      name: 'slow',
      score: (_request, signal) => {
        seen.signal = signal;
        return new Promise<ScoreOutcome>(() => {});
      },
    };
    const policy = new ScoringPolicy({ primary: hanging, fallback: rules, timeoutMs: 20, logger: silentLogger });

    const outcome = await policy.score(request);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.result.fallbackReason).toBe('timeout');
    expect(seen.signal?.aborted).toBe(true);
  });

  it('surfaces the failure when no fallback is configured', async () => {
    const failing: SeverityScorer = {
      name: 'failing',
      score: async () => scoreFailed('upstream_error', 'boom'),
    };
    const policy = new ScoringPolicy({ primary: failing, timeoutMs: 1000, logger: silentLogger });

    expect(policy.strategy).toBe('failing');
    expect(await policy.score(request)).toEqual({
      ok: false,
      failure: { reason: 'upstream_error', message: 'boom' },
    });
  });

  it('converts a thrown scorer error into upstream_error', async () => {
    const throwing: SeverityScorer = {
      name: 'throwing',
      score: async () => {
        throw new Error('socket hang up');
      },
    };
    const policy = new ScoringPolicy({ primary: throwing, timeoutMs: 1000, logger: silentLogger });

    expect(await policy.score(request)).toEqual({
      ok: false,
      failure: { reason: 'upstream_error', message: 'socket hang up' },
    });
  });
});
