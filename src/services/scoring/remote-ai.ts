// Remote AI severity scorer
// Builds a clinical prompt, asks a chat-completion model for JSON, validates it with zod.
// Level and priority are always re-derived from the returned score.

import { z } from 'zod';
import type { Logger } from '../../logger.js';
import { levelForScore, priorityForLevel, recommendationForLevel } from '../../models/severity.js';
import type { Assessment, Vitals } from '../../models/types.js';
import {
  scoreFailed,
  scoreSucceeded,
  type AiCompletionClient,
  type ScoreOutcome,
  type ScoreRequest,
  type SeverityScorer,
} from './types.js';

export const SYSTEM_PROMPT =
  'You are an expert emergency medicine physician specializing in medical triage. ' +
  'Provide accurate, evidence-based assessments in JSON format only.';

export const AiAssessmentSchema = z.object({
  severity_score: z.number().min(0).max(100),
  severity_level: z.enum(['critical', 'moderate', 'normal']).optional(),
  priority: z.number().int().optional(),
  emergency_flags: z.array(z.string()).default([]),
  detected_symptoms: z.array(z.string()).default([]),
  vital_abnormalities: z.array(z.string()).default([]),
  differential_diagnosis: z
    .array(z.object({ diagnosis: z.string(), probability: z.number().min(0).max(100) }))
    .default([]),
  clinical_concerns: z.array(z.string()).default([]),
  recommendations: z.array(z.string()).default([]),
  reasoning: z.string().min(1),
  confidence: z.number().min(0).max(100).optional(),
});

export type AiAssessment = z.infer<typeof AiAssessmentSchema>;

export interface RemoteAiScorerConfig {
  model: string;
  temperature: number;
  maxTokens: number;
}

function recorded(value: number | undefined): string {
  return value === undefined ? 'Not recorded' : String(value);
}

function describeVitals(vitals: Vitals): string {
  return [
    `- Temperature: ${recorded(vitals.temperature)}°C`,
    `- Heart Rate: ${recorded(vitals.heartRate)} bpm`,
    `- Blood Pressure: ${recorded(vitals.bloodPressureSystolic)}/${recorded(vitals.bloodPressureDiastolic)} mmHg`,
    `- Respiratory Rate: ${recorded(vitals.respiratoryRate)} breaths/min`,
    `- Oxygen Saturation: ${recorded(vitals.oxygenSaturation)}%`,
  ].join('\n');
}

export function buildTriagePrompt(request: ScoreRequest): string {
  const { age, painLevel, duration, comorbidities = [] } = request.context;

  return `Analyze this patient case and provide a triage assessment.

PATIENT INFORMATION:
- Age: ${age === undefined ? 'Unknown' : `${age} years old`}
- Pain Level: ${painLevel === undefined ? 'Not reported' : `${painLevel}/10`}
- Duration of Symptoms: ${duration || 'Not specified'}
- Pre-existing Conditions: ${comorbidities.length > 0 ? comorbidities.join(', ') : 'None reported'}

CHIEF COMPLAINT & SYMPTOMS:
${request.symptomText}

VITAL SIGNS:
${describeVitals(request.vitals)}

Respond ONLY with a JSON object with these fields:
severity_score (integer 0-100), severity_level (critical|moderate|normal), priority (1|2|3),
emergency_flags, detected_symptoms, vital_abnormalities, clinical_concerns, recommendations (string arrays),
differential_diagnosis (array of {diagnosis, probability 0-100}), reasoning (2-3 sentences), confidence (0-100).

SCORING GUIDELINES:
- 0-39 (Normal): minor conditions, stable vitals
- 40-69 (Moderate): concerning symptoms, some vital abnormalities
- 70-100 (Critical): life-threatening, severe vital instability`;
}

export function toAssessment(parsed: AiAssessment): Assessment {
  const score = Math.round(parsed.severity_score);
  const level = levelForScore(score);

  return {
    score,
    level,
    priority: priorityForLevel(level),
    detectedSymptoms: parsed.detected_symptoms,
    emergencyFlags: parsed.emergency_flags,
    vitalAbnormalities: parsed.vital_abnormalities,
    reasoning: parsed.reasoning,
    ruleBasedOverride: false,
    recommendation: parsed.recommendations[0] ?? recommendationForLevel(level),
    source: 'ai',
    clinicalConcerns: parsed.clinical_concerns,
    differential: parsed.differential_diagnosis,
    confidence: parsed.confidence,
  };
}

/** Parse raw model output. Tolerates prose around a single JSON object. */
export function parseAiResponse(content: string): AiAssessment | null {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(content.slice(start, end + 1));
  } catch {
    return null;
  }

  const result = AiAssessmentSchema.safeParse(raw);
  return result.success ? result.data : null;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError');
}

export class RemoteAiScorer implements SeverityScorer {
  readonly name = 'ai';

  constructor(
    private readonly client: AiCompletionClient | null,
    private readonly config: RemoteAiScorerConfig,
    private readonly logger: Logger,
  ) {}

  async score(request: ScoreRequest, signal?: AbortSignal): Promise<ScoreOutcome> {
    if (!this.client) {
      return scoreFailed('not_configured', 'Remote AI scorer is not configured');
    }

    let content: string;
    try {
      content = await this.client.complete({
        system: SYSTEM_PROMPT,
        prompt: buildTriagePrompt(request),
        model: this.config.model,
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
        signal,
      });
    } catch (err) {
      if (isAbortError(err) || signal?.aborted) {
        return scoreFailed('timeout', 'Remote AI scorer timed out');
      }
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ err }, 'Remote AI scorer request failed');
      return scoreFailed('upstream_error', message);
    }

    const parsed = parseAiResponse(content);
    if (!parsed) {
      this.logger.warn({ length: content.length }, 'Remote AI scorer returned a malformed response');
      return scoreFailed('malformed_response', 'Remote AI response did not match the assessment schema');
    }

    if (parsed.severity_level && parsed.severity_level !== levelForScore(Math.round(parsed.severity_score))) {
      this.logger.debug(
        { score: parsed.severity_score, reportedLevel: parsed.severity_level },
        'Remote AI level disagrees with its score; using score',
      );
    }

    return scoreSucceeded(toAssessment(parsed));
  }
}
