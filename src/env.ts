// Environment configuration for the triage API
// Load all scorer, push and server settings from environment variables

import { logger } from './logger.js';

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

const listEnv = (value: string | undefined, fallback: string[] = []) => {
  const items = (value || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
  return items.length > 0 ? items : fallback;
};

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    logger.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    logger.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseNumber(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    logger.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export const DEFAULT_EMERGENCY_KEYWORDS = [
  'chest pain',
  'difficulty breathing',
  'unconscious',
  'severe bleeding',
  'stroke symptoms',
  'heart attack',
  'seizure',
  'suicide',
  'overdose',
  'severe head injury',
  'choking',
  'anaphylaxis',
  'severe burns',
];

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8000),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: listEnv(process.env.CORS_ORIGINS, ['http://localhost:3000']),

  // Caller identity (tokens are issued elsewhere; we only verify them)
  JWT_SECRET: process.env.JWT_SECRET || 'change-this-secret-in-production',

  // Remote AI scorer
  AI_SCORER_ENABLED: process.env.AI_SCORER_ENABLED === 'true',
  AI_FALLBACK_ENABLED: process.env.AI_FALLBACK_ENABLED !== 'false', // Default true
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL, 'https://api.openai.com/v1'),
  AI_MODEL: strEnv(process.env.AI_MODEL, 'gpt-4o-mini'),
  AI_TEMPERATURE: parseNumber(process.env.AI_TEMPERATURE, 0.2, 'AI_TEMPERATURE'),
  AI_MAX_TOKENS: parsePositiveInt(process.env.AI_MAX_TOKENS, 1200, 'AI_MAX_TOKENS'),
  AI_TIMEOUT_MS: parsePositiveInt(process.env.AI_TIMEOUT_MS, 15000, 'AI_TIMEOUT_MS'),

  // Rule-based scorer
  EMERGENCY_KEYWORDS: listEnv(process.env.EMERGENCY_KEYWORDS, DEFAULT_EMERGENCY_KEYWORDS).map(k => k.toLowerCase()),

  // Background sweep
  LONG_WAIT_SWEEP_INTERVAL_MS: parsePositiveInt(
    process.env.LONG_WAIT_SWEEP_INTERVAL_MS,
    5 * 60 * 1000,
    'LONG_WAIT_SWEEP_INTERVAL_MS',
  ),

  // Push notifications
  PUSH_GATEWAY_URL: strEnv(process.env.PUSH_GATEWAY_URL),
  PUSH_GATEWAY_KEY: strEnv(process.env.PUSH_GATEWAY_KEY),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isAiScorerConfigured(): boolean {
  return env.AI_SCORER_ENABLED && !!env.OPENAI_API_KEY;
}

export function isPushConfigured(): boolean {
  return !!env.PUSH_GATEWAY_URL;
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  logger.info(
    {
      environment: env.NODE_ENV,
      server: `${env.HOST}:${env.PORT}`,
      aiScorer: isAiScorerConfigured() ? env.AI_MODEL : 'disabled',
      aiFallback: env.AI_FALLBACK_ENABLED,
      aiTimeoutMs: env.AI_TIMEOUT_MS,
      emergencyKeywords: env.EMERGENCY_KEYWORDS.length,
      longWaitSweepMs: env.LONG_WAIT_SWEEP_INTERVAL_MS,
      push: isPushConfigured() ? 'gateway' : 'disabled',
    },
    'Triage API configuration',
  );
  if (env.JWT_SECRET === 'change-this-secret-in-production' && env.NODE_ENV === 'production') {
    logger.warn('JWT_SECRET is using the default value');
  }
}
