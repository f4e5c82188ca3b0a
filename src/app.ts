// Composition root: builds every component with its dependencies and wires
// them into a Fastify server. Nothing here is a process-wide singleton.

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { createInMemoryStore, type TriageStore } from './db/index.js';
import { env, isPushConfigured } from './env.js';
import { logger as rootLogger, loggerOptions, type Logger } from './logger.js';
import { deviceRoutes } from './routes/devices.js';
import { doctorRoutes } from './routes/doctor.js';
import { patientRoutes } from './routes/patients.js';
import { realtimeRoutes } from './routes/realtime.js';
import { triageRoutes } from './routes/triage.js';
import { DeviceService } from './services/devices.js';
import { NoteService } from './services/notes.js';
import {
  DisabledPushTransport,
  HttpPushTransport,
  NotificationService,
  type PushTransport,
} from './services/notifications/index.js';
import { PatientService } from './services/patients.js';
import { QueueManager } from './services/queue/index.js';
import { LongWaitSweeper, RealtimeHub } from './services/realtime/index.js';
import {
  OpenAiCompletionClient,
  RemoteAiScorer,
  RuleBasedScorer,
  ScoringPolicy,
  type AiCompletionClient,
  type SeverityScorer,
} from './services/scoring/index.js';
import { TriageWorkflow } from './services/triage-workflow/index.js';
import { AppError, ErrorCode, formatErrorResponse, isAppError, toAppError } from './utils/errors.js';

export interface AppServices {
  store: TriageStore;
  logger: Logger;
  patients: PatientService;
  devices: DeviceService;
  notes: NoteService;
  queue: QueueManager;
  notifications: NotificationService;
  scoring: ScoringPolicy;
  workflow: TriageWorkflow;
  hub: RealtimeHub;
  sweeper: LongWaitSweeper;
}

export interface CreateServicesOptions {
  store?: TriageStore;
  logger?: Logger;
  transport?: PushTransport;
  /** null disables the remote scorer even when configured */
  aiClient?: AiCompletionClient | null;
  aiScorerEnabled?: boolean;
  aiFallbackEnabled?: boolean;
  aiTimeoutMs?: number;
  emergencyKeywords?: string[];
  sweepIntervalMs?: number;
  now?: () => Date;
}

export interface RouteOptions {
  services: AppServices;
}

function defaultAiClient(): AiCompletionClient | null {
  if (!env.OPENAI_API_KEY) return null;
  return new OpenAiCompletionClient({ apiKey: env.OPENAI_API_KEY, baseURL: env.OPENAI_BASE_URL });
}

function defaultTransport(logger: Logger): PushTransport {
  if (isPushConfigured()) {
    return new HttpPushTransport({ url: env.PUSH_GATEWAY_URL, apiKey: env.PUSH_GATEWAY_KEY }, logger);
  }
  return new DisabledPushTransport(logger);
}

export function createServices(options: CreateServicesOptions = {}): AppServices {
  const logger = options.logger ?? rootLogger;
  const store = options.store ?? createInMemoryStore();
  const now = options.now ?? (() => new Date());
  const triage = { emergencyKeywords: options.emergencyKeywords ?? env.EMERGENCY_KEYWORDS };

  const rules = new RuleBasedScorer(triage);
  let primary: SeverityScorer = rules;
  let fallback: SeverityScorer | null = null;

  if (options.aiScorerEnabled ?? env.AI_SCORER_ENABLED) {
    const client = options.aiClient === undefined ? defaultAiClient() : options.aiClient;
    primary = new RemoteAiScorer(
      client,
      { model: env.AI_MODEL, temperature: env.AI_TEMPERATURE, maxTokens: env.AI_MAX_TOKENS },
      logger.child({ component: 'remote-ai-scorer' }),
    );
    fallback = (options.aiFallbackEnabled ?? env.AI_FALLBACK_ENABLED) ? rules : null;
  }

  const scoring = new ScoringPolicy({
    primary,
    fallback,
    timeoutMs: options.aiTimeoutMs ?? env.AI_TIMEOUT_MS,
    logger: logger.child({ component: 'scoring' }),
    emergencyKeywords: triage.emergencyKeywords,
  });

  const queue = new QueueManager({ store, logger: logger.child({ component: 'queue-manager' }), now });
  const notifications = new NotificationService({
    store,
    transport: options.transport ?? defaultTransport(logger.child({ component: 'push' })),
    logger: logger.child({ component: 'notifications' }),
    now,
  });

  const hub = new RealtimeHub({
    logger: logger.child({ component: 'realtime' }),
    snapshots: {
      queue: () => queue.getStatistics(),
      alerts: () => notifications.getActiveAlerts(),
    },
  });

  queue.setChangeListener(async snapshot => {
    await hub.broadcast({ type: 'queue_updated', data: snapshot }, 'queue');
  });
  notifications.setPublisher(async alert => {
    await hub.broadcast({ type: 'new_alert', data: alert }, 'alerts');
  });

  const sweeper = new LongWaitSweeper({
    queue,
    notifications,
    hub,
    intervalMs: options.sweepIntervalMs ?? env.LONG_WAIT_SWEEP_INTERVAL_MS,
    logger: logger.child({ component: 'long-wait-sweeper' }),
  });

  return {
    store,
    logger,
    patients: new PatientService(store, logger.child({ component: 'patients' }), now),
    devices: new DeviceService(store, logger.child({ component: 'devices' }), now),
    notes: new NoteService(store, queue, logger.child({ component: 'notes' }), now),
    queue,
    notifications,
    scoring,
    workflow: new TriageWorkflow({
      store,
      scoring,
      queue,
      notifications,
      logger: logger.child({ component: 'triage-workflow' }),
      triage,
      now,
    }),
    hub,
    sweeper,
  };
}

function normalizeError(error: unknown): AppError {
  if (isAppError(error) || error instanceof ZodError) {
    return toAppError(error);
  }
  // Fastify's own client errors (malformed JSON, body too large, ...)
  if (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return new AppError(ErrorCode.BAD_REQUEST, error.message, error.statusCode);
  }
  return toAppError(error);
}

export async function buildServer(services: AppServices, options: { logger?: boolean } = {}): Promise<FastifyInstance> {
  const server = Fastify({
    logger: options.logger === false ? false : loggerOptions(env.LOG_LEVEL),
  });

  await server.register(cors, {
    origin: env.CORS_ORIGINS,
    credentials: true,
  });

  server.setErrorHandler((error, request, reply) => {
    const appError = normalizeError(error);
    if (appError.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    const includeDetails = appError.statusCode < 500 || env.NODE_ENV !== 'production';
    return reply.code(appError.statusCode).send(formatErrorResponse(appError, includeDetails));
  });

  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
      scoring: services.scoring.strategy,
      realtimeConnections: services.hub.size,
    };
  });

  await server.register(patientRoutes, { prefix: '/v1', services });
  await server.register(deviceRoutes, { prefix: '/v1', services });
  await server.register(triageRoutes, { prefix: '/v1', services });
  await server.register(doctorRoutes, { prefix: '/v1', services });
  await server.register(realtimeRoutes, { prefix: '/v1', services });

  return server;
}
