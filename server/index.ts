/**
 * Lesson API Server
 * Wires settings, storage, provider and orchestrator behind the HTTP routes
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { resolvePath, validatePathConfiguration } from '../config/paths.js';
import { Settings, loadSettings } from '../config/settings.js';
import { LessonOrchestrator, OrchestratorOptions } from '../lesson-engine/fsm/src/index.js';
import { FileLessonRepository } from '../lesson-engine/storage/src/index.js';
import { OpenAIProvider } from '../lesson-engine/utils/openai-provider.js';
import { Logger, createConsoleLogger } from '../lesson-engine/utils/logger.js';
import { DEFAULT_RETRY_CONFIGS } from '../lesson-engine/utils/retry-policy.js';
import { LessonService, createLessonHandlers } from './api/lessons.js';
import { InProcessLockManager } from './concurrency/lock-manager.js';
import { requestLogging } from './middleware/request-logging.js';
import { HealthMonitor } from './monitoring/health-endpoints.js';
import { createLessonRateLimit } from './security/rate-limit.js';

export interface AppDependencies {
  service: LessonService;
  logger: Logger;
  /** Lesson creations per client per minute; 0 disables the limit */
  rateLimitPerMinute?: number;
  health?: HealthMonitor;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const { logger } = deps;
  const handlers = createLessonHandlers(deps.service, logger);
  const health = deps.health ?? new HealthMonitor();
  const rateLimitPerMinute = deps.rateLimitPerMinute ?? 0;

  app.use(requestLogging(logger));
  app.use(cors());
  app.use(express.json({ limit: '16kb' }));

  if (rateLimitPerMinute > 0) {
    app.post('/v1/lessons', createLessonRateLimit({ windowMs: 60_000, limit: rateLimitPerMinute }, logger));
  }

  // Lesson routes
  app.post('/v1/lessons', (req, res, next) => {
    handlers.createLesson(req, res).catch(next);
  });
  app.get('/v1/lessons/:id', (req, res, next) => {
    handlers.getLesson(req, res).catch(next);
  });
  app.get('/v1/requests/:id', (req, res, next) => {
    handlers.getRequest(req, res).catch(next);
  });

  app.get('/v1/health', health.health);

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: { kind: 'NotFound', code: 'E-HTTP-ROUTE', message: 'Endpoint not found' }
    });
  });

  // Error handling
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({
        success: false,
        error: { kind: 'ValidationError', code: 'E-REQ-VALIDATION', message: 'Request body is not valid JSON' }
      });
      return;
    }

    logger('error', 'Server error', {
      correlationId: res.locals.requestId,
      error: err instanceof Error ? err.message : String(err)
    });
    res.status(500).json({
      success: false,
      error: { kind: 'InternalError', code: 'E-ORCH-UNEXPECTED', message: 'Internal server error' }
    });
  });

  return app;
}

/**
 * Generation client options from settings. The backoff ceiling rises with
 * the configured initial backoff so the first retry waits the full delay.
 */
export function generationOptions(settings: Settings): NonNullable<OrchestratorOptions['generation']> {
  const backoffMs = settings.generation.retryBackoffMs;
  return {
    maxTokens: settings.generation.maxTokens,
    timeoutSeconds: settings.generation.timeoutSeconds,
    retry: {
      upstream: {
        initialDelayMs: backoffMs,
        maxDelayMs: Math.max(backoffMs, DEFAULT_RETRY_CONFIGS.upstream.maxDelayMs)
      }
    }
  };
}

export async function buildOrchestrator(settings: Settings, logger: Logger): Promise<LessonOrchestrator> {
  if (!settings.openai.apiKey) {
    throw new Error('OPENAI_API_KEY is required to start the server');
  }

  const repository = new FileLessonRepository(resolvePath(settings.dataDir));
  await repository.initialize();

  return new LessonOrchestrator({
    provider: new OpenAIProvider({
      apiKey: settings.openai.apiKey,
      model: settings.openai.model,
      baseURL: settings.openai.baseURL
    }),
    repository,
    generation: generationOptions(settings),
    lock: settings.serializeByFingerprint ? new InProcessLockManager() : undefined,
    logger
  });
}

// Start server with initialization
async function startServer(): Promise<void> {
  const settings = loadSettings();
  const logger = createConsoleLogger(settings.logLevel);

  const pathCheck = validatePathConfiguration();
  if (!pathCheck.valid) {
    throw new Error(`Invalid path configuration: ${pathCheck.errors.join('; ')}`);
  }

  const orchestrator = await buildOrchestrator(settings, logger);
  const app = createApp({ service: orchestrator, logger, rateLimitPerMinute: settings.rateLimitPerMinute });

  app.listen(settings.port, () => {
    logger('info', `Lesson API server running on http://localhost:${settings.port}`, {
      model: settings.openai.model,
      maxTokens: settings.generation.maxTokens,
      timeoutSeconds: settings.generation.timeoutSeconds,
      dataDir: resolvePath(settings.dataDir)
    });
  });
}

if (require.main === module) {
  startServer().catch(error => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}
