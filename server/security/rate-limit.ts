/**
 * Rate limiting for lesson creation
 * Each accepted POST may spend a full token budget, so it is limited per client IP.
 */

import { Request, Response } from 'express';
import { rateLimit, RateLimitRequestHandler } from 'express-rate-limit';
import type { Logger } from '../../lesson-engine/utils/logger.js';
import { getRequestId } from '../middleware/request-logging.js';

export interface LessonRateLimitConfig {
  windowMs: number;
  limit: number;
}

export function createLessonRateLimit(config: LessonRateLimitConfig, logger: Logger): RateLimitRequestHandler {
  const retryAfter = Math.ceil(config.windowMs / 1000);

  return rateLimit({
    windowMs: config.windowMs,
    limit: config.limit,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      logger('warn', 'Rate limit exceeded', {
        correlationId: getRequestId(res),
        ip: req.ip,
        path: req.path
      });

      res.status(429).json({
        success: false,
        error: {
          kind: 'RateLimited',
          code: 'E-HTTP-RATE-LIMIT',
          message: 'Too many lesson requests',
          details: { retryAfter }
        }
      });
    }
  });
}
