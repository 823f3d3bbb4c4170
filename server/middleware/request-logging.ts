/**
 * Request logging
 * Assigns the request id used as correlation id for the whole lesson run.
 */

import { RequestHandler, Response } from 'express';
import { randomUUID } from 'crypto';
import type { Logger } from '../../lesson-engine/utils/logger.js';

export const REQUEST_ID_HEADER = 'X-Request-ID';

const ACCEPTED_REQUEST_ID = /^[A-Za-z0-9._-]{1,128}$/;

export function getRequestId(res: Response): string {
  const value: unknown = res.locals.requestId;
  return typeof value === 'string' ? value : `req-${randomUUID()}`;
}

export function requestLogging(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const requestId = incoming && ACCEPTED_REQUEST_ID.test(incoming) ? incoming : `req-${randomUUID()}`;
    const startTime = Date.now();

    res.locals.requestId = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    logger('info', `${req.method} ${req.originalUrl}`, { correlationId: requestId });
    res.on('finish', () => {
      logger('info', `${req.method} ${req.originalUrl} → ${res.statusCode}`, {
        correlationId: requestId,
        durationMs: Date.now() - startTime
      });
    });

    next();
  };
}
