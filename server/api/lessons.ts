/**
 * Lesson API Endpoints
 * Thin HTTP mapping over the orchestrator contract
 */

import { Request, Response } from 'express';
import type { LessonOrchestrator } from '../../lesson-engine/fsm/src/orchestrator.js';
import type { LessonError, LessonErrorKind } from '../../lesson-engine/shared/errors.js';
import type { Lesson } from '../../lesson-engine/shared/types.js';
import type { Logger } from '../../lesson-engine/utils/logger.js';
import { getRequestId } from '../middleware/request-logging.js';

export type LessonService = Pick<LessonOrchestrator, 'generateOrFetch' | 'fetch' | 'fetchRequest'>;

/**
 * 499 is the de facto "client closed request" status
 */
const STATUS_BY_KIND: Record<LessonErrorKind, number> = {
  ValidationError: 400,
  BudgetExceeded: 413,
  NotFound: 404,
  GenerationTimeout: 504,
  GenerationFailed: 502,
  Cancelled: 499,
  StorageError: 500,
  InternalError: 500
};

export function statusForError(kind: LessonErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function errorBody(error: Pick<LessonError, 'kind' | 'code' | 'message' | 'data'>) {
  return {
    success: false as const,
    error: {
      kind: error.kind,
      code: error.code,
      message: error.message,
      ...(error.data ? { details: error.data } : {})
    }
  };
}

/**
 * Public lesson shape; the fingerprint stays internal
 */
export function toLessonResponse(lesson: Lesson) {
  return {
    id: lesson.id,
    requestId: lesson.requestId,
    title: lesson.title,
    objectives: lesson.objectives,
    plan: lesson.plan,
    sections: lesson.sections,
    markdown: lesson.markdown,
    quality: lesson.quality,
    tokensUsed: lesson.tokensUsed,
    createdAt: lesson.createdAt
  };
}

function sendError(res: Response, error: LessonError): void {
  res.status(statusForError(error.kind)).json(errorBody(error));
}

export function createLessonHandlers(service: LessonService, logger: Logger) {
  /**
   * POST /v1/lessons
   */
  const createLesson = async (req: Request, res: Response): Promise<void> => {
    const correlationId = getRequestId(res);
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    const result = await service.generateOrFetch(req.body, { correlationId, signal: controller.signal });

    if (!result.ok) {
      if (result.error.kind === 'Cancelled') {
        logger('info', 'Client disconnected before the lesson was ready', { correlationId });
      }
      sendError(res, result.error);
      return;
    }

    res.status(201).json({ success: true, lesson: toLessonResponse(result.value) });
  };

  /**
   * GET /v1/lessons/:id
   */
  const getLesson = async (req: Request, res: Response): Promise<void> => {
    const result = await service.fetch(req.params.id, getRequestId(res));
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json({ success: true, lesson: toLessonResponse(result.value) });
  };

  /**
   * GET /v1/requests/:id
   */
  const getRequest = async (req: Request, res: Response): Promise<void> => {
    const result = await service.fetchRequest(req.params.id, getRequestId(res));
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json({ success: true, request: result.value });
  };

  return { createLesson, getLesson, getRequest };
}
