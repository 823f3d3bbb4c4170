/**
 * Error taxonomy surfaced by the orchestrator.
 * Callers branch on `kind`; `code` is stable for logs and HTTP bodies.
 */

export type LessonErrorKind =
  | 'ValidationError'
  | 'BudgetExceeded'
  | 'GenerationTimeout'
  | 'GenerationFailed'
  | 'StorageError'
  | 'NotFound'
  | 'Cancelled'
  | 'InternalError';

export interface LessonError {
  kind: LessonErrorKind;
  code: string;
  module: string;
  message: string;
  correlationId: string;
  data?: Record<string, unknown>;
}

export const ERROR_CODES: Record<LessonErrorKind, string> = {
  ValidationError: 'E-REQ-VALIDATION',
  BudgetExceeded: 'E-GEN-BUDGET',
  GenerationTimeout: 'E-GEN-TIMEOUT',
  GenerationFailed: 'E-GEN-UPSTREAM',
  StorageError: 'E-STORE-FAILURE',
  NotFound: 'E-STORE-NOT-FOUND',
  Cancelled: 'E-ORCH-CANCELLED',
  InternalError: 'E-ORCH-UNEXPECTED'
};

export function lessonError(
  kind: LessonErrorKind,
  module: string,
  message: string,
  correlationId: string,
  data?: Record<string, unknown>
): LessonError {
  const error: LessonError = {
    kind,
    code: ERROR_CODES[kind],
    module,
    message,
    correlationId
  };
  if (data) {
    error.data = data;
  }
  return error;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
