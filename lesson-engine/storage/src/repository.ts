import { Lesson, LessonRequest, Result } from '../../shared/types.js';

export interface StorageFailure {
  kind: 'StorageError';
  message: string;
  cause?: unknown;
}

/**
 * A lesson already exists for the fingerprint. Raised by `create` only;
 * the orchestrator resolves it by re-reading, callers never see it.
 */
export interface DuplicateFingerprint {
  kind: 'DuplicateFingerprint';
  fingerprint: string;
  existingLessonId?: string;
}

export type RepositoryError = DuplicateFingerprint | StorageFailure;

/**
 * Persistence boundary. Implementations never throw: every failure is a Result.
 * Fingerprint uniqueness is enforced at write time by `create`.
 */
export interface LessonRepository {
  findByFingerprint(fingerprint: string): Promise<Result<Lesson | null, StorageFailure>>;
  /**
   * Stores a completed request together with its lesson, all or nothing
   */
  create(request: LessonRequest, lesson: Lesson): Promise<Result<string, RepositoryError>>;
  get(id: string): Promise<Result<Lesson | null, StorageFailure>>;
  /**
   * Records a request that has no lesson (failed requests)
   */
  saveRequest(request: LessonRequest): Promise<Result<void, StorageFailure>>;
  getRequest(id: string): Promise<Result<LessonRequest | null, StorageFailure>>;
}

export function storageFailure(message: string, cause?: unknown): StorageFailure {
  return cause === undefined ? { kind: 'StorageError', message } : { kind: 'StorageError', message, cause };
}

export function duplicateFingerprint(fingerprint: string, existingLessonId?: string): DuplicateFingerprint {
  return existingLessonId === undefined
    ? { kind: 'DuplicateFingerprint', fingerprint }
    : { kind: 'DuplicateFingerprint', fingerprint, existingLessonId };
}

/**
 * Shared precondition of `create` across adapters
 */
export function checkCreateArguments(request: LessonRequest, lesson: Lesson): string | null {
  if (request.status !== 'completed') {
    return `request ${request.id} must be completed to store a lesson (status: ${request.status})`;
  }
  if (lesson.requestId !== request.id) {
    return `lesson ${lesson.id} belongs to request ${lesson.requestId}, not ${request.id}`;
  }
  if (lesson.fingerprint !== request.fingerprint) {
    return `lesson ${lesson.id} fingerprint does not match its request`;
  }
  return null;
}
