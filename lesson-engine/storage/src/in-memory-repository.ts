import { Err, Lesson, LessonRequest, Ok, Result } from '../../shared/types.js';
import { LessonRepository, RepositoryError, StorageFailure, checkCreateArguments, duplicateFingerprint, storageFailure } from './repository.js';

/**
 * Map-backed repository for tests and local runs.
 * Stores and returns copies so callers cannot mutate stored records.
 */
export class InMemoryLessonRepository implements LessonRepository {
  private lessons = new Map<string, Lesson>();
  private requests = new Map<string, LessonRequest>();
  private lessonIdsByFingerprint = new Map<string, string>();

  async findByFingerprint(fingerprint: string): Promise<Result<Lesson | null, StorageFailure>> {
    const lessonId = this.lessonIdsByFingerprint.get(fingerprint);
    const lesson = lessonId ? this.lessons.get(lessonId) : undefined;
    return Ok(lesson ? structuredClone(lesson) : null);
  }

  async create(request: LessonRequest, lesson: Lesson): Promise<Result<string, RepositoryError>> {
    const invalid = checkCreateArguments(request, lesson);
    if (invalid) {
      return Err(storageFailure(invalid));
    }

    const existingLessonId = this.lessonIdsByFingerprint.get(lesson.fingerprint);
    if (existingLessonId) {
      return Err(duplicateFingerprint(lesson.fingerprint, existingLessonId));
    }
    if (this.lessons.has(lesson.id)) {
      return Err(storageFailure(`lesson id ${lesson.id} already in use`));
    }

    this.requests.set(request.id, structuredClone(request));
    this.lessons.set(lesson.id, structuredClone(lesson));
    this.lessonIdsByFingerprint.set(lesson.fingerprint, lesson.id);
    return Ok(lesson.id);
  }

  async get(id: string): Promise<Result<Lesson | null, StorageFailure>> {
    const lesson = this.lessons.get(id);
    return Ok(lesson ? structuredClone(lesson) : null);
  }

  async saveRequest(request: LessonRequest): Promise<Result<void, StorageFailure>> {
    const existing = this.requests.get(request.id);
    if (existing && existing.status === 'completed') {
      return Err(storageFailure(`request ${request.id} is completed and cannot change`));
    }
    if (request.status === 'completed') {
      return Err(storageFailure(`request ${request.id}: completed requests are stored with their lesson`));
    }
    this.requests.set(request.id, structuredClone(request));
    return Ok(undefined);
  }

  async getRequest(id: string): Promise<Result<LessonRequest | null, StorageFailure>> {
    const request = this.requests.get(id);
    return Ok(request ? structuredClone(request) : null);
  }

  get lessonCount(): number {
    return this.lessons.size;
  }

  get requestCount(): number {
    return this.requests.size;
  }
}
