/**
 * File Lesson Repository
 * JSON records under a data directory:
 *   lessons/<id>.json, requests/<id>.json, fingerprints/<sha256>.json
 * The fingerprint index entry is created exclusively and is the commit point
 * of `create`; records without an index entry are invisible to lookups.
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { randomUUID } from 'crypto';
import { ValidateFunction } from 'ajv';
import { Err, Lesson, LessonRequest, Ok, Result } from '../../shared/types.js';
import { SchemaRegistry } from '../../shared/schema-registry.js';
import {
  LessonRepository,
  RepositoryError,
  StorageFailure,
  checkCreateArguments,
  duplicateFingerprint,
  storageFailure
} from './repository.js';

interface FingerprintEntry {
  lessonId: string;
  requestId: string;
  createdAt: string;
}

const RECORD_ID = /^[A-Za-z0-9_-]{1,128}$/;
const FINGERPRINT = /^[a-f0-9]{64}$/;

/**
 * Structural check: fs errors raised in another realm (Jest's VM context) fail `instanceof Error`
 */
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

function isFingerprintEntry(value: unknown): value is FingerprintEntry {
  if (typeof value !== 'object' || value === null) return false;
  return 'lessonId' in value && typeof value.lessonId === 'string'
    && 'requestId' in value && typeof value.requestId === 'string';
}

function describe(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export class FileLessonRepository implements LessonRepository {
  private lessonsDir: string;
  private requestsDir: string;
  private fingerprintsDir: string;
  private validateLesson: ValidateFunction<Lesson>;
  private validateRequest: ValidateFunction<LessonRequest>;

  constructor(rootDir: string, private readonly schemas: SchemaRegistry = new SchemaRegistry()) {
    this.lessonsDir = join(rootDir, 'lessons');
    this.requestsDir = join(rootDir, 'requests');
    this.fingerprintsDir = join(rootDir, 'fingerprints');
    this.validateLesson = schemas.compile<Lesson>('stored-lesson.v1.schema.json');
    this.validateRequest = schemas.compile<LessonRequest>('stored-request.v1.schema.json');
  }

  /**
   * Initialize storage directories
   */
  async initialize(): Promise<void> {
    await mkdir(this.lessonsDir, { recursive: true });
    await mkdir(this.requestsDir, { recursive: true });
    await mkdir(this.fingerprintsDir, { recursive: true });
  }

  async findByFingerprint(fingerprint: string): Promise<Result<Lesson | null, StorageFailure>> {
    if (!FINGERPRINT.test(fingerprint)) {
      return Ok(null);
    }

    const entry = await this.readFingerprintEntry(fingerprint);
    if (!entry.ok || entry.value === null) {
      return entry.ok ? Ok(null) : entry;
    }

    const lesson = await this.get(entry.value.lessonId);
    if (!lesson.ok) {
      return lesson;
    }
    if (lesson.value === null) {
      return Err(storageFailure(`fingerprint ${fingerprint} points to missing lesson ${entry.value.lessonId}`));
    }
    return lesson;
  }

  async create(request: LessonRequest, lesson: Lesson): Promise<Result<string, RepositoryError>> {
    const invalid = checkCreateArguments(request, lesson);
    if (invalid) {
      return Err(storageFailure(invalid));
    }
    if (!RECORD_ID.test(lesson.id) || !RECORD_ID.test(request.id) || !FINGERPRINT.test(lesson.fingerprint)) {
      return Err(storageFailure(`unsafe record identifiers for lesson ${lesson.id}`));
    }

    const lessonPath = join(this.lessonsDir, `${lesson.id}.json`);
    const requestPath = join(this.requestsDir, `${request.id}.json`);

    try {
      await this.writeAtomic(lessonPath, lesson);
      await this.writeAtomic(requestPath, request);
    } catch (error) {
      await this.removeQuietly([lessonPath, requestPath]);
      return Err(storageFailure(`failed to write lesson ${lesson.id}: ${describe(error)}`, error));
    }

    const entry: FingerprintEntry = {
      lessonId: lesson.id,
      requestId: request.id,
      createdAt: lesson.createdAt
    };

    try {
      await writeFile(
        join(this.fingerprintsDir, `${lesson.fingerprint}.json`),
        JSON.stringify(entry, null, 2),
        { encoding: 'utf8', flag: 'wx' }
      );
    } catch (error) {
      await this.removeQuietly([lessonPath, requestPath]);

      if (isErrnoException(error) && error.code === 'EEXIST') {
        const existing = await this.readFingerprintEntry(lesson.fingerprint);
        const existingLessonId = existing.ok && existing.value ? existing.value.lessonId : undefined;
        return Err(duplicateFingerprint(lesson.fingerprint, existingLessonId));
      }
      return Err(storageFailure(`failed to index fingerprint ${lesson.fingerprint}: ${describe(error)}`, error));
    }

    return Ok(lesson.id);
  }

  async get(id: string): Promise<Result<Lesson | null, StorageFailure>> {
    if (!RECORD_ID.test(id)) {
      return Ok(null);
    }
    const raw = await this.readJson(join(this.lessonsDir, `${id}.json`));
    if (!raw.ok || raw.value === null) {
      return raw.ok ? Ok(null) : raw;
    }
    if (!this.validateLesson(raw.value)) {
      return Err(storageFailure(`lesson ${id} is corrupt: ${this.schemas.errorsText(this.validateLesson)}`));
    }
    return Ok(raw.value);
  }

  async saveRequest(request: LessonRequest): Promise<Result<void, StorageFailure>> {
    if (!RECORD_ID.test(request.id)) {
      return Err(storageFailure(`unsafe request id ${request.id}`));
    }
    if (request.status === 'completed') {
      return Err(storageFailure(`request ${request.id}: completed requests are stored with their lesson`));
    }

    const existing = await this.getRequest(request.id);
    if (!existing.ok) {
      return existing;
    }
    if (existing.value && existing.value.status === 'completed') {
      return Err(storageFailure(`request ${request.id} is completed and cannot change`));
    }

    try {
      await this.writeAtomic(join(this.requestsDir, `${request.id}.json`), request);
      return Ok(undefined);
    } catch (error) {
      return Err(storageFailure(`failed to write request ${request.id}: ${describe(error)}`, error));
    }
  }

  async getRequest(id: string): Promise<Result<LessonRequest | null, StorageFailure>> {
    if (!RECORD_ID.test(id)) {
      return Ok(null);
    }
    const raw = await this.readJson(join(this.requestsDir, `${id}.json`));
    if (!raw.ok || raw.value === null) {
      return raw.ok ? Ok(null) : raw;
    }
    if (!this.validateRequest(raw.value)) {
      return Err(storageFailure(`request ${id} is corrupt: ${this.schemas.errorsText(this.validateRequest)}`));
    }
    return Ok(raw.value);
  }

  private async readFingerprintEntry(fingerprint: string): Promise<Result<FingerprintEntry | null, StorageFailure>> {
    const raw = await this.readJson(join(this.fingerprintsDir, `${fingerprint}.json`));
    if (!raw.ok || raw.value === null) {
      return raw.ok ? Ok(null) : raw;
    }
    if (!isFingerprintEntry(raw.value)) {
      return Err(storageFailure(`fingerprint index ${fingerprint} is corrupt`));
    }
    return Ok(raw.value);
  }

  /**
   * null when the file does not exist
   */
  private async readJson(path: string): Promise<Result<unknown, StorageFailure>> {
    try {
      const data = await readFile(path, 'utf8');
      const parsed: unknown = JSON.parse(data);
      return Ok(parsed);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return Ok(null);
      }
      return Err(storageFailure(`failed to read ${path}: ${describe(error)}`, error));
    }
  }

  private async writeAtomic(path: string, record: object): Promise<void> {
    const tempPath = `${path}.${randomUUID()}.tmp`;
    try {
      await writeFile(tempPath, JSON.stringify(record, null, 2), 'utf8');
      await rename(tempPath, path);
    } catch (error) {
      await this.removeQuietly([tempPath]);
      throw error;
    }
  }

  private async removeQuietly(paths: string[]): Promise<void> {
    for (const path of paths) {
      try {
        await unlink(path);
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'ENOENT') {
          console.warn(`Failed to remove ${path}:`, describe(error));
        }
      }
    }
  }
}
