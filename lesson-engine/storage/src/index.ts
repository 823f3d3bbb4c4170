// Storage module exports

export { InMemoryLessonRepository } from './in-memory-repository.js';
export { FileLessonRepository } from './file-repository.js';
export { storageFailure, duplicateFingerprint } from './repository.js';
export type { LessonRepository, RepositoryError, StorageFailure, DuplicateFingerprint } from './repository.js';
