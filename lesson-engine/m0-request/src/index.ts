// M0-Request module exports

export {
  normalizeRequest,
  computeFingerprint,
  SUBJECT_MIN_LENGTH,
  SUBJECT_MAX_LENGTH
} from './normalizer.js';
export type { FieldIssue, LessonRequestInput } from './normalizer.js';
