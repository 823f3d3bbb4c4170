/**
 * Request Normalizer
 *
 * Validates untrusted (subject, audience, duration) input and derives the
 * idempotency fingerprint. Pure: no I/O, no clock.
 */

import crypto from 'crypto';
import { z } from 'zod';
import { AUDIENCES, Audience, DURATIONS, Duration, Err, NormalizedRequest, Ok, Result } from '../../shared/types.js';
import { LessonError, lessonError } from '../../shared/errors.js';

export const SUBJECT_MIN_LENGTH = 2;
export const SUBJECT_MAX_LENGTH = 200;

export interface FieldIssue {
  field: string;
  message: string;
}

function displaySubject(value: string): string {
  return value.normalize('NFC').replace(/\s+/g, ' ').trim();
}

function codePointLength(value: string): number {
  return Array.from(value).length;
}

function lowerTrimmed(value: unknown): unknown {
  return typeof value === 'string' ? value.trim().toLowerCase() : value;
}

const LessonRequestInputSchema = z.object({
  subject: z
    .string({
      required_error: 'subject is required',
      invalid_type_error: 'subject must be a string'
    })
    .transform(displaySubject)
    .refine(value => codePointLength(value) >= SUBJECT_MIN_LENGTH, {
      message: `subject must contain at least ${SUBJECT_MIN_LENGTH} characters`
    })
    .refine(value => codePointLength(value) <= SUBJECT_MAX_LENGTH, {
      message: `subject must contain at most ${SUBJECT_MAX_LENGTH} characters`
    }),
  audience: z.preprocess(
    lowerTrimmed,
    z.enum(AUDIENCES, {
      errorMap: () => ({ message: `audience must be one of: ${AUDIENCES.join(', ')}` })
    })
  ),
  duration: z.preprocess(
    lowerTrimmed,
    z.enum(DURATIONS, {
      errorMap: () => ({ message: `duration must be one of: ${DURATIONS.join(', ')}` })
    })
  )
});

export type LessonRequestInput = z.input<typeof LessonRequestInputSchema>;

/**
 * SHA-256 over the canonical JSON of the hashed fields (keys in sorted order)
 */
export function computeFingerprint(subjectKey: string, audience: Audience, duration: Duration): string {
  const canonical = JSON.stringify({ audience, duration, subject: subjectKey });
  return crypto.createHash('sha256').update(canonical, 'utf8').digest('hex');
}

export function normalizeRequest(input: unknown, correlationId: string): Result<NormalizedRequest, LessonError> {
  const parsed = LessonRequestInputSchema.safeParse(input);

  if (!parsed.success) {
    const issues: FieldIssue[] = parsed.error.issues.map(issue => ({
      field: issue.path.length > 0 ? issue.path.join('.') : 'request',
      message: issue.message
    }));
    return Err(lessonError(
      'ValidationError',
      'm0-request',
      issues.map(issue => `${issue.field}: ${issue.message}`).join('; '),
      correlationId,
      { issues }
    ));
  }

  const { subject, audience, duration } = parsed.data;
  const subjectKey = subject.toLowerCase();

  return Ok({
    subject,
    subjectKey,
    audience,
    duration,
    fingerprint: computeFingerprint(subjectKey, audience, duration)
  });
}
