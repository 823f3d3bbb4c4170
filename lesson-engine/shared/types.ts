// Core types shared by every lesson-engine module

export const AUDIENCES = ['child', 'teen', 'adult'] as const;
export type Audience = (typeof AUDIENCES)[number];

export const DURATIONS = ['short', 'medium', 'long'] as const;
export type Duration = (typeof DURATIONS)[number];

export type RequestStatus = 'pending' | 'completed' | 'failed';

export type ReadabilityLevel = 'easy' | 'medium' | 'hard';

/**
 * Validated request fields plus the idempotency key
 */
export interface NormalizedRequest {
  subject: string;
  subjectKey: string;
  audience: Audience;
  duration: Duration;
  fingerprint: string;
}

export interface LessonRequest {
  id: string;
  subject: string;
  audience: Audience;
  duration: Duration;
  fingerprint: string;
  status: RequestStatus;
  createdAt: string;
  failureReason?: string;
}

export interface PlanEntry {
  title: string;
  keyPoints: string[];
}

export interface LessonSection {
  title: string;
  bodyText: string;
}

export interface QualityReport {
  score: number;
  level: ReadabilityLevel;
  wordCount: number;
  audienceAppropriate: boolean;
}

export interface Lesson {
  id: string;
  requestId: string;
  fingerprint: string;
  title: string;
  objectives: string[];
  plan: PlanEntry[];
  sections: LessonSection[];
  markdown: string;
  quality: QualityReport;
  tokensUsed: number;
  createdAt: string;
}

/**
 * Output of the plan stage
 */
export interface PlanDraft {
  title: string;
  objectives: string[];
  plan: PlanEntry[];
}

/**
 * Everything the assembler needs, sections aligned with the plan
 */
export interface LessonDraft extends PlanDraft {
  sections: LessonSection[];
}

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
