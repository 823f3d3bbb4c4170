/**
 * M3-Quality: readability scoring
 *
 * Flesch reading ease adapted for French text (Kandel & Moles coefficients),
 * computed over markdown with the markup stripped. Deterministic and pure.
 */

import { Audience, QualityReport, ReadabilityLevel } from '../../shared/types.js';

export interface ScoreRange {
  min: number;
  max: number;
}

export interface TextStats {
  sentences: number;
  words: number;
  syllables: number;
}

/**
 * Acceptable score range per audience, bounds inclusive
 */
export const AUDIENCE_THRESHOLDS: Record<Audience, ScoreRange> = {
  child: { min: 80, max: 100 },
  teen: { min: 60, max: 80 },
  adult: { min: 40, max: 70 }
};

export const LEVEL_THRESHOLDS = {
  easy: 60,
  medium: 40
} as const;

const VOWEL_GROUP = /[aeiouàáâäèéêëìíîïòóôöùúûü]+/g;
const WORD = /\p{L}{2,}/gu;

export function stripMarkdown(text: string): string {
  return text
    .replace(/#{1,6}\s*/g, '')
    .replace(/[*_`[\]]+/g, '')
    .replace(/\n/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function countSyllables(word: string): number {
  const lower = word.toLowerCase();
  if (lower.length < 2) {
    return 1;
  }
  const groups = lower.match(VOWEL_GROUP);
  return Math.max(1, groups ? groups.length : 0);
}

export function parseTextStats(text: string): TextStats {
  const cleaned = stripMarkdown(text);

  const sentences = cleaned
    .split(/[.!?]+/)
    .map(sentence => sentence.trim())
    .filter(sentence => sentence.length > 2);

  const words = cleaned.match(WORD) ?? [];
  const syllables = words.reduce((total, word) => total + countSyllables(word), 0);

  return {
    sentences: sentences.length,
    words: words.length,
    syllables
  };
}

/**
 * 207 - 1.015 × words/sentence - 84.6 × syllables/word, clamped to [0, 100]
 */
export function calculateReadabilityScore(stats: TextStats): number {
  if (stats.words === 0 || stats.sentences === 0) {
    return 0;
  }
  const wordsPerSentence = stats.words / stats.sentences;
  const syllablesPerWord = stats.syllables / stats.words;
  const raw = 207 - 1.015 * wordsPerSentence - 84.6 * syllablesPerWord;
  const clamped = Math.min(100, Math.max(0, raw));
  return Math.round(clamped * 10) / 10;
}

export function scoreToLevel(score: number): ReadabilityLevel {
  if (score >= LEVEL_THRESHOLDS.easy) return 'easy';
  if (score >= LEVEL_THRESHOLDS.medium) return 'medium';
  return 'hard';
}

export function isAudienceAppropriate(score: number, audience: Audience): boolean {
  const range = AUDIENCE_THRESHOLDS[audience];
  return score >= range.min && score <= range.max;
}

export function evaluate(text: string, audience: Audience): QualityReport {
  const stats = parseTextStats(text);
  const score = calculateReadabilityScore(stats);

  return {
    score,
    level: scoreToLevel(score),
    wordCount: stats.words,
    audienceAppropriate: isAudienceAppropriate(score, audience)
  };
}
