// M3-Quality module exports

export {
  evaluate,
  stripMarkdown,
  countSyllables,
  parseTextStats,
  calculateReadabilityScore,
  scoreToLevel,
  isAudienceAppropriate,
  AUDIENCE_THRESHOLDS,
  LEVEL_THRESHOLDS
} from './readability-evaluator.js';
export type { ScoreRange, TextStats } from './readability-evaluator.js';
