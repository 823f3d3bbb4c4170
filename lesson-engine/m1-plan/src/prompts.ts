import { Audience, Duration } from '../../shared/types.js';

export const AUDIENCE_PROFILES: Record<Audience, string> = {
  child: 'children aged 8 to 12: short sentences, everyday words, concrete examples',
  teen: 'teenagers aged 13 to 17: clear explanations, some technical vocabulary introduced with definitions',
  adult: 'adult learners: precise vocabulary, connections to real-world practice'
};

export const SECTION_COUNTS: Record<Duration, number> = {
  short: 3,
  medium: 4,
  long: 5
};

export const PLAN_SYSTEM_PROMPT =
  'You are an instructional designer. You produce lesson plans as a single JSON object and nothing else. ' +
  'Write in the same language as the lesson subject.';
