// M1-Plan module exports

export { PlanGenerator, PLAN_COMPLETION_TOKENS, PLAN_MIN_COMPLETION_TOKENS } from './plan-generator.js';
export type { PlanPayload } from './plan-generator.js';
export { AUDIENCE_PROFILES, SECTION_COUNTS } from './prompts.js';
