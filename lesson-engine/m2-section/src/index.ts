// M2-Section module exports

export { SectionWriter, SECTION_COMPLETION_TOKENS, SECTION_MIN_COMPLETION_TOKENS } from './section-writer.js';
export type { SectionsPayload } from './section-writer.js';
