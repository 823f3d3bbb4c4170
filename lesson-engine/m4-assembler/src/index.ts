// M4-Assembler module exports

export { LessonAssembler, DOCUMENT_HEADINGS } from './assembler.js';
