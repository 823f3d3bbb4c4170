import { LessonDraft, QualityReport } from '../../shared/types.js';

/**
 * Headings, in document order. Downstream renderers rely on this order.
 */
export const DOCUMENT_HEADINGS = {
  objectives: 'Objectives',
  plan: 'Plan',
  quality: 'Quality summary'
} as const;

/**
 * M4-Assembler: builds the canonical markdown document.
 * Pure: the same draft and report always give the same bytes.
 */
export class LessonAssembler {
  /**
   * Title, objectives, numbered plan and one block per section, without the quality summary.
   * This is the text the readability evaluator scores.
   */
  renderBody(draft: LessonDraft): string {
    const blocks: string[] = [
      `# ${draft.title}`,
      `## ${DOCUMENT_HEADINGS.objectives}`,
      draft.objectives.map(objective => `- ${objective}`).join('\n'),
      `## ${DOCUMENT_HEADINGS.plan}`,
      draft.plan
        .map((entry, index) => [
          `${index + 1}. ${entry.title}`,
          ...entry.keyPoints.map(point => `   - ${point}`)
        ].join('\n'))
        .join('\n')
    ];

    draft.sections.forEach((section, index) => {
      blocks.push(`## ${index + 1}. ${section.title}`);
      blocks.push(this.sanitizeSectionBody(section.bodyText));
    });

    return blocks.join('\n\n');
  }

  renderQualitySummary(quality: QualityReport): string {
    return [
      `## ${DOCUMENT_HEADINGS.quality}`,
      '',
      `- Readability score: ${quality.score.toFixed(1)}`,
      `- Level: ${quality.level}`,
      `- Word count: ${quality.wordCount}`,
      `- Audience appropriate: ${quality.audienceAppropriate ? 'yes' : 'no'}`
    ].join('\n');
  }

  assemble(draft: LessonDraft, quality: QualityReport): string {
    return `${this.renderBody(draft)}\n\n${this.renderQualitySummary(quality)}\n`;
  }

  /**
   * Keeps section bodies below the document's own heading levels
   */
  private sanitizeSectionBody(body: string): string {
    return body
      .trim()
      .replace(/^#{1,2}(?=\s)/gm, '###')
      .replace(/\n{3,}/g, '\n\n');
  }
}
