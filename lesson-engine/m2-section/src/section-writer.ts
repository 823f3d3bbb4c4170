import { ValidateFunction } from 'ajv';
import { Duration, Err, LessonSection, NormalizedRequest, Ok, PlanDraft, Result } from '../../shared/types.js';
import { SchemaRegistry } from '../../shared/schema-registry.js';
import { Generated, GenerationFailure, GenerationSession, PromptPayload } from '../../utils/generation-client.js';
import { parseJsonPayload } from '../../utils/json-extract.js';
import { AUDIENCE_PROFILES } from '../../m1-plan/src/prompts.js';

export const SECTION_COMPLETION_TOKENS: Record<Duration, number> = {
  short: 700,
  medium: 1000,
  long: 1300
};
export const SECTION_MIN_COMPLETION_TOKENS = 300;

const SECTION_SYSTEM_PROMPT =
  'You are a teacher writing lesson content. You answer with a single JSON object and nothing else. ' +
  'Write in the same language as the lesson subject, in plain prose paragraphs.';

/**
 * Model output as described by lesson-sections.v1
 */
export interface SectionsPayload {
  sections: Array<{ title?: string; body: string }>;
}

function cleanBody(value: string): string {
  return value
    .normalize('NFC')
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(line => line.replace(/[ \t]+/g, ' ').trimEnd())
    .join('\n')
    .trim();
}

/**
 * M2-SectionWriter: second generation call, one body per plan entry.
 * All sections come from a single call, after the plan.
 */
export class SectionWriter {
  private validatePayload: ValidateFunction<SectionsPayload>;

  constructor(private readonly schemas: SchemaRegistry = new SchemaRegistry()) {
    this.validatePayload = schemas.compile<SectionsPayload>('lesson-sections.v1.schema.json');
  }

  buildPrompt(request: NormalizedRequest, plan: PlanDraft): PromptPayload {
    const outline = plan.plan
      .map((entry, index) => `${index + 1}. ${entry.title}\n${entry.keyPoints.map(point => `   - ${point}`).join('\n')}`)
      .join('\n');

    const user = [
      `Lesson: ${plan.title}`,
      `Subject: ${request.subject}`,
      `Audience: ${AUDIENCE_PROFILES[request.audience]}`,
      '',
      'Objectives:',
      ...plan.objectives.map(objective => `- ${objective}`),
      '',
      'Plan:',
      outline,
      '',
      'Return JSON with this shape:',
      '{"sections": [{"title": string, "body": string}]}',
      '',
      'Rules:',
      `- exactly ${plan.plan.length} sections, one per plan entry, in plan order`,
      '- each body covers the key points of its entry in 1 to 3 short paragraphs',
      '- no headings inside bodies'
    ].join('\n');

    return {
      label: 'sections',
      system: SECTION_SYSTEM_PROMPT,
      user,
      completionTokens: SECTION_COMPLETION_TOKENS[request.duration],
      minCompletionTokens: SECTION_MIN_COMPLETION_TOKENS
    };
  }

  /**
   * Section titles always come from the plan; the model only supplies bodies
   */
  parse(text: string, plan: PlanDraft): Result<LessonSection[], string> {
    const json = parseJsonPayload(text);
    if (!json.ok) {
      return json;
    }

    if (!this.validatePayload(json.value)) {
      return Err(`sections schema: ${this.schemas.errorsText(this.validatePayload)}`);
    }

    const sections = json.value.sections;
    if (sections.length !== plan.plan.length) {
      return Err(`expected ${plan.plan.length} sections, got ${sections.length}`);
    }

    const result: LessonSection[] = [];
    for (let i = 0; i < sections.length; i++) {
      const bodyText = cleanBody(sections[i].body);
      if (bodyText.length === 0) {
        return Err(`section ${i + 1} has an empty body`);
      }
      result.push({ title: plan.plan[i].title, bodyText });
    }

    return Ok(result);
  }

  generate(
    session: GenerationSession,
    request: NormalizedRequest,
    plan: PlanDraft
  ): Promise<Result<Generated<LessonSection[]>, GenerationFailure>> {
    return session.generate(this.buildPrompt(request, plan), text => this.parse(text, plan));
  }
}
