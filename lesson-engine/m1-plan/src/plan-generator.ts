import { ValidateFunction } from 'ajv';
import { Err, NormalizedRequest, Ok, PlanDraft, Result } from '../../shared/types.js';
import { SchemaRegistry } from '../../shared/schema-registry.js';
import { Generated, GenerationFailure, GenerationSession, PromptPayload } from '../../utils/generation-client.js';
import { parseJsonPayload } from '../../utils/json-extract.js';
import { AUDIENCE_PROFILES, PLAN_SYSTEM_PROMPT, SECTION_COUNTS } from './prompts.js';

export const PLAN_COMPLETION_TOKENS = 500;
export const PLAN_MIN_COMPLETION_TOKENS = 200;

/**
 * Model output as described by lesson-plan.v1
 */
export interface PlanPayload {
  title: string;
  objectives: string[];
  plan: Array<{ title: string; key_points: string[] }>;
}

function clean(value: string): string {
  return value.normalize('NFC').replace(/\s+/g, ' ').trim();
}

/**
 * M1-PlanGenerator: first generation call, producing title, objectives and plan
 */
export class PlanGenerator {
  private validatePayload: ValidateFunction<PlanPayload>;

  constructor(private readonly schemas: SchemaRegistry = new SchemaRegistry()) {
    this.validatePayload = schemas.compile<PlanPayload>('lesson-plan.v1.schema.json');
  }

  buildPrompt(request: NormalizedRequest): PromptPayload {
    const sectionCount = SECTION_COUNTS[request.duration];

    const user = [
      `Subject: ${request.subject}`,
      `Audience: ${AUDIENCE_PROFILES[request.audience]}`,
      `Length: ${request.duration} lesson, exactly ${sectionCount} plan entries`,
      '',
      'Return JSON with this shape:',
      '{"title": string, "objectives": [string], "plan": [{"title": string, "key_points": [string]}]}',
      '',
      'Rules:',
      '- 2 to 4 measurable learning objectives',
      `- exactly ${sectionCount} plan entries in teaching order, each with 2 to 4 key points`,
      '- no markdown inside string values'
    ].join('\n');

    return {
      label: 'plan',
      system: PLAN_SYSTEM_PROMPT,
      user,
      completionTokens: PLAN_COMPLETION_TOKENS,
      minCompletionTokens: PLAN_MIN_COMPLETION_TOKENS
    };
  }

  parse(text: string): Result<PlanDraft, string> {
    const json = parseJsonPayload(text);
    if (!json.ok) {
      return json;
    }

    if (!this.validatePayload(json.value)) {
      return Err(`plan schema: ${this.schemas.errorsText(this.validatePayload)}`);
    }

    const payload = json.value;
    const draft: PlanDraft = {
      title: clean(payload.title),
      objectives: payload.objectives.map(clean).filter(objective => objective.length > 0),
      plan: payload.plan.map(entry => ({
        title: clean(entry.title),
        keyPoints: entry.key_points.map(clean).filter(point => point.length > 0)
      }))
    };

    if (draft.title.length === 0) {
      return Err('plan title is blank');
    }
    if (draft.objectives.length === 0) {
      return Err('plan has no usable objectives');
    }
    if (draft.plan.some(entry => entry.title.length === 0)) {
      return Err('plan entry with blank title');
    }

    return Ok(draft);
  }

  generate(session: GenerationSession, request: NormalizedRequest): Promise<Result<Generated<PlanDraft>, GenerationFailure>> {
    return session.generate(this.buildPrompt(request), text => this.parse(text));
  }
}
