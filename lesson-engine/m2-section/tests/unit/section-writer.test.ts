import { describe, it, expect } from '@jest/globals';
import { SectionWriter } from '../../src/section-writer.js';
import { PlanGenerator } from '../../../m1-plan/src/plan-generator.js';
import { normalizeRequest } from '../../../m0-request/src/normalizer.js';
import { GenerationClient } from '../../../utils/generation-client.js';
import { NormalizedRequest, PlanDraft } from '../../../shared/types.js';
import {
  PHOTOSYNTHESIS_PLAN,
  PHOTOSYNTHESIS_REQUEST,
  PHOTOSYNTHESIS_SECTIONS,
  sectionsPayload
} from '../../../tests/fixtures/lesson-payloads.js';
import { ScriptedProvider, respond } from '../../../tests/fixtures/scripted-provider.js';

function normalized(input: unknown): NormalizedRequest {
  const result = normalizeRequest(input, 'test');
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
}

function photosynthesisPlan(): PlanDraft {
  const result = new PlanGenerator().parse(JSON.stringify(PHOTOSYNTHESIS_PLAN));
  if (!result.ok) throw new Error(result.error);
  return result.value;
}

describe('SectionWriter', () => {
  const writer = new SectionWriter();
  const plan = photosynthesisPlan();

  describe('buildPrompt', () => {
    it('should include the plan outline and budget by duration', () => {
      const prompt = writer.buildPrompt(normalized(PHOTOSYNTHESIS_REQUEST), plan);

      expect(prompt.label).toBe('sections');
      expect(prompt.completionTokens).toBe(700);
      expect(prompt.minCompletionTokens).toBe(300);
      expect(prompt.user).toContain('1. La lumière et les feuilles\n   - La chlorophylle capte la lumière');
      expect(prompt.user).toContain('- exactly 3 sections, one per plan entry, in plan order');
    });

    it('should allow longer completions for longer lessons', () => {
      const medium = writer.buildPrompt(normalized({ ...PHOTOSYNTHESIS_REQUEST, duration: 'medium' }), plan);
      const long = writer.buildPrompt(normalized({ ...PHOTOSYNTHESIS_REQUEST, duration: 'long' }), plan);

      expect(medium.completionTokens).toBe(1000);
      expect(long.completionTokens).toBe(1300);
    });
  });

  describe('parse', () => {
    it('should take titles from the plan, in plan order', () => {
      const payload = {
        sections: PHOTOSYNTHESIS_SECTIONS.sections.map(section => ({ title: 'ignored', body: section.body }))
      };

      const result = writer.parse(JSON.stringify(payload), plan);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map(section => section.title)).toEqual([
        'La lumière et les feuilles',
        'Eau et gaz carbonique',
        'Sucre et oxygène'
      ]);
      expect(result.value[0].bodyText).toBe(
        'Les feuilles captent la lumière du soleil. La chlorophylle donne la couleur verte.'
      );
    });

    it('should reject a section count that differs from the plan', () => {
      expect(writer.parse(JSON.stringify(sectionsPayload(2)), plan)).toEqual({
        ok: false,
        error: 'expected 3 sections, got 2'
      });
    });

    it('should trim bodies and normalize line endings', () => {
      const payload = sectionsPayload(3);
      payload.sections[1].body = '  Premier paragraphe.  \r\n\r\nSecond   paragraphe.\n';

      const result = writer.parse(JSON.stringify(payload), plan);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value[1].bodyText).toBe('Premier paragraphe.\n\nSecond paragraphe.');
    });

    it('should reject a body that is only whitespace', () => {
      const payload = sectionsPayload(3);
      payload.sections[2].body = ' \n ';

      expect(writer.parse(JSON.stringify(payload), plan)).toEqual({ ok: false, error: 'section 3 has an empty body' });
    });

    it('should reject payloads without sections', () => {
      const result = writer.parse('{"content": "texte"}', plan);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBe("sections schema: data must have required property 'sections'");
    });
  });

  it('should generate through a session', async () => {
    const provider = new ScriptedProvider().script('sections', respond(JSON.stringify(PHOTOSYNTHESIS_SECTIONS), 640));
    const session = new GenerationClient(provider).createSession('cid');

    const result = await writer.generate(session, normalized(PHOTOSYNTHESIS_REQUEST), plan);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.value).toHaveLength(3);
    expect(provider.requests[0].maxTokens).toBe(700);
  });
});
