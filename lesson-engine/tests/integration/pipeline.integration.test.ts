import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { LessonOrchestrator } from '../../fsm/src/orchestrator.js';
import { FileLessonRepository } from '../../storage/src/file-repository.js';
import { ScriptedProvider, respond } from '../fixtures/scripted-provider.js';
import { PHOTOSYNTHESIS_PLAN, PHOTOSYNTHESIS_REQUEST, PHOTOSYNTHESIS_SECTIONS } from '../fixtures/lesson-payloads.js';

/**
 * End-to-end: request in, markdown lesson persisted on disk, equivalent request served from storage
 */
describe('Lesson Generation Pipeline Integration', () => {
  let dataDir: string;
  let provider: ScriptedProvider;
  let orchestrator: LessonOrchestrator;

  beforeAll(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'lesson-pipeline-'));
    const repository = new FileLessonRepository(dataDir);
    await repository.initialize();

    provider = new ScriptedProvider()
      .script('plan', respond(`Voici le plan :\n\`\`\`json\n${JSON.stringify(PHOTOSYNTHESIS_PLAN)}\n\`\`\``, 420))
      .script('sections', respond(JSON.stringify(PHOTOSYNTHESIS_SECTIONS), 760));

    orchestrator = new LessonOrchestrator({
      provider,
      repository,
      generation: { retry: { upstream: { initialDelayMs: 0, maxDelayMs: 0, jitterMs: 0 } } }
    });
  });

  afterAll(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should produce a complete lesson for a teen photosynthesis request', async () => {
    const result = await orchestrator.generateOrFetch(PHOTOSYNTHESIS_REQUEST);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const lesson = result.value;

    expect(lesson.title).toBe('La photosynthèse');
    expect(lesson.objectives.length).toBeGreaterThan(0);
    expect(lesson.plan.length).toBeGreaterThanOrEqual(2);
    expect(lesson.sections.map(section => section.title)).toEqual(lesson.plan.map(entry => entry.title));
    expect(lesson.markdown).toContain('\n## Objectives\n');
    expect(lesson.markdown).toContain('\n## Plan\n');
    expect(lesson.markdown).toContain('\n## 2. Eau et gaz carbonique\n\nLes racines puisent l’eau du sol.');
    expect(lesson.markdown.endsWith('- Audience appropriate: ' + (lesson.quality.audienceAppropriate ? 'yes' : 'no') + '\n')).toBe(true);
    expect(lesson.tokensUsed).toBe(1180);
    expect(lesson.tokensUsed).toBeLessThanOrEqual(2000);
    expect(typeof lesson.quality.audienceAppropriate).toBe('boolean');
  });

  it('should persist the lesson, its request and the fingerprint index', async () => {
    expect(await readdir(join(dataDir, 'lessons'))).toHaveLength(1);
    expect(await readdir(join(dataDir, 'requests'))).toHaveLength(1);
    expect(await readdir(join(dataDir, 'fingerprints'))).toHaveLength(1);
  });

  it('should serve an equivalent request from storage without calling the model', async () => {
    const first = await orchestrator.generateOrFetch(PHOTOSYNTHESIS_REQUEST);
    const second = await orchestrator.generateOrFetch({
      subject: '  la   PHOTOSYNTHÈSE ',
      audience: 'TEEN',
      duration: 'Short'
    });

    expect(first.ok && second.ok).toBe(true);
    if (!first.ok || !second.ok) return;
    expect(second.value.id).toBe(first.value.id);
    expect(second.value.markdown).toBe(first.value.markdown);
    expect(provider.calls).toBe(2);
  });

  it('should give a different fingerprint to a different audience', async () => {
    provider.script('plan', { type: 'fail', kind: 'upstream', message: 'HTTP 500' });
    provider.script('plan', { type: 'fail', kind: 'upstream', message: 'HTTP 500' });

    const result = await orchestrator.generateOrFetch({ ...PHOTOSYNTHESIS_REQUEST, audience: 'adult' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('GenerationFailed');
    expect(await readdir(join(dataDir, 'lessons'))).toHaveLength(1);
  });
});
