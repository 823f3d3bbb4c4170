import { describe, it, expect, beforeEach } from '@jest/globals';
import { Err, Lesson, LessonRequest, Result } from '../../../shared/types.js';
import { LessonOrchestrator } from '../../src/orchestrator.js';
import { OrchestratorOptions, StateTransition } from '../../src/types.js';
import { InMemoryLessonRepository } from '../../../storage/src/in-memory-repository.js';
import {
  LessonRepository,
  RepositoryError,
  StorageFailure,
  storageFailure
} from '../../../storage/src/repository.js';
import { InProcessLockManager } from '../../../../server/concurrency/lock-manager.js';
import { ScriptedProvider, respond } from '../../../tests/fixtures/scripted-provider.js';
import { planPayload, sectionsPayload } from '../../../tests/fixtures/lesson-payloads.js';

const VOLCANO_INPUT = { subject: 'Les volcans', audience: 'teen', duration: 'short' };

function sequentialIds(): () => string {
  let next = 0;
  return () => `id-${++next}`;
}

function scriptHappyPath(provider: ScriptedProvider, delayMs?: number): void {
  provider
    .always('plan', respond(JSON.stringify(planPayload(3)), 400, delayMs))
    .always('sections', respond(JSON.stringify(sectionsPayload(3)), 900, delayMs));
}

/**
 * Delegates to the in-memory repository, with selected operations failing
 */
class FaultyRepository implements LessonRepository {
  readonly inner = new InMemoryLessonRepository();
  failLookup = false;
  failCreate = false;

  async findByFingerprint(fingerprint: string): Promise<Result<Lesson | null, StorageFailure>> {
    return this.failLookup ? Err(storageFailure('lookup unavailable')) : this.inner.findByFingerprint(fingerprint);
  }

  async create(request: LessonRequest, lesson: Lesson): Promise<Result<string, RepositoryError>> {
    return this.failCreate ? Err(storageFailure('disk full')) : this.inner.create(request, lesson);
  }

  get(id: string) {
    return this.inner.get(id);
  }

  saveRequest(request: LessonRequest) {
    return this.inner.saveRequest(request);
  }

  getRequest(id: string) {
    return this.inner.getRequest(id);
  }
}

describe('LessonOrchestrator', () => {
  let provider: ScriptedProvider;
  let repository: InMemoryLessonRepository;

  function createOrchestrator(overrides: Partial<OrchestratorOptions> = {}): LessonOrchestrator {
    return new LessonOrchestrator({
      provider,
      repository,
      generation: { timeoutSeconds: 0.05, retry: { upstream: { initialDelayMs: 0, maxDelayMs: 0, jitterMs: 0 } } },
      now: () => new Date('2024-05-01T10:00:00.000Z'),
      generateId: sequentialIds(),
      ...overrides
    });
  }

  beforeEach(() => {
    provider = new ScriptedProvider();
    repository = new InMemoryLessonRepository();
  });

  describe('successful generation', () => {
    it('should generate, evaluate, assemble and store a lesson', async () => {
      scriptHappyPath(provider);
      const orchestrator = createOrchestrator();

      const result = await orchestrator.generateOrFetch(VOLCANO_INPUT, { correlationId: 'cid-1' });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const lesson = result.value;
      expect(lesson.id).toBe('id-2');
      expect(lesson.requestId).toBe('id-1');
      expect(lesson.title).toBe('Les volcans');
      expect(lesson.plan.map(entry => entry.title)).toEqual(['Partie 1', 'Partie 2', 'Partie 3']);
      expect(lesson.sections).toHaveLength(3);
      expect(lesson.tokensUsed).toBe(1300);
      expect(lesson.createdAt).toBe('2024-05-01T10:00:00.000Z');
      expect(lesson.markdown.startsWith('# Les volcans\n\n## Objectives\n\n- Décrire un volcan')).toBe(true);

      expect(await repository.getRequest('id-1')).toEqual({
        ok: true,
        value: {
          id: 'id-1',
          subject: 'Les volcans',
          audience: 'teen',
          duration: 'short',
          fingerprint: lesson.fingerprint,
          status: 'completed',
          createdAt: '2024-05-01T10:00:00.000Z'
        }
      });
    });

    it('should walk the states in order', async () => {
      scriptHappyPath(provider);
      const transitions: StateTransition[] = [];
      const orchestrator = createOrchestrator({ onTransition: transition => transitions.push(transition) });

      await orchestrator.generateOrFetch(VOLCANO_INPUT, { correlationId: 'cid-2' });

      expect(transitions.map(transition => `${transition.from}>${transition.to}`)).toEqual([
        'RECEIVED>GENERATING',
        'GENERATING>EVALUATING',
        'EVALUATING>ASSEMBLING',
        'ASSEMBLING>PERSISTING',
        'PERSISTING>COMPLETED'
      ]);
      expect(transitions.every(transition => transition.correlationId === 'cid-2')).toBe(true);
    });
  });

  describe('idempotence', () => {
    it('should return the stored lesson for an equivalent request without new calls', async () => {
      scriptHappyPath(provider);
      const orchestrator = createOrchestrator();

      const first = await orchestrator.generateOrFetch(VOLCANO_INPUT);
      const second = await orchestrator.generateOrFetch({ subject: '  les   VOLCANS ', audience: 'Teen', duration: 'SHORT' });

      expect(first.ok && second.ok).toBe(true);
      if (!first.ok || !second.ok) return;
      expect(second.value.id).toBe(first.value.id);
      expect(second.value.markdown).toBe(first.value.markdown);
      expect(provider.calls).toBe(2);
      expect(repository.lessonCount).toBe(1);
    });

    it('should report DEDUPLICATED when the fingerprint is already stored', async () => {
      scriptHappyPath(provider);
      await createOrchestrator().generateOrFetch(VOLCANO_INPUT);
      const transitions: StateTransition[] = [];
      const orchestrator = createOrchestrator({ onTransition: transition => transitions.push(transition) });

      await orchestrator.generateOrFetch(VOLCANO_INPUT);

      expect(transitions.map(transition => transition.to)).toEqual(['DEDUPLICATED']);
      expect(provider.calls).toBe(2);
    });

    it('should converge concurrent equivalent requests on one stored lesson', async () => {
      scriptHappyPath(provider);
      const orchestrator = createOrchestrator();

      const [first, second] = await Promise.all([
        orchestrator.generateOrFetch(VOLCANO_INPUT),
        orchestrator.generateOrFetch(VOLCANO_INPUT)
      ]);

      expect(first.ok && second.ok).toBe(true);
      if (!first.ok || !second.ok) return;
      expect(second.value.id).toBe(first.value.id);
      expect(provider.calls).toBe(4);
      expect(repository.lessonCount).toBe(1);
    });

    it('should generate only once when runs are serialized by fingerprint', async () => {
      scriptHappyPath(provider);
      const orchestrator = createOrchestrator({ lock: new InProcessLockManager() });

      const [first, second] = await Promise.all([
        orchestrator.generateOrFetch(VOLCANO_INPUT),
        orchestrator.generateOrFetch(VOLCANO_INPUT)
      ]);

      expect(first.ok && second.ok && first.value.id === second.value.id).toBe(true);
      expect(provider.calls).toBe(2);
    });
  });

  describe('failures', () => {
    it('should reject invalid input before any call or write', async () => {
      const orchestrator = createOrchestrator();

      const result = await orchestrator.generateOrFetch({ subject: 'x', audience: 'teen', duration: 'short' });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('ValidationError');
      expect(result.error.code).toBe('E-REQ-VALIDATION');
      expect(provider.calls).toBe(0);
      expect(repository.requestCount).toBe(0);
    });

    it('should fail with GenerationTimeout after one retry and record the failed request', async () => {
      provider.always('plan', { type: 'hang' });
      const orchestrator = createOrchestrator({ generation: { timeoutSeconds: 0.02 } });

      const result = await orchestrator.generateOrFetch(VOLCANO_INPUT, { correlationId: 'cid-3' });

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'GenerationTimeout',
          code: 'E-GEN-TIMEOUT',
          module: 'orchestrator',
          message: 'plan timed out after 0.02s',
          correlationId: 'cid-3',
          data: { stage: 'plan', attempts: 2, tokensUsed: 0 }
        }
      });
      expect(provider.calls).toBe(2);
      expect(repository.lessonCount).toBe(0);
      expect(await repository.getRequest('id-1')).toEqual({
        ok: true,
        value: expect.objectContaining({ status: 'failed', failureReason: 'GenerationTimeout' })
      });
    });

    it('should map exhausted upstream retries to GenerationFailed', async () => {
      provider.always('plan', { type: 'fail', kind: 'upstream', message: 'HTTP 502' });
      const orchestrator = createOrchestrator();

      const result = await orchestrator.generateOrFetch(VOLCANO_INPUT);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('GenerationFailed');
      expect(result.error.message).toBe('HTTP 502');
      expect(provider.calls).toBe(2);
    });

    it('should stop with BudgetExceeded before dispatching sections the budget cannot cover', async () => {
      provider.always('plan', respond(JSON.stringify(planPayload(3)), 1800));
      const orchestrator = createOrchestrator();

      const result = await orchestrator.generateOrFetch(VOLCANO_INPUT);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('BudgetExceeded');
      expect(result.error.data).toEqual({ stage: 'sections', attempts: 0, tokensUsed: 1800, maxTokens: 2000 });
      expect(provider.callsFor('sections')).toBe(0);
      expect(repository.lessonCount).toBe(0);
    });

    it('should surface a failed fingerprint lookup as StorageError', async () => {
      const faulty = new FaultyRepository();
      faulty.failLookup = true;
      const orchestrator = createOrchestrator({ repository: faulty });

      const result = await orchestrator.generateOrFetch(VOLCANO_INPUT);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('StorageError');
      expect(result.error.message).toBe('lookup unavailable');
      expect(provider.calls).toBe(0);
    });

    it('should surface a failed write as StorageError and record the request as failed', async () => {
      scriptHappyPath(provider);
      const faulty = new FaultyRepository();
      faulty.failCreate = true;
      const orchestrator = createOrchestrator({ repository: faulty });

      const result = await orchestrator.generateOrFetch(VOLCANO_INPUT);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('StorageError');
      expect(faulty.inner.lessonCount).toBe(0);
      expect(await faulty.inner.getRequest('id-1')).toEqual({
        ok: true,
        value: expect.objectContaining({ status: 'failed', failureReason: 'StorageError' })
      });
    });

    it('should turn an unexpected exception into InternalError and record the failed request', async () => {
      const transitions: StateTransition[] = [];
      const orchestrator = createOrchestrator({
        onTransition: transition => transitions.push(transition),
        stages: {
          plan: {
            generate: async () => {
              throw new Error('stage exploded');
            }
          }
        }
      });

      const result = await orchestrator.generateOrFetch(VOLCANO_INPUT);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('InternalError');
      expect(result.error.message).toBe('stage exploded');
      expect(transitions.map(transition => `${transition.from}>${transition.to}`)).toEqual([
        'RECEIVED>GENERATING',
        'GENERATING>FAILED'
      ]);
      expect(await repository.getRequest('id-1')).toEqual({
        ok: true,
        value: expect.objectContaining({ status: 'failed', failureReason: 'InternalError' })
      });
    });
  });

  describe('cancellation', () => {
    it('should return Cancelled at once for an already aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await createOrchestrator().generateOrFetch(VOLCANO_INPUT, { signal: controller.signal });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('Cancelled');
      expect(provider.calls).toBe(0);
    });

    it('should stop waiting when the caller aborts while the run completes in the background', async () => {
      scriptHappyPath(provider, 30);
      const orchestrator = createOrchestrator({ lock: new InProcessLockManager() });
      const controller = new AbortController();

      const pending = orchestrator.generateOrFetch(VOLCANO_INPUT, { signal: controller.signal });
      setTimeout(() => controller.abort(), 5);
      const cancelled = await pending;

      expect(cancelled.ok).toBe(false);
      if (cancelled.ok) return;
      expect(cancelled.error.kind).toBe('Cancelled');

      // Serialized behind the abandoned run, which still stores its lesson
      const retried = await orchestrator.generateOrFetch(VOLCANO_INPUT);
      expect(retried.ok).toBe(true);
      expect(provider.calls).toBe(2);
      expect(repository.lessonCount).toBe(1);
    });
  });

  describe('lookups', () => {
    it('should fetch stored lessons and requests by id', async () => {
      scriptHappyPath(provider);
      const orchestrator = createOrchestrator();
      const created = await orchestrator.generateOrFetch(VOLCANO_INPUT);
      if (!created.ok) throw new Error('expected a lesson');

      expect(await orchestrator.fetch(created.value.id)).toEqual({ ok: true, value: created.value });
      const request = await orchestrator.fetchRequest(created.value.requestId);
      expect(request.ok && request.value.status).toBe('completed');
    });

    it('should report NotFound for unknown ids', async () => {
      const orchestrator = createOrchestrator();

      const result = await orchestrator.fetch('missing', 'cid-4');

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'NotFound',
          code: 'E-STORE-NOT-FOUND',
          module: 'orchestrator',
          message: 'Lesson missing not found',
          correlationId: 'cid-4',
          data: { id: 'missing' }
        }
      });
    });
  });
});
