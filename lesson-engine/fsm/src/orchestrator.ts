import { randomUUID } from 'crypto';
import { Err, Lesson, LessonDraft, LessonRequest, NormalizedRequest, Ok, Result } from '../../shared/types.js';
import { LessonError, describeError, lessonError } from '../../shared/errors.js';
import { normalizeRequest } from '../../m0-request/src/index.js';
import { PlanGenerator } from '../../m1-plan/src/index.js';
import { SectionWriter } from '../../m2-section/src/index.js';
import { evaluate } from '../../m3-quality/src/index.js';
import { LessonAssembler } from '../../m4-assembler/src/index.js';
import type { LessonRepository } from '../../storage/src/index.js';
import { GenerationClient, GenerationFailure } from '../../utils/generation-client.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { SchemaRegistry } from '../../shared/schema-registry.js';
import {
  FingerprintLock,
  GenerateOptions,
  OrchestratorOptions,
  OrchestratorStages,
  OrchestratorState,
  StateTransition
} from './types.js';

const MODULE = 'orchestrator';

const ALLOWED_TRANSITIONS: Record<OrchestratorState, readonly OrchestratorState[]> = {
  RECEIVED: ['DEDUPLICATED', 'GENERATING', 'FAILED'],
  GENERATING: ['EVALUATING', 'FAILED'],
  EVALUATING: ['ASSEMBLING', 'FAILED'],
  ASSEMBLING: ['PERSISTING', 'FAILED'],
  PERSISTING: ['COMPLETED', 'DEDUPLICATED', 'FAILED'],
  DEDUPLICATED: [],
  COMPLETED: [],
  FAILED: []
};

/**
 * Per-call execution context; the orchestrator itself is shared between calls
 */
interface LessonRun {
  correlationId: string;
  state: OrchestratorState;
  startTime: number;
}

/**
 * FSM-based lesson orchestrator
 * Normalize → dedup lookup → plan → sections → evaluate → assemble → persist.
 * Fail-fast: a failed request never leaves a lesson behind.
 */
export class LessonOrchestrator {
  readonly client: GenerationClient;
  private repository: LessonRepository;
  private stages: OrchestratorStages;
  private lock?: FingerprintLock;
  private logger: Logger;
  private now: () => Date;
  private generateId: () => string;
  private onTransition?: (transition: StateTransition) => void;

  constructor(options: OrchestratorOptions) {
    this.logger = options.logger ?? silentLogger;
    this.client = new GenerationClient(options.provider, { ...options.generation, logger: this.logger });
    this.repository = options.repository;
    this.lock = options.lock;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => randomUUID());
    this.onTransition = options.onTransition;

    const schemas = new SchemaRegistry();
    this.stages = {
      plan: options.stages?.plan ?? new PlanGenerator(schemas),
      sections: options.stages?.sections ?? new SectionWriter(schemas),
      evaluator: options.stages?.evaluator ?? { evaluate },
      assembler: options.stages?.assembler ?? new LessonAssembler()
    };
  }

  /**
   * Returns the stored lesson for an equivalent request, or generates and stores it
   */
  async generateOrFetch(input: unknown, options: GenerateOptions = {}): Promise<Result<Lesson, LessonError>> {
    const correlationId = options.correlationId ?? this.generateCorrelationId();
    const { signal } = options;

    if (signal?.aborted) {
      return Err(this.cancelled(correlationId));
    }

    const run = this.execute(input, correlationId);
    if (!signal) {
      return run;
    }

    return new Promise<Result<Lesson, LessonError>>((resolve, reject) => {
      const onAbort = () => {
        this.logger('warn', 'Caller cancelled; in-flight run continues', { correlationId });
        resolve(Err(this.cancelled(correlationId)));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      run.then(
        result => {
          signal.removeEventListener('abort', onAbort);
          resolve(result);
        },
        error => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  async fetch(id: string, correlationId: string = this.generateCorrelationId()): Promise<Result<Lesson, LessonError>> {
    const found = await this.repository.get(id);
    if (!found.ok) {
      return Err(lessonError('StorageError', MODULE, found.error.message, correlationId));
    }
    if (!found.value) {
      return Err(lessonError('NotFound', MODULE, `Lesson ${id} not found`, correlationId, { id }));
    }
    return Ok(found.value);
  }

  async fetchRequest(id: string, correlationId: string = this.generateCorrelationId()): Promise<Result<LessonRequest, LessonError>> {
    const found = await this.repository.getRequest(id);
    if (!found.ok) {
      return Err(lessonError('StorageError', MODULE, found.error.message, correlationId));
    }
    if (!found.value) {
      return Err(lessonError('NotFound', MODULE, `Request ${id} not found`, correlationId, { id }));
    }
    return Ok(found.value);
  }

  /**
   * Main execution with FSM state management
   */
  private async execute(input: unknown, correlationId: string): Promise<Result<Lesson, LessonError>> {
    const run: LessonRun = { correlationId, state: 'RECEIVED', startTime: Date.now() };
    this.logger('info', 'Lesson request received', { correlationId });

    try {
      const normalized = normalizeRequest(input, correlationId);
      if (!normalized.ok) {
        this.setState(run, 'FAILED');
        this.logger('warn', 'Lesson request rejected', { correlationId, error: normalized.error.message });
        return normalized;
      }

      const request = normalized.value;
      if (this.lock) {
        return await this.lock.runExclusive(request.fingerprint, () => this.produce(run, request));
      }
      return await this.produce(run, request);
    } catch (error) {
      if (this.canFail(run)) {
        this.setState(run, 'FAILED');
      }
      this.logger('error', 'Unexpected orchestrator failure', { correlationId, error: describeError(error) });
      return Err(lessonError('InternalError', MODULE, describeError(error), correlationId));
    }
  }

  private async produce(run: LessonRun, normalized: NormalizedRequest): Promise<Result<Lesson, LessonError>> {
    const { correlationId } = run;

    // Idempotence check
    const existing = await this.repository.findByFingerprint(normalized.fingerprint);
    if (!existing.ok) {
      this.setState(run, 'FAILED');
      this.logger('error', 'Fingerprint lookup failed', { correlationId, error: existing.error.message });
      return Err(lessonError('StorageError', MODULE, existing.error.message, correlationId));
    }
    if (existing.value) {
      this.setState(run, 'DEDUPLICATED');
      this.logger('info', 'Returning stored lesson', { correlationId, lessonId: existing.value.id });
      return Ok(existing.value);
    }

    const request: LessonRequest = {
      id: this.generateId(),
      subject: normalized.subject,
      audience: normalized.audience,
      duration: normalized.duration,
      fingerprint: normalized.fingerprint,
      status: 'pending',
      createdAt: this.now().toISOString()
    };

    try {
      return await this.generateAndStore(run, normalized, request);
    } catch (error) {
      if (!this.canFail(run)) {
        throw error;
      }
      this.logger('error', 'Unexpected orchestrator failure', { correlationId, error: describeError(error) });
      return this.fail(run, request, lessonError('InternalError', MODULE, describeError(error), correlationId));
    }
  }

  private async generateAndStore(
    run: LessonRun,
    normalized: NormalizedRequest,
    request: LessonRequest
  ): Promise<Result<Lesson, LessonError>> {
    const { correlationId } = run;

    this.setState(run, 'GENERATING');
    this.logger('info', 'Starting generation', {
      correlationId,
      requestId: request.id,
      provider: this.client.providerName,
      maxTokens: this.client.maxTokens
    });

    const session = this.client.createSession(correlationId);

    const plan = await this.stages.plan.generate(session, normalized);
    if (!plan.ok) {
      return this.fail(run, request, this.generationError(plan.error, session.tokensUsed, correlationId));
    }

    const sections = await this.stages.sections.generate(session, normalized, plan.value.value);
    if (!sections.ok) {
      return this.fail(run, request, this.generationError(sections.error, session.tokensUsed, correlationId));
    }

    this.logger('info', 'Generation completed', {
      correlationId,
      tokensUsed: session.tokensUsed,
      sections: sections.value.value.length
    });

    const draft: LessonDraft = { ...plan.value.value, sections: sections.value.value };

    this.setState(run, 'EVALUATING');
    const body = this.stages.assembler.renderBody(draft);
    const quality = this.stages.evaluator.evaluate(body, normalized.audience);
    if (!quality.audienceAppropriate) {
      this.logger('warn', 'Readability outside audience range', {
        correlationId,
        audience: normalized.audience,
        score: quality.score,
        level: quality.level
      });
    }

    this.setState(run, 'ASSEMBLING');
    const lesson: Lesson = {
      id: this.generateId(),
      requestId: request.id,
      fingerprint: request.fingerprint,
      title: draft.title,
      objectives: draft.objectives,
      plan: draft.plan,
      sections: draft.sections,
      markdown: this.stages.assembler.assemble(draft, quality),
      quality,
      tokensUsed: session.tokensUsed,
      createdAt: this.now().toISOString()
    };

    this.setState(run, 'PERSISTING');
    const created = await this.repository.create({ ...request, status: 'completed' }, lesson);

    if (!created.ok) {
      if (created.error.kind === 'DuplicateFingerprint') {
        return this.resolveDuplicate(run, request);
      }
      return this.fail(run, request, lessonError('StorageError', MODULE, created.error.message, correlationId));
    }

    this.setState(run, 'COMPLETED');
    this.logger('info', 'Lesson stored', {
      correlationId,
      lessonId: lesson.id,
      tokensUsed: lesson.tokensUsed,
      score: quality.score,
      processingTime: Date.now() - run.startTime
    });
    return Ok(lesson);
  }

  /**
   * A concurrent run stored the same fingerprint first: its lesson wins
   */
  private async resolveDuplicate(run: LessonRun, request: LessonRequest): Promise<Result<Lesson, LessonError>> {
    const { correlationId } = run;
    const winner = await this.repository.findByFingerprint(request.fingerprint);

    if (!winner.ok) {
      return this.fail(run, request, lessonError('StorageError', MODULE, winner.error.message, correlationId));
    }
    if (!winner.value) {
      return this.fail(run, request, lessonError(
        'StorageError',
        MODULE,
        `Duplicate fingerprint reported but no lesson found for ${request.fingerprint}`,
        correlationId
      ));
    }

    this.setState(run, 'DEDUPLICATED');
    this.logger('info', 'Dedup race resolved; returning stored lesson', {
      correlationId,
      lessonId: winner.value.id,
      discardedRequestId: request.id
    });
    return Ok(winner.value);
  }

  private async fail(run: LessonRun, request: LessonRequest, error: LessonError): Promise<Result<Lesson, LessonError>> {
    this.setState(run, 'FAILED');
    this.logger('error', `Lesson generation failed: ${error.kind}`, {
      correlationId: run.correlationId,
      requestId: request.id,
      error: error.message
    });

    const saved = await this.repository.saveRequest({ ...request, status: 'failed', failureReason: error.kind });
    if (!saved.ok) {
      this.logger('error', 'Failed to record failed request', {
        correlationId: run.correlationId,
        requestId: request.id,
        error: saved.error.message
      });
    }

    return Err(error);
  }

  private generationError(failure: GenerationFailure, tokensUsed: number, correlationId: string): LessonError {
    const data = { stage: failure.label, attempts: failure.attempts, tokensUsed };
    switch (failure.kind) {
      case 'Timeout':
        return lessonError('GenerationTimeout', MODULE, failure.message, correlationId, data);
      case 'UpstreamError':
        return lessonError('GenerationFailed', MODULE, failure.message, correlationId, data);
      case 'BudgetExceeded':
        return lessonError('BudgetExceeded', MODULE, failure.message, correlationId, {
          ...data,
          maxTokens: this.client.maxTokens
        });
    }
  }

  private cancelled(correlationId: string): LessonError {
    return lessonError('Cancelled', MODULE, 'Request cancelled by caller', correlationId);
  }

  private canFail(run: LessonRun): boolean {
    return ALLOWED_TRANSITIONS[run.state].includes('FAILED');
  }

  private setState(run: LessonRun, next: OrchestratorState): void {
    if (!ALLOWED_TRANSITIONS[run.state].includes(next)) {
      throw new Error(`Illegal state transition ${run.state} → ${next}`);
    }
    const transition: StateTransition = { correlationId: run.correlationId, from: run.state, to: next };
    run.state = next;
    this.logger('debug', `State transition: ${transition.from} → ${transition.to}`, { correlationId: run.correlationId });
    this.onTransition?.(transition);
  }

  private generateCorrelationId(): string {
    return `lesson-${Date.now()}-${randomUUID().slice(0, 8)}`;
  }
}
