import {
  Audience,
  LessonDraft,
  LessonSection,
  NormalizedRequest,
  PlanDraft,
  QualityReport,
  Result
} from '../../shared/types.js';
import {
  Generated,
  GenerationClientOptions,
  GenerationFailure,
  GenerationProvider,
  GenerationSession
} from '../../utils/generation-client.js';
import { Logger } from '../../utils/logger.js';
import { LessonRepository } from '../../storage/src/repository.js';

/**
 * Orchestrator execution states
 */
export type OrchestratorState =
  | 'RECEIVED'
  | 'DEDUPLICATED'
  | 'GENERATING'
  | 'EVALUATING'
  | 'ASSEMBLING'
  | 'PERSISTING'
  | 'COMPLETED'
  | 'FAILED';

export interface StateTransition {
  correlationId: string;
  from: OrchestratorState;
  to: OrchestratorState;
}

export interface PlanStage {
  generate(session: GenerationSession, request: NormalizedRequest): Promise<Result<Generated<PlanDraft>, GenerationFailure>>;
}

export interface SectionStage {
  generate(
    session: GenerationSession,
    request: NormalizedRequest,
    plan: PlanDraft
  ): Promise<Result<Generated<LessonSection[]>, GenerationFailure>>;
}

export interface EvaluatorStage {
  evaluate(text: string, audience: Audience): QualityReport;
}

export interface AssemblerStage {
  renderBody(draft: LessonDraft): string;
  assemble(draft: LessonDraft, quality: QualityReport): string;
}

export interface OrchestratorStages {
  plan: PlanStage;
  sections: SectionStage;
  evaluator: EvaluatorStage;
  assembler: AssemblerStage;
}

/**
 * Mutual exclusion per key within one process.
 * Storage uniqueness stays authoritative across processes.
 */
export interface FingerprintLock {
  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T>;
}

export interface OrchestratorOptions {
  provider: GenerationProvider;
  repository: LessonRepository;
  generation?: Omit<GenerationClientOptions, 'logger'>;
  lock?: FingerprintLock;
  logger?: Logger;
  stages?: Partial<OrchestratorStages>;
  now?: () => Date;
  generateId?: () => string;
  onTransition?: (transition: StateTransition) => void;
}

export interface GenerateOptions {
  correlationId?: string;
  /** Stops waiting for the result; an in-flight run still completes */
  signal?: AbortSignal;
}
