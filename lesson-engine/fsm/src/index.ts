// FSM module exports

export { LessonOrchestrator } from './orchestrator.js';
export type {
  OrchestratorState,
  StateTransition,
  PlanStage,
  SectionStage,
  EvaluatorStage,
  AssemblerStage,
  OrchestratorStages,
  FingerprintLock,
  OrchestratorOptions,
  GenerateOptions
} from './types.js';
