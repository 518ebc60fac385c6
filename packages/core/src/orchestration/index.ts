export {
  ActionOrchestrator,
  ACTION_UNAVAILABLE_MESSAGE,
  NO_ACTION_AVAILABLE_MESSAGE,
  createOutcome,
} from './orchestrator.js';
export type {
  ActionSurface,
  OrchestratorOptions,
  RunRequest,
  StepRetryConfig,
} from './types.js';
