/**
 * Run supervision: the per-run context, idempotent cleanup and the state
 * machine that ties launching, monitoring and teardown together.
 */
export { createSupervisionContext } from "./context.js";
export type { SupervisionContext } from "./context.js";
export { CleanupCoordinator, CLEANUP_STEPS } from "./cleanup-coordinator.js";
export type {
  CleanupReport,
  CleanupStep,
  CleanupStepResult,
  StepOutcome,
} from "./cleanup-coordinator.js";
export { SupervisionLoop } from "./supervision-loop.js";
export type { SupervisionLoopOptions } from "./supervision-loop.js";
export type {
  LaunchSpec,
  Precondition,
  RunOutcome,
  ShutdownReason,
  StateChangeListener,
  UnexpectedExit,
} from "./types.js";
