/**
 * Types shared by the supervision loop and its callers.
 */
import type { LaunchFailure, PreconditionFailure } from "../shared/errors.js";
import type { StreamMonitorResult } from "../process/stream-monitor.js";
import type { SupervisionState } from "../shared/types.js";
import type { CleanupReport } from "./cleanup-coordinator.js";

/** A capture process the loop starts, in launch order. */
export interface LaunchSpec {
  name: string;
  argv: readonly string[];
}

/** A startup condition evaluated in INIT. A throwing check counts as failed. */
export interface Precondition {
  name: string;
  check: () => boolean | Promise<boolean>;
}

/**
 * Why a run left RUNNING (or never reached it). Disconnections and processes
 * exiting on their own are reasons, not errors.
 */
export type ShutdownReason =
  | { kind: "interrupt"; signal: NodeJS.Signals }
  | { kind: "disconnect"; source: string | null }
  | { kind: "all-exited" }
  | { kind: "launch-failure"; error: LaunchFailure }
  | { kind: "precondition-failure"; error: PreconditionFailure };

/** A tracked process that exited without being asked to. */
export interface UnexpectedExit {
  process: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface RunOutcome {
  /** 0 for a clean shutdown, 1 for a launch or precondition failure. */
  exitCode: number;
  reason: ShutdownReason;
  exits: UnexpectedExit[];
  cleanup: CleanupReport;
  monitors: StreamMonitorResult[];
}

export type StateChangeListener = (from: SupervisionState, to: SupervisionState) => void;
