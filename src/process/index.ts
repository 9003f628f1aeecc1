/**
 * Process management for droidbridge.
 *
 * Handles capture-process lifecycle, output-stream monitoring and the shared
 * disconnection flag.
 */
export { ProcessSupervisor } from "./supervisor.js";
export type {
  ManagedProcess,
  ProcessExit,
  ProcessStatus,
  TerminationReport,
} from "./supervisor.js";
export { StreamMonitor } from "./stream-monitor.js";
export type { MonitorOutcome, StreamMonitorOptions, StreamMonitorResult } from "./stream-monitor.js";
export { DisconnectionSignal } from "./disconnection-signal.js";
export { classifyLine, DEFAULT_RULES } from "./classify.js";
export type { ClassificationRules } from "./classify.js";
