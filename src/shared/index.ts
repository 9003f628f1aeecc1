/**
 * Shared modules for droidbridge: types, logging, the error taxonomy and
 * process-wide shutdown hooks.
 */
export type {
  CameraInfo,
  CaptureSettings,
  ClassifiedLine,
  ExternalResources,
  LineCategory,
  LogEntry,
  LogLevel,
  StreamKind,
  SupervisionState,
} from "./types.js";
export { LINE_CATEGORIES, LOG_LEVELS, STREAM_KINDS, SUPERVISION_STATES } from "./types.js";
export { Logger, createLogger, describeError } from "./logger.js";
export type { LoggerContext, LoggerOptions } from "./logger.js";
export {
  ConfigError,
  LaunchFailure,
  PreconditionFailure,
  ResourceReleaseFailure,
  StreamReadFailure,
} from "./errors.js";
export { registerShutdownHook, runShutdownHooks } from "./shutdown-hooks.js";
export type { ShutdownHook } from "./shutdown-hooks.js";
