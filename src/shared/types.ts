/**
 * Shared TypeScript types for droidbridge.
 *
 * Defines the core data structures used across the supervisor, the host
 * collaborators and the CLI: supervision states, stream and line categories,
 * capture settings and log entries.
 */

// ---------------------------------------------------------------------------
// Supervision State
// ---------------------------------------------------------------------------

export const SUPERVISION_STATES = [
  "INIT",
  "LAUNCHING",
  "RUNNING",
  "SHUTTING_DOWN",
  "DONE",
] as const;

export type SupervisionState = (typeof SUPERVISION_STATES)[number];

// ---------------------------------------------------------------------------
// Process output
// ---------------------------------------------------------------------------

export const STREAM_KINDS = ["stdout", "stderr"] as const;

export type StreamKind = (typeof STREAM_KINDS)[number];

export const LINE_CATEGORIES = ["disconnect", "fatal-error", "warning", "info"] as const;

export type LineCategory = (typeof LINE_CATEGORIES)[number];

export interface ClassifiedLine {
  /** Logical name of the process that wrote the line (e.g. "video"). */
  process: string;
  /** Which output stream the line came from. */
  stream: StreamKind;
  category: LineCategory;
  /** The trimmed line text. */
  text: string;
}

// ---------------------------------------------------------------------------
// Capture settings
// ---------------------------------------------------------------------------

export interface CameraInfo {
  /** Camera identifier as reported by the capture tool (e.g. "0"). */
  id: string;
  /** Sensor placement, e.g. "back", "front" or "external". */
  facing: string;
  /** Default resolution, formatted WxH. */
  defaultResolution: string;
  /** Every supported resolution, formatted WxH, in listing order. */
  resolutions: string[];
  /** Supported frame rates. */
  fps: number[];
}

export interface CaptureSettings {
  cameraId: string;
  resolution: string;
  fps: number;
  micSource: string;
}

// ---------------------------------------------------------------------------
// Log Entry
// ---------------------------------------------------------------------------

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

export interface LogEntry {
  /** ISO-8601 timestamp. */
  ts: string;
  /** Severity level. */
  level: LogLevel;
  /** Component that emitted the log (e.g. "supervisor"). */
  component: string;
  /** Managed process the entry refers to, if any. */
  process: string;
  /** Human-readable message. */
  msg: string;
}

// ---------------------------------------------------------------------------
// Host resources
// ---------------------------------------------------------------------------

/**
 * Host-side resources acquired during setup. Each field is filled in as soon
 * as its resource exists, so cleanup also covers a half-finished setup.
 */
export interface ExternalResources {
  /** Audio-server module id returned when the virtual source was loaded. */
  audioModuleId: string | null;
  /** Named pipe feeding the virtual source. */
  pipePath: string | null;
}
