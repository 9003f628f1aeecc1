/**
 * Error taxonomy for droidbridge.
 *
 * Launch and precondition failures end a run with a non-zero status; stream
 * read and resource release failures are logged where they happen and never
 * escalate. Disconnections and unexpected exits are shutdown reasons, not
 * errors (see supervision/types.ts).
 */

/** An external process could not be started. */
export class LaunchFailure extends Error {
  /** Logical name of the process that failed to start. */
  readonly processName: string;
  readonly argv: readonly string[];

  constructor(processName: string, argv: readonly string[], cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : cause ? String(cause) : "unknown error";
    super(`Failed to start ${processName} (${argv[0] ?? "<empty argv>"}): ${reason}`, { cause });
    this.name = "LaunchFailure";
    this.processName = processName;
    this.argv = argv;
  }
}

/** Reading one output stream of one process failed. Local to that stream's monitor. */
export class StreamReadFailure extends Error {
  readonly processName: string;
  readonly stream: string;

  constructor(processName: string, stream: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Error monitoring ${processName} ${stream}: ${reason}`, { cause });
    this.name = "StreamReadFailure";
    this.processName = processName;
    this.stream = stream;
  }
}

/** A cleanup step could not release its resource. */
export class ResourceReleaseFailure extends Error {
  /** Which cleanup step failed. */
  readonly step: string;

  constructor(step: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cleanup step "${step}" failed: ${reason}`, { cause });
    this.name = "ResourceReleaseFailure";
    this.step = step;
  }
}

/** A startup precondition (device, loopback module, audio bridge) does not hold. */
export class PreconditionFailure extends Error {
  /** Names of the preconditions that failed. */
  readonly failed: readonly string[];

  constructor(failed: readonly string[]) {
    super(`Startup preconditions not met: ${failed.join(", ")}`);
    this.name = "PreconditionFailure";
    this.failed = failed;
  }
}

/** The configuration file or a CLI override is invalid. */
export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ConfigError";
  }
}
