/**
 * Synchronous host command runner used by the setup collaborators and by
 * cleanup. Never throws: failures come back as a structured result.
 */
import { execFileSync } from "node:child_process";

export interface CommandResult {
  /** Whether the command exited with status 0. */
  success: boolean;
  /** Exit status, or null when the command could not run or was killed. */
  status: number | null;
  stdout: string;
  stderr: string;
  /** Why the command failed, when it did. */
  error?: string;
}

export interface RunOptions {
  /** Defaults to 10_000. */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT = 10_000;

function readField(error: unknown, key: string): unknown {
  if (typeof error === "object" && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (Buffer.isBuffer(value)) return value.toString("utf-8");
  return "";
}

/**
 * Run a command with its argument vector (no shell) and capture its output.
 */
export function runHostCommand(
  command: string,
  args: readonly string[],
  options: RunOptions = {},
): CommandResult {
  try {
    const stdout = execFileSync(command, args, {
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "pipe"],
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT,
    });
    return { success: true, status: 0, stdout, stderr: "" };
  } catch (error: unknown) {
    const status = readField(error, "status");
    const code = readField(error, "code");
    const stdout = asText(readField(error, "stdout"));
    const stderr = asText(readField(error, "stderr"));

    let reason: string;
    if (code === "ENOENT") {
      reason = `${command}: command not found`;
    } else if (code === "ETIMEDOUT" || readField(error, "signal") === "SIGTERM") {
      reason = `${command} timed out`;
    } else if (stderr.trim()) {
      reason = stderr.trim();
    } else {
      reason = error instanceof Error ? error.message : String(error);
    }

    return {
      success: false,
      status: typeof status === "number" ? status : null,
      stdout,
      stderr,
      error: reason,
    };
  }
}
