/**
 * Process supervisor: launches the capture processes, keeps them in a
 * launch-ordered registry, and offers bulk poll and terminate operations.
 *
 * The registry is only touched from the supervision loop and the cleanup
 * coordinator, never from a stream monitor.
 */
import { spawn, type ChildProcess } from "node:child_process";
import type { Readable } from "node:stream";
import { LaunchFailure } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ProcessStatus =
  | { kind: "running" }
  | { kind: "exited"; code: number | null; signal: NodeJS.Signals | null }
  | { kind: "unknown" };

export interface ManagedProcess {
  /** Logical name, unique within the registry (e.g. "video"). */
  readonly name: string;
  readonly argv: readonly string[];
  readonly child: ChildProcess;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly pid: number | undefined;
  /** Last observed status. Updated from the child's exit event. */
  status: ProcessStatus;
}

export interface ProcessExit {
  process: ManagedProcess;
  /** Exit code, or null when the process was ended by a signal. */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface TerminationReport {
  /** Processes that exited within the grace period (or had already exited). */
  graceful: string[];
  /** Processes that needed SIGKILL. */
  forceKilled: string[];
}

// ---------------------------------------------------------------------------
// Supervisor
// ---------------------------------------------------------------------------

export class ProcessSupervisor {
  private readonly registry = new Map<string, ManagedProcess>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Spawn `argv` under the logical `name` with both output streams piped.
   * Resolves once the OS reports the process started.
   *
   * @throws LaunchFailure when the executable cannot be started.
   */
  async launch(name: string, argv: readonly string[]): Promise<ManagedProcess> {
    if (this.registry.has(name)) {
      throw new LaunchFailure(name, argv, `a process named "${name}" is already running`);
    }
    const [command, ...args] = argv;
    if (!command) {
      throw new LaunchFailure(name, argv, "empty command line");
    }

    let child: ChildProcess;
    try {
      child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    } catch (error: unknown) {
      throw new LaunchFailure(name, argv, error);
    }

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off("error", onError);
        resolve();
      };
      const onError = (error: Error): void => {
        child.off("spawn", onSpawn);
        reject(new LaunchFailure(name, argv, error));
      };
      child.once("spawn", onSpawn);
      child.once("error", onError);
    });

    const { stdout, stderr } = child;
    if (!stdout || !stderr) {
      child.kill("SIGKILL");
      throw new LaunchFailure(name, argv, "output streams are not available");
    }
    stdout.setEncoding("utf-8");
    stderr.setEncoding("utf-8");

    const managed: ManagedProcess = {
      name,
      argv,
      child,
      stdout,
      stderr,
      pid: child.pid,
      status: { kind: "running" },
    };
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      managed.status = { kind: "exited", code, signal };
    });
    // Errors after a successful spawn (e.g. a failed kill) must not crash the run
    child.on("error", (error: Error) => {
      this.logger.warn(`${name}: process error: ${error.message}`);
      if (managed.status.kind === "running") {
        managed.status = { kind: "unknown" };
      }
    });

    this.registry.set(name, managed);
    this.logger.debug(`Launched ${name} (pid ${child.pid ?? "?"}): ${argv.join(" ")}`);
    return managed;
  }

  /**
   * Non-blocking: every tracked process that has exited since the last poll,
   * removed from the registry, in launch order.
   */
  pollAll(): ProcessExit[] {
    const exits: ProcessExit[] = [];
    for (const [name, managed] of this.registry) {
      const status = this.observe(managed);
      if (status.kind === "exited") {
        this.registry.delete(name);
        exits.push({ process: managed, exitCode: status.code, signal: status.signal });
      }
    }
    return exits;
  }

  /**
   * SIGTERM every tracked process, give each up to `gracePeriodMs` to exit,
   * then SIGKILL the ones still alive. Empties the registry.
   */
  async terminateAll(gracePeriodMs: number): Promise<TerminationReport> {
    const tracked = [...this.registry.values()];
    this.registry.clear();

    const outcomes = await Promise.all(
      tracked.map(async (managed) => ({
        name: managed.name,
        forced: await this.terminate(managed, gracePeriodMs),
      })),
    );

    return {
      graceful: outcomes.filter((o) => !o.forced).map((o) => o.name),
      forceKilled: outcomes.filter((o) => o.forced).map((o) => o.name),
    };
  }

  isEmpty(): boolean {
    return this.registry.size === 0;
  }

  /** Tracked processes in launch order. */
  list(): ManagedProcess[] {
    return [...this.registry.values()];
  }

  /** Returns true when SIGKILL was needed. */
  private async terminate(managed: ManagedProcess, gracePeriodMs: number): Promise<boolean> {
    if (this.observe(managed).kind === "exited") return false;

    this.sendSignal(managed, "SIGTERM");
    const exited = await waitForExit(managed, gracePeriodMs);
    if (exited) {
      this.logger.debug(`${managed.name} exited after SIGTERM`);
      return false;
    }

    this.logger.warn(
      `${managed.name} did not exit within ${gracePeriodMs}ms of SIGTERM, sending SIGKILL`,
    );
    this.sendSignal(managed, "SIGKILL");
    return true;
  }

  private sendSignal(managed: ManagedProcess, signal: NodeJS.Signals): void {
    try {
      managed.child.kill(signal);
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to send ${signal} to ${managed.name}: ${msg}`);
    }
  }

  /** Refresh the status from the child handle in case the exit event is still queued. */
  private observe(managed: ManagedProcess): ProcessStatus {
    if (managed.status.kind !== "exited") {
      const { exitCode, signalCode } = managed.child;
      if (exitCode !== null || signalCode !== null) {
        managed.status = { kind: "exited", code: exitCode, signal: signalCode };
      }
    }
    return managed.status;
  }
}

function waitForExit(managed: ManagedProcess, timeoutMs: number): Promise<boolean> {
  if (managed.status.kind === "exited") return Promise.resolve(true);

  return new Promise<boolean>((resolve) => {
    const onExit = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      managed.child.off("exit", onExit);
      resolve(false);
    }, timeoutMs);
    managed.child.once("exit", onExit);
  });
}
