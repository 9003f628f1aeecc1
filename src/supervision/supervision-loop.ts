/**
 * Top-level supervision state machine.
 *
 * INIT → LAUNCHING → RUNNING → SHUTTING_DOWN → DONE
 *
 * INIT checks the startup preconditions, LAUNCHING starts each capture process
 * (with a settle delay between them) and attaches one monitor per output
 * stream, RUNNING polls until a terminal condition, SHUTTING_DOWN runs cleanup
 * once. Every path out of INIT, LAUNCHING and RUNNING goes through
 * SHUTTING_DOWN.
 */
import type { ManagedProcess } from "../process/supervisor.js";
import { StreamMonitor, type StreamMonitorResult } from "../process/stream-monitor.js";
import { LaunchFailure, PreconditionFailure } from "../shared/errors.js";
import { describeError, type Logger } from "../shared/logger.js";
import { STREAM_KINDS, type ClassifiedLine, type SupervisionState } from "../shared/types.js";
import { CleanupCoordinator } from "./cleanup-coordinator.js";
import type { SupervisionContext } from "./context.js";
import type {
  LaunchSpec,
  Precondition,
  RunOutcome,
  ShutdownReason,
  StateChangeListener,
  UnexpectedExit,
} from "./types.js";

const TRANSITIONS: Record<SupervisionState, SupervisionState[]> = {
  INIT: ["LAUNCHING", "SHUTTING_DOWN"],
  LAUNCHING: ["RUNNING", "SHUTTING_DOWN"],
  RUNNING: ["SHUTTING_DOWN"],
  SHUTTING_DOWN: ["DONE"],
  DONE: [],
};

export interface SupervisionLoopOptions {
  /** Processes to start, in order. */
  launches: readonly LaunchSpec[];
  preconditions?: readonly Precondition[];
  /** Shared with signal handlers and shutdown hooks. Created when omitted. */
  cleanup?: CleanupCoordinator;
  onStateChange?: StateChangeListener;
  /** Receives every classified output line from every monitor. */
  onLine?: (line: ClassifiedLine) => void;
}

export class SupervisionLoop {
  readonly cleanup: CleanupCoordinator;
  private readonly context: SupervisionContext;
  private readonly options: SupervisionLoopOptions;
  private readonly logger: Logger;
  private current: SupervisionState = "INIT";
  private interruptedBy: NodeJS.Signals | null = null;
  private wake: (() => void) | null = null;
  private readonly exits: UnexpectedExit[] = [];
  private readonly monitorTasks: Promise<StreamMonitorResult>[] = [];
  private running: Promise<RunOutcome> | null = null;

  constructor(context: SupervisionContext, options: SupervisionLoopOptions) {
    this.context = context;
    this.options = options;
    this.logger = context.logger.child({ component: "loop" });
    this.cleanup = options.cleanup ?? new CleanupCoordinator(context);
  }

  get state(): SupervisionState {
    return this.current;
  }

  /** Drive the run to DONE. Calling it again returns the same run. */
  run(): Promise<RunOutcome> {
    if (!this.running) {
      this.running = this.execute();
    }
    return this.running;
  }

  /**
   * Operator interrupt. Honored in INIT, LAUNCHING and RUNNING; wakes the
   * poll wait so shutdown starts right away.
   */
  interrupt(signal: NodeJS.Signals = "SIGINT"): void {
    if (this.current === "SHUTTING_DOWN" || this.current === "DONE") {
      this.logger.debug(`Ignoring ${signal}: already shutting down`);
      return;
    }
    if (this.interruptedBy) return;
    this.interruptedBy = signal;
    this.logger.info(`Received ${signal}, shutting down...`);
    this.wake?.();
  }

  private async execute(): Promise<RunOutcome> {
    const reason =
      (await this.checkPreconditions()) ?? (await this.launchAll()) ?? (await this.supervise());

    this.transition("SHUTTING_DOWN");
    this.logReason(reason);
    const cleanup = await this.cleanup.cleanup();
    const monitors = await Promise.all(this.monitorTasks);
    this.transition("DONE");

    const exitCode =
      reason.kind === "launch-failure" || reason.kind === "precondition-failure" ? 1 : 0;
    return { exitCode, reason, exits: this.exits, cleanup, monitors };
  }

  // -------------------------------------------------------------------------
  // INIT
  // -------------------------------------------------------------------------

  private async checkPreconditions(): Promise<ShutdownReason | null> {
    const failed: string[] = [];
    for (const precondition of this.options.preconditions ?? []) {
      let ok: boolean;
      try {
        ok = await precondition.check();
      } catch (error: unknown) {
        this.logger.error(`Precondition "${precondition.name}" could not be checked: ${describeError(error)}`);
        ok = false;
      }
      if (!ok) failed.push(precondition.name);
    }

    if (failed.length > 0) {
      return { kind: "precondition-failure", error: new PreconditionFailure(failed) };
    }
    return this.pendingInterrupt();
  }

  // -------------------------------------------------------------------------
  // LAUNCHING
  // -------------------------------------------------------------------------

  private async launchAll(): Promise<ShutdownReason | null> {
    this.transition("LAUNCHING");
    const { supervisor, config } = this.context;

    for (const [index, spec] of this.options.launches.entries()) {
      if (index > 0 && config.supervision.settleDelayMs > 0) {
        await this.pause(config.supervision.settleDelayMs);
      }
      const stop = this.pendingInterrupt() ?? this.pendingDisconnect();
      if (stop) return stop;

      this.logger.info(`Starting ${spec.name} capture...`);
      let managed: ManagedProcess;
      try {
        managed = await supervisor.launch(spec.name, spec.argv);
      } catch (error: unknown) {
        const failure =
          error instanceof LaunchFailure ? error : new LaunchFailure(spec.name, spec.argv, error);
        return { kind: "launch-failure", error: failure };
      }
      this.attachMonitors(managed);
    }

    return this.pendingInterrupt();
  }

  private attachMonitors(managed: ManagedProcess): void {
    const { signal, monitors } = this.context;
    const logger = this.context.logger.child({ component: "monitor", process: managed.name });

    for (const stream of STREAM_KINDS) {
      const monitor = new StreamMonitor({
        processName: managed.name,
        stream,
        input: managed[stream],
        signal,
        logger,
        onLine: this.options.onLine,
      });
      monitors.add(monitor);
      this.monitorTasks.push(
        monitor.start().then((result) => {
          monitors.delete(monitor);
          return result;
        }),
      );
    }
  }

  // -------------------------------------------------------------------------
  // RUNNING
  // -------------------------------------------------------------------------

  private async supervise(): Promise<ShutdownReason> {
    this.transition("RUNNING");
    this.logger.info("Bridge running. Press Ctrl+C to stop.");
    const { supervisor, config } = this.context;

    for (;;) {
      const stop = this.pendingInterrupt() ?? this.pendingDisconnect();
      if (stop) return stop;

      for (const exit of supervisor.pollAll()) {
        const status = exit.signal ? `signal ${exit.signal}` : `code ${exit.exitCode ?? "?"}`;
        this.logger.warn(`${exit.process.name} process exited unexpectedly with ${status}`);
        this.exits.push({
          process: exit.process.name,
          exitCode: exit.exitCode,
          signal: exit.signal,
        });
      }

      if (supervisor.isEmpty()) {
        return { kind: "all-exited" };
      }

      await this.pause(config.supervision.pollIntervalMs);
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private pendingInterrupt(): ShutdownReason | null {
    return this.interruptedBy ? { kind: "interrupt", signal: this.interruptedBy } : null;
  }

  private pendingDisconnect(): ShutdownReason | null {
    const { signal } = this.context;
    return signal.isSet() ? { kind: "disconnect", source: signal.source() } : null;
  }

  /** Sleep that interrupt() cuts short. */
  private pause(ms: number): Promise<void> {
    if (this.interruptedBy) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }

  private transition(to: SupervisionState): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid supervision transition: ${from} → ${to}`);
    }
    this.current = to;
    this.logger.debug(`${from} → ${to}`);
    this.options.onStateChange?.(from, to);
  }

  private logReason(reason: ShutdownReason): void {
    switch (reason.kind) {
      case "interrupt":
        break;
      case "disconnect":
        this.logger.error(
          `Device disconnected${reason.source ? ` (reported by ${reason.source})` : ""}, shutting down`,
        );
        break;
      case "all-exited":
        this.logger.info("All capture processes have exited, shutting down");
        break;
      case "launch-failure":
      case "precondition-failure":
        this.logger.error(reason.error.message);
        break;
    }
  }
}
