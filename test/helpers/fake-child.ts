/**
 * In-process stand-ins for spawned capture processes.
 *
 * A FakeChild behaves like the parts of ChildProcess the supervisor uses:
 * "spawn"/"error"/"exit" events, piped stdout/stderr, exitCode/signalCode and
 * kill(). Events are delivered on the microtask queue so fake timers do not
 * hold them back.
 */
import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";

export interface FakeChildOptions {
  pid?: number;
  /** Exit as soon as SIGTERM arrives. Defaults to true. */
  exitOnSigterm?: boolean;
}

export class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly pid: number;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  /** Every signal passed to kill(), in order. */
  readonly signals: NodeJS.Signals[] = [];
  private readonly exitOnSigterm: boolean;

  constructor(options: FakeChildOptions = {}) {
    super();
    this.pid = options.pid ?? 4242;
    this.exitOnSigterm = options.exitOnSigterm ?? true;
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    if (this.exited) return false;
    if (signal === "SIGKILL" || (signal === "SIGTERM" && this.exitOnSigterm)) {
      queueMicrotask(() => this.exit(null, signal));
    }
    return true;
  }

  get exited(): boolean {
    return this.exitCode !== null || this.signalCode !== null;
  }

  /** Simulate the process ending on its own or by signal. */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return;
    this.exitCode = code;
    this.signalCode = signal;
    this.stdout.end();
    this.stderr.end();
    this.emit("exit", code, signal);
    this.emit("close", code, signal);
  }

  /** Write one line to stdout or stderr. */
  writeLine(stream: "stdout" | "stderr", line: string): void {
    this[stream].write(`${line}\n`);
  }
}

/** Make a spawn stand-in return `child` and report a successful start. */
export function spawnSucceeds(child: FakeChild): () => FakeChild {
  return () => {
    queueMicrotask(() => child.emit("spawn"));
    return child;
  };
}

/** Make a spawn stand-in report that the executable could not be started. */
export function spawnFails(message = "spawn scrcpy ENOENT"): () => FakeChild {
  return () => {
    const child = new FakeChild();
    queueMicrotask(() => child.emit("error", Object.assign(new Error(message), { code: "ENOENT" })));
    return child;
  };
}

/** Resolve after pending microtasks and one macrotask turn. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
