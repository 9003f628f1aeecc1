/**
 * Line-oriented monitor for one output stream of one managed process.
 *
 * Each line is trimmed, classified and, unless it is plain info, surfaced to
 * the operator. A disconnect line raises the shared DisconnectionSignal and
 * ends the monitor; nothing after it is classified. A read error ends this
 * monitor only and never raises the signal.
 */
import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";
import type { Logger } from "../shared/logger.js";
import { StreamReadFailure } from "../shared/errors.js";
import type { ClassifiedLine, StreamKind } from "../shared/types.js";
import { classifyLine, DEFAULT_RULES, type ClassificationRules } from "./classify.js";
import type { DisconnectionSignal } from "./disconnection-signal.js";

export type MonitorOutcome = "eof" | "disconnect" | "read-error" | "stopped";

export interface StreamMonitorResult {
  process: string;
  stream: StreamKind;
  outcome: MonitorOutcome;
  /** Non-blank lines classified before the monitor ended. */
  linesRead: number;
}

export interface StreamMonitorOptions {
  processName: string;
  stream: StreamKind;
  input: Readable;
  signal: DisconnectionSignal;
  logger: Logger;
  rules?: ClassificationRules;
  /** Receives every classified line, including info lines. */
  onLine?: (line: ClassifiedLine) => void;
}

export class StreamMonitor {
  private readonly options: StreamMonitorOptions;
  private readonly rules: ClassificationRules;
  private readonly tag: string;
  private linesRead = 0;
  private outcome: MonitorOutcome | null = null;
  private readline: Interface | null = null;
  private finish: ((outcome: MonitorOutcome) => void) | null = null;
  private running: Promise<StreamMonitorResult> | null = null;

  constructor(options: StreamMonitorOptions) {
    this.options = options;
    this.rules = options.rules ?? DEFAULT_RULES;
    this.tag = `${options.processName} (${options.stream})`;
  }

  /** Start reading. Calling it again returns the same task. */
  start(): Promise<StreamMonitorResult> {
    if (this.running) return this.running;

    this.running = new Promise<StreamMonitorResult>((resolve) => {
      const { input } = this.options;

      // Stays attached after the monitor ends so a late stream error is never unhandled
      const onError = (error: Error): void => {
        if (this.outcome) return;
        this.options.logger.error(
          new StreamReadFailure(this.options.processName, this.options.stream, error).message,
        );
        this.finish?.("read-error");
      };

      this.finish = (outcome) => {
        if (this.outcome) return;
        this.outcome = outcome;
        this.readline?.close();
        resolve({
          process: this.options.processName,
          stream: this.options.stream,
          outcome,
          linesRead: this.linesRead,
        });
      };

      if (this.outcome === "stopped") {
        // stop() arrived before start()
        resolve({
          process: this.options.processName,
          stream: this.options.stream,
          outcome: "stopped",
          linesRead: 0,
        });
        return;
      }

      input.on("error", onError);
      this.readline = createInterface({ input, crlfDelay: Infinity });
      this.readline.on("error", onError);
      this.readline.on("line", (raw) => this.handleLine(raw));
      this.readline.on("close", () => this.finish?.("eof"));
    });

    return this.running;
  }

  /** Leave the read loop voluntarily. No-op once the monitor has ended. */
  stop(): void {
    if (this.finish) {
      this.finish("stopped");
    } else {
      this.outcome = this.outcome ?? "stopped";
    }
  }

  /** How the monitor ended, or null while it is still reading. */
  get result(): MonitorOutcome | null {
    return this.outcome;
  }

  private handleLine(raw: string): void {
    // readline may still deliver buffered lines after close()
    if (this.outcome) return;

    const text = raw.trim();
    if (!text) return;

    this.linesRead++;
    const category = classifyLine(text, this.rules);
    const { processName, stream, logger, signal } = this.options;
    this.options.onLine?.({ process: processName, stream, category, text });

    switch (category) {
      case "disconnect":
        logger.error(`${this.tag}: device link lost: ${text}`);
        signal.set(this.tag);
        this.finish?.("disconnect");
        break;
      case "fatal-error":
        logger.error(`${this.tag}: ${text}`);
        break;
      case "warning":
        logger.warn(`${this.tag}: ${text}`);
        break;
      case "info":
        logger.debug(`${this.tag}: ${text}`);
        break;
    }
  }
}
