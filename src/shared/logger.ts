/**
 * Structured logger for droidbridge.
 *
 * Writes JSON log lines to ~/.droidbridge/logs/ and human-readable output to
 * the console.
 * Log format: {ts, level, component, process, msg}
 * Console format: [component] message
 */
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import type { LogEntry, LogLevel } from "./types.js";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export interface LoggerContext {
  /** Component emitting the log (e.g. "loop", "cleanup"). */
  component: string;
  /** Managed process the messages concern (e.g. "video"). */
  process: string;
}

export interface LoggerOptions {
  /** Minimum log level to emit. Defaults to "info". */
  level?: LogLevel;
  /** Directory for JSON log files. Defaults to ~/.droidbridge/logs/. */
  logDir?: string;
  /** Whether to write to file. Defaults to true. */
  fileOutput?: boolean;
  /** Whether to write to console. Defaults to true. */
  consoleOutput?: boolean;
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly level: LogLevel;
  private readonly minLevel: number;
  private readonly logDir: string;
  private readonly fileOutput: boolean;
  private readonly consoleOutput: boolean;
  private logFilePath: string | null = null;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.level = options.level ?? "info";
    this.minLevel = LOG_LEVEL_PRIORITY[this.level];
    this.logDir = options.logDir ?? path.join(os.homedir(), ".droidbridge", "logs");
    this.fileOutput = options.fileOutput ?? true;
    this.consoleOutput = options.consoleOutput ?? true;
  }

  fatal(msg: string): void {
    this.log("fatal", msg);
  }

  error(msg: string): void {
    this.log("error", msg);
  }

  warn(msg: string): void {
    this.log("warn", msg);
  }

  info(msg: string): void {
    this.log("info", msg);
  }

  debug(msg: string): void {
    this.log("debug", msg);
  }

  trace(msg: string): void {
    this.log("trace", msg);
  }

  /** Create a child logger with an updated context. */
  child(overrides: Partial<LoggerContext>): Logger {
    return new Logger(
      { ...this.context, ...overrides },
      {
        level: this.level,
        logDir: this.logDir,
        fileOutput: this.fileOutput,
        consoleOutput: this.consoleOutput,
      },
    );
  }

  private log(level: LogLevel, msg: string): void {
    if (LOG_LEVEL_PRIORITY[level] > this.minLevel) return;

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.context.component,
      process: this.context.process,
      msg,
    };

    if (this.consoleOutput) {
      this.writeConsole(entry);
    }

    if (this.fileOutput) {
      this.writeFile(entry);
    }
  }

  private writeConsole(entry: LogEntry): void {
    const prefix = entry.component ? `[${entry.component}]` : "[droidbridge]";
    const line = `${prefix} ${entry.msg}`;

    if (entry.level === "fatal" || entry.level === "error") {
      console.error(line);
    } else if (entry.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private writeFile(entry: LogEntry): void {
    try {
      if (!this.logFilePath) {
        fs.mkdirSync(this.logDir, { recursive: true });
        const date = new Date().toISOString().slice(0, 10);
        this.logFilePath = path.join(this.logDir, `droidbridge-${date}.jsonl`);
      }
      fs.appendFileSync(this.logFilePath, JSON.stringify(entry) + "\n");
    } catch {
      // File write errors are dropped; console output still goes out
    }
  }
}

/** Create a logger with default context. */
export function createLogger(
  context: Partial<LoggerContext> = {},
  options: LoggerOptions = {},
): Logger {
  return new Logger(
    {
      component: context.component ?? "",
      process: context.process ?? "",
    },
    options,
  );
}

/** Render an unknown thrown value as a single-line message. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
