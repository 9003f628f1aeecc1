#!/usr/bin/env node
/**
 * droidbridge: use an Android phone as a webcam and microphone.
 *
 * This is the main entry point. It bootstraps the CLI program, installs the
 * crash handlers that release the active run's resources, and delegates to
 * Commander.
 */
import process from "node:process";
import { buildProgram } from "./cli/program.js";
import { runShutdownHooks } from "./shared/shutdown-hooks.js";

function describeFatal(error: unknown): string {
  return error instanceof Error ? (error.stack ?? error.message) : String(error);
}

async function crash(label: string, error: unknown): Promise<void> {
  console.error(`[droidbridge] ${label}:`, describeFatal(error));
  await runShutdownHooks((hookError) => {
    console.error("[droidbridge] Cleanup after crash failed:", describeFatal(hookError));
  });
  process.exit(1);
}

const program = buildProgram();

process.on("uncaughtException", (error) => {
  void crash("Uncaught exception", error);
});

process.on("unhandledRejection", (reason) => {
  void crash("Unhandled rejection", reason);
});

void program.parseAsync(process.argv).catch((err: unknown) => crash("CLI failed", err));
