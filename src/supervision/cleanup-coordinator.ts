/**
 * Idempotent teardown of everything a run acquired.
 *
 * The first call to cleanup() starts the release sequence and every later
 * call, concurrent or not, gets the same promise back. Each step is
 * best-effort: a failure is logged as a ResourceReleaseFailure and the
 * remaining steps still run.
 *
 * Order: tracked processes, orphaned capture processes, audio module, pipe,
 * monitors. Writers are stopped before their sinks go away.
 */
import fs from "node:fs";
import { runHostCommand } from "../host/exec.js";
import type { TerminationReport } from "../process/supervisor.js";
import { ResourceReleaseFailure } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import type { SupervisionContext } from "./context.js";

export const CLEANUP_STEPS = [
  "terminate-processes",
  "sweep-orphans",
  "unload-audio-module",
  "remove-pipe",
  "stop-monitors",
] as const;

export type CleanupStep = (typeof CLEANUP_STEPS)[number];

export type StepOutcome = "done" | "skipped" | "failed";

export interface CleanupStepResult {
  step: CleanupStep;
  outcome: StepOutcome;
  /** Failure message for a failed step. */
  error?: string;
}

export interface CleanupReport {
  steps: CleanupStepResult[];
  termination: TerminationReport;
}

export class CleanupCoordinator {
  private readonly context: SupervisionContext;
  private readonly logger: Logger;
  private pending: Promise<CleanupReport> | null = null;

  constructor(context: SupervisionContext) {
    this.context = context;
    this.logger = context.logger.child({ component: "cleanup" });
  }

  /** Run the release sequence once. Later calls return the first call's result. */
  cleanup(): Promise<CleanupReport> {
    if (!this.pending) {
      this.pending = this.release();
    }
    return this.pending;
  }

  /** Whether cleanup() has been called. */
  get started(): boolean {
    return this.pending !== null;
  }

  private async release(): Promise<CleanupReport> {
    this.logger.info("Cleaning up...");
    const termination: TerminationReport = { graceful: [], forceKilled: [] };

    const steps: CleanupStepResult[] = [];
    steps.push(
      await this.step("terminate-processes", async () => {
        const report = await this.context.supervisor.terminateAll(
          this.context.config.supervision.gracePeriodMs,
        );
        termination.graceful.push(...report.graceful);
        termination.forceKilled.push(...report.forceKilled);
        return report.graceful.length + report.forceKilled.length > 0 ? "done" : "skipped";
      }),
    );
    steps.push(await this.step("sweep-orphans", () => this.sweepOrphans()));
    steps.push(await this.step("unload-audio-module", () => this.unloadAudioModule()));
    steps.push(await this.step("remove-pipe", () => this.removePipe()));
    steps.push(await this.step("stop-monitors", () => this.stopMonitors()));

    const failed = steps.filter((s) => s.outcome === "failed").length;
    if (failed > 0) {
      this.logger.warn(`Cleanup finished with ${failed} failed step(s)`);
    } else {
      this.logger.info("Cleanup complete.");
    }
    return { steps, termination };
  }

  private async step(
    name: CleanupStep,
    action: () => StepOutcome | Promise<StepOutcome>,
  ): Promise<CleanupStepResult> {
    try {
      return { step: name, outcome: await action() };
    } catch (error: unknown) {
      const failure =
        error instanceof ResourceReleaseFailure ? error : new ResourceReleaseFailure(name, error);
      this.logger.error(failure.message);
      return { step: name, outcome: "failed", error: failure.message };
    }
  }

  private sweepOrphans(): StepOutcome {
    const { captureToolSignature } = this.context.config.supervision;
    const result = runHostCommand("pkill", ["-f", captureToolSignature]);
    // pkill exits 1 when nothing matched
    if (result.success || result.status === 1) {
      return "done";
    }
    throw new ResourceReleaseFailure("sweep-orphans", result.error ?? `pkill exited ${result.status}`);
  }

  private unloadAudioModule(): StepOutcome {
    const { resources, config } = this.context;
    const moduleId = resources.audioModuleId;
    if (moduleId === null) return "skipped";

    const result = runHostCommand(config.tools.pactl, ["unload-module", moduleId]);
    if (!result.success) {
      throw new ResourceReleaseFailure(
        "unload-audio-module",
        `module ${moduleId}: ${result.error ?? "unknown error"}`,
      );
    }
    resources.audioModuleId = null;
    this.logger.debug(`Unloaded audio module ${moduleId}`);
    return "done";
  }

  private removePipe(): StepOutcome {
    const { resources } = this.context;
    const pipePath = resources.pipePath;
    if (pipePath === null) return "skipped";
    if (!fs.existsSync(pipePath)) {
      resources.pipePath = null;
      return "skipped";
    }

    fs.rmSync(pipePath, { force: true });
    resources.pipePath = null;
    this.logger.debug(`Removed pipe ${pipePath}`);
    return "done";
  }

  private stopMonitors(): StepOutcome {
    const { monitors } = this.context;
    if (monitors.size === 0) return "skipped";
    for (const monitor of monitors) {
      monitor.stop();
    }
    monitors.clear();
    return "done";
  }
}
