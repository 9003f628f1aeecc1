/**
 * Smoke test: key modules from src/ can be imported and their primary
 * exports are available and functional.
 */
import { describe, expect, it } from "vitest";

import { VERSION } from "../../src/version.js";
import {
  ConfigError,
  createLogger,
  LaunchFailure,
  Logger,
  registerShutdownHook,
  SUPERVISION_STATES,
} from "../../src/shared/index.js";
import { buildProgram } from "../../src/cli/program.js";
import {
  classifyLine,
  DisconnectionSignal,
  ProcessSupervisor,
  StreamMonitor,
} from "../../src/process/index.js";
import {
  CLEANUP_STEPS,
  CleanupCoordinator,
  createSupervisionContext,
  SupervisionLoop,
} from "../../src/supervision/index.js";
import { listMics, startBridge } from "../../src/bridge/index.js";
import { DEFAULT_CONFIG, loadConfig } from "../../src/config/index.js";

describe("smoke test: src/ imports", () => {
  it("exports VERSION as a semver-like string", () => {
    expect(typeof VERSION).toBe("string");
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+/);
  });

  it("exports shared utilities", () => {
    expect(typeof createLogger).toBe("function");
    expect(Logger).toBeDefined();
    expect(typeof registerShutdownHook).toBe("function");
    expect(new LaunchFailure("video", ["scrcpy"])).toBeInstanceOf(Error);
    expect(new ConfigError("x")).toBeInstanceOf(Error);
    expect(SUPERVISION_STATES[0]).toBe("INIT");
  });

  it("exports the CLI entry point", () => {
    expect(buildProgram().name()).toBe("droidbridge");
  });

  it("exports process management", () => {
    expect(ProcessSupervisor).toBeDefined();
    expect(StreamMonitor).toBeDefined();
    expect(new DisconnectionSignal().isSet()).toBe(false);
    expect(classifyLine("WARN: Device disconnected")).toBe("disconnect");
  });

  it("exports run supervision", () => {
    const context = createSupervisionContext(
      DEFAULT_CONFIG,
      createLogger({}, { fileOutput: false, consoleOutput: false }),
    );
    const loop = new SupervisionLoop(context, { launches: [] });

    expect(loop.state).toBe("INIT");
    expect(loop.cleanup).toBeInstanceOf(CleanupCoordinator);
    expect(CLEANUP_STEPS).toHaveLength(5);
  });

  it("exports bridge commands and config", () => {
    expect(typeof startBridge).toBe("function");
    expect(typeof listMics).toBe("function");
    expect(typeof loadConfig).toBe("function");
  });
});
