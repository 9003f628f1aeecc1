import { beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG } from "../config/index.js";
import { createLogger } from "../shared/logger.js";
import { buildModprobeArgs, ensureLoopback, isLoopbackLoaded } from "./loopback.js";

const mockExecFileSync = vi.hoisted(() => vi.fn());

vi.mock("node:child_process", () => ({
  execFileSync: mockExecFileSync,
}));

const logger = createLogger({ component: "setup" }, { fileOutput: false, consoleOutput: false });

const LSMOD_WITH_LOOPBACK = [
  "Module                  Size  Used by",
  "v4l2loopback           49152  0",
  "videodev              344064  1 v4l2loopback",
].join("\n");

describe("isLoopbackLoaded", () => {
  beforeEach(() => {
    mockExecFileSync.mockReset();
  });

  it("finds the module in lsmod output", () => {
    mockExecFileSync.mockReturnValueOnce(LSMOD_WITH_LOOPBACK);
    expect(isLoopbackLoaded()).toBe(true);
  });

  it("returns false when the module is absent or lsmod fails", () => {
    mockExecFileSync.mockReturnValueOnce("Module                  Size  Used by\n");
    expect(isLoopbackLoaded()).toBe(false);

    mockExecFileSync.mockImplementationOnce(() => {
      throw new Error("lsmod failed");
    });
    expect(isLoopbackLoaded()).toBe(false);
  });
});

describe("buildModprobeArgs", () => {
  it("requests one exclusive-caps device with the configured number and label", () => {
    expect(buildModprobeArgs({ ...DEFAULT_CONFIG.video, videoNr: 4, cardLabel: "Phone" })).toEqual([
      "modprobe",
      "v4l2loopback",
      "devices=1",
      "video_nr=4",
      "card_label=Phone",
      "exclusive_caps=1",
    ]);
  });
});

describe("ensureLoopback", () => {
  beforeEach(() => {
    mockExecFileSync.mockReset();
  });

  it("does not call modprobe when the module is loaded", () => {
    mockExecFileSync.mockReturnValueOnce(LSMOD_WITH_LOOPBACK);

    expect(ensureLoopback(DEFAULT_CONFIG.video, logger)).toBe(true);
    expect(mockExecFileSync).toHaveBeenCalledTimes(1);
  });

  it("loads the module through sudo when missing", () => {
    mockExecFileSync.mockReturnValueOnce("").mockReturnValueOnce("");

    expect(ensureLoopback(DEFAULT_CONFIG.video, logger)).toBe(true);
    expect(mockExecFileSync).toHaveBeenLastCalledWith(
      "sudo",
      buildModprobeArgs(DEFAULT_CONFIG.video),
      expect.objectContaining({ timeout: 120_000 }),
    );
  });

  it("reports a failed modprobe", () => {
    const error = vi.spyOn(logger, "error");
    mockExecFileSync.mockReturnValueOnce("").mockImplementationOnce(() => {
      throw Object.assign(new Error("Command failed"), {
        status: 1,
        stderr: "modprobe: FATAL: Module v4l2loopback not found.\n",
      });
    });

    expect(ensureLoopback(DEFAULT_CONFIG.video, logger)).toBe(false);
    expect(error).toHaveBeenCalledWith(
      "Failed to load v4l2loopback module: modprobe: FATAL: Module v4l2loopback not found.",
    );
    error.mockRestore();
  });
});
