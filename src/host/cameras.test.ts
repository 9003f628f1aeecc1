import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import type { CameraInfo } from "../shared/types.js";
import {
  formatCamera,
  parseCameraList,
  queryCameras,
  resolveCaptureSettings,
} from "./cameras.js";

const mockExecFileSync = vi.hoisted(() => vi.fn());

vi.mock("node:child_process", () => ({
  execFileSync: mockExecFileSync,
}));

const logger = createLogger({ component: "setup" }, { fileOutput: false, consoleOutput: false });

const LISTING = [
  "scrcpy 2.4 <https://github.com/Genymobile/scrcpy>",
  "INFO: Device: [test] phone (Android 14)",
  "[server] INFO: List of cameras sizes:",
  "    --camera-id=0    (back, 4000x3000, fps=[10, 15, 30])",
  "        - 4000x3000",
  "        - 1920x1080",
  "        - 1280x720",
  "    --camera-id=1    (front, 3264x2448, fps=[15, 30, 60])",
  "        - 3264x2448",
  "        - 640x480",
  "",
].join("\n");

const BACK: CameraInfo = {
  id: "0",
  facing: "back",
  defaultResolution: "4000x3000",
  resolutions: ["4000x3000", "1920x1080", "1280x720"],
  fps: [10, 15, 30],
};

const FRONT: CameraInfo = {
  id: "1",
  facing: "front",
  defaultResolution: "3264x2448",
  resolutions: ["3264x2448", "640x480"],
  fps: [15, 30, 60],
};

describe("parseCameraList", () => {
  it("parses cameras with their resolutions and frame rates", () => {
    expect(parseCameraList(LISTING)).toEqual([BACK, FRONT]);
  });

  it("ignores resolution lines before the first camera", () => {
    expect(parseCameraList("  - 1920x1080\n")).toEqual([]);
  });
});

describe("queryCameras", () => {
  beforeEach(() => {
    mockExecFileSync.mockReset();
  });

  it("returns the parsed cameras", () => {
    mockExecFileSync.mockReturnValueOnce(LISTING);

    expect(queryCameras("scrcpy", logger)).toEqual({ ok: true, cameras: [BACK, FRONT] });
    expect(mockExecFileSync).toHaveBeenCalledWith(
      "scrcpy",
      ["--list-camera-sizes"],
      expect.objectContaining({ timeout: 30_000 }),
    );
  });

  it("recognises a missing device", () => {
    mockExecFileSync.mockImplementationOnce(() => {
      throw Object.assign(new Error("Command failed"), {
        status: 1,
        stdout: "",
        stderr: "ERROR: Could not find any ADB device\n",
      });
    });

    expect(queryCameras("scrcpy", logger)).toEqual({
      ok: false,
      reason: "no-device",
      message: "No ADB device found",
    });
  });

  it("reports other failures", () => {
    mockExecFileSync.mockImplementationOnce(() => {
      throw Object.assign(new Error("Command failed"), {
        status: 1,
        stdout: "",
        stderr: "ERROR: Camera access denied\n",
      });
    });

    expect(queryCameras("scrcpy", logger)).toEqual({
      ok: false,
      reason: "failed",
      message: "Failed to get camera information: ERROR: Camera access denied",
    });
  });
});

describe("resolveCaptureSettings", () => {
  it("defaults to camera 0, 1920x1080 and the highest frame rate", () => {
    expect(resolveCaptureSettings([BACK, FRONT], { micSource: "mic-camcorder" })).toEqual({
      cameraId: "0",
      resolution: "1920x1080",
      fps: 30,
      micSource: "mic-camcorder",
    });
  });

  it("falls back to the first listed resolution without 1920x1080", () => {
    const settings = resolveCaptureSettings([BACK, FRONT], { camera: "1", micSource: "mic" });
    expect(settings.resolution).toBe("3264x2448");
    expect(settings.fps).toBe(60);
  });

  it("accepts supported explicit values", () => {
    const settings = resolveCaptureSettings([BACK], {
      camera: "0",
      resolution: "1280x720",
      fps: 15,
      micSource: "mic-unprocessed",
    });
    expect(settings).toEqual({
      cameraId: "0",
      resolution: "1280x720",
      fps: 15,
      micSource: "mic-unprocessed",
    });
  });

  it("rejects an unknown camera", () => {
    expect(() => resolveCaptureSettings([BACK, FRONT], { camera: "7", micSource: "mic" })).toThrow(
      "Unknown camera id '7'. Available: 0, 1",
    );
  });

  it("rejects an unsupported resolution", () => {
    expect(() =>
      resolveCaptureSettings([BACK], { resolution: "640x480", micSource: "mic" }),
    ).toThrow("Camera 0 does not support 640x480. Available: 4000x3000, 1920x1080, 1280x720");
  });

  it("rejects an unsupported frame rate", () => {
    expect(() => resolveCaptureSettings([BACK], { fps: 60, micSource: "mic" })).toThrow(ConfigError);
  });

  it("rejects an unknown microphone source", () => {
    expect(() => resolveCaptureSettings([BACK], { micSource: "mic-stereo" })).toThrow(
      /Unknown microphone source 'mic-stereo'/,
    );
  });

  it("uses requests or defaults unchecked when no cameras are reported", () => {
    expect(resolveCaptureSettings([], { micSource: "mic" })).toEqual({
      cameraId: "0",
      resolution: "1920x1080",
      fps: 60,
      micSource: "mic",
    });
    expect(resolveCaptureSettings([], { camera: "3", fps: 24, micSource: "mic" }).fps).toBe(24);
  });
});

describe("formatCamera", () => {
  it("summarises a camera on one line", () => {
    expect(formatCamera(BACK)).toBe("0: back camera (default: 4000x3000, fps: [10, 15, 30])");
  });
});
