/**
 * Camera capability query and non-interactive capture settings resolution.
 *
 * The capture tool lists cameras as:
 *
 *   --camera-id=0    (back, 4000x3000, fps=[10, 15, 30])
 *       - 4000x3000
 *       - 1920x1080
 */
import { ConfigError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import type { CameraInfo, CaptureSettings } from "../shared/types.js";
import { runHostCommand } from "./exec.js";
import { isMicSource, MIC_SOURCES } from "./mic-sources.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_CAMERA_ID = "0";
export const DEFAULT_RESOLUTION = "1920x1080";
export const DEFAULT_FPS = 60;

export const NO_DEVICE_MARKER = "Could not find any ADB device";

const CAMERA_LINE = /^--camera-id=(\d+)\s+\(([^,]+),\s*(\d+x\d+),\s*fps=\[([^\]]+)\]\)/;
const RESOLUTION_LINE = /^-\s*(\d+x\d+)$/;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function parseCameraList(output: string): CameraInfo[] {
  const cameras: CameraInfo[] = [];
  let current: CameraInfo | null = null;

  for (const raw of output.split("\n")) {
    const line = raw.trim();

    const camera = CAMERA_LINE.exec(line);
    if (camera) {
      const [, id = "", facing = "", defaultResolution = "", fps = ""] = camera;
      current = {
        id,
        facing: facing.trim(),
        defaultResolution,
        resolutions: [],
        fps: fps
          .split(",")
          .map((value) => Number(value.trim()))
          .filter((value) => Number.isInteger(value) && value > 0),
      };
      cameras.push(current);
      continue;
    }

    const resolution = RESOLUTION_LINE.exec(line);
    if (current && resolution?.[1]) {
      current.resolutions.push(resolution[1]);
    }
  }

  return cameras;
}

// ---------------------------------------------------------------------------
// Query
// ---------------------------------------------------------------------------

export type CameraQueryResult =
  | { ok: true; cameras: CameraInfo[] }
  | { ok: false; reason: "no-device" | "failed"; message: string };

export function queryCameras(scrcpy: string, logger: Logger): CameraQueryResult {
  logger.info("Getting camera information...");
  const result = runHostCommand(scrcpy, ["--list-camera-sizes"], { timeoutMs: 30_000 });

  if (result.stderr.includes(NO_DEVICE_MARKER) || result.stdout.includes(NO_DEVICE_MARKER)) {
    return { ok: false, reason: "no-device", message: "No ADB device found" };
  }
  if (!result.success) {
    return {
      ok: false,
      reason: "failed",
      message: `Failed to get camera information: ${result.error ?? "unknown error"}`,
    };
  }
  return { ok: true, cameras: parseCameraList(result.stdout) };
}

// ---------------------------------------------------------------------------
// Settings resolution
// ---------------------------------------------------------------------------

export interface RequestedSettings {
  camera?: string;
  resolution?: string;
  fps?: number;
  micSource: string;
}

/**
 * Pick camera, resolution and frame rate from explicit requests and the
 * device's capabilities. With no capability data the requests (or defaults)
 * are used unchecked.
 *
 * @throws ConfigError when a request is not supported by the device.
 */
export function resolveCaptureSettings(
  cameras: readonly CameraInfo[],
  requested: RequestedSettings,
): CaptureSettings {
  if (!isMicSource(requested.micSource)) {
    throw new ConfigError(
      `Unknown microphone source '${requested.micSource}'. Available: ${MIC_SOURCES.map((s) => s.id).join(", ")}`,
    );
  }

  const cameraId = requested.camera ?? DEFAULT_CAMERA_ID;

  if (cameras.length === 0) {
    return {
      cameraId,
      resolution: requested.resolution ?? DEFAULT_RESOLUTION,
      fps: requested.fps ?? DEFAULT_FPS,
      micSource: requested.micSource,
    };
  }

  const camera = cameras.find((c) => c.id === cameraId);
  if (!camera) {
    throw new ConfigError(
      `Unknown camera id '${cameraId}'. Available: ${cameras.map((c) => c.id).join(", ")}`,
    );
  }

  return {
    cameraId,
    resolution: pickResolution(camera, requested.resolution),
    fps: pickFps(camera, requested.fps),
    micSource: requested.micSource,
  };
}

function pickResolution(camera: CameraInfo, requested: string | undefined): string {
  if (requested !== undefined) {
    if (camera.resolutions.length > 0 && !camera.resolutions.includes(requested)) {
      throw new ConfigError(
        `Camera ${camera.id} does not support ${requested}. Available: ${camera.resolutions.join(", ")}`,
      );
    }
    return requested;
  }
  if (camera.resolutions.includes(DEFAULT_RESOLUTION)) {
    return DEFAULT_RESOLUTION;
  }
  return camera.resolutions[0] ?? camera.defaultResolution;
}

function pickFps(camera: CameraInfo, requested: number | undefined): number {
  if (requested !== undefined) {
    if (camera.fps.length > 0 && !camera.fps.includes(requested)) {
      throw new ConfigError(
        `Camera ${camera.id} does not support ${requested} fps. Available: ${camera.fps.join(", ")}`,
      );
    }
    return requested;
  }
  return camera.fps.length > 0 ? Math.max(...camera.fps) : DEFAULT_FPS;
}

/** One-line summary per camera, for listings. */
export function formatCamera(camera: CameraInfo): string {
  return `${camera.id}: ${camera.facing} camera (default: ${camera.defaultResolution}, fps: [${camera.fps.join(", ")}])`;
}
