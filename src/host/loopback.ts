/**
 * Kernel video-loopback module (v4l2loopback) checks and loading.
 */
import type { VideoConfig } from "../config/index.js";
import type { Logger } from "../shared/logger.js";
import { runHostCommand } from "./exec.js";

export const LOOPBACK_MODULE = "v4l2loopback";

export function isLoopbackLoaded(): boolean {
  const result = runHostCommand("lsmod", []);
  return result.success && result.stdout.includes(LOOPBACK_MODULE);
}

/** modprobe argument vector for a single exclusive-caps loopback device. */
export function buildModprobeArgs(video: VideoConfig): string[] {
  return [
    "modprobe",
    LOOPBACK_MODULE,
    "devices=1",
    `video_nr=${video.videoNr}`,
    `card_label=${video.cardLabel}`,
    "exclusive_caps=1",
  ];
}

/**
 * Make sure the loopback module is loaded, loading it through sudo if needed.
 * Returns whether the module is available afterwards.
 */
export function ensureLoopback(video: VideoConfig, logger: Logger): boolean {
  if (isLoopbackLoaded()) {
    logger.info(`${LOOPBACK_MODULE} already loaded.`);
    return true;
  }

  logger.info(`Loading ${LOOPBACK_MODULE} module...`);
  // sudo may prompt on the terminal; give the operator time to answer
  const result = runHostCommand("sudo", buildModprobeArgs(video), { timeoutMs: 120_000 });
  if (!result.success) {
    logger.error(`Failed to load ${LOOPBACK_MODULE} module: ${result.error ?? "unknown error"}`);
    return false;
  }
  return true;
}
