/**
 * Read-only listing commands: devices, cameras, microphone sources.
 * Each returns the process exit status.
 */
import type { BridgeConfig } from "../config/index.js";
import { listAdbDevices } from "../host/adb.js";
import { formatCamera, queryCameras } from "../host/cameras.js";
import { DEFAULT_MIC_SOURCE, MIC_SOURCES } from "../host/mic-sources.js";
import type { Logger } from "../shared/logger.js";

export function listDevices(config: BridgeConfig, logger: Logger): number {
  const devices = listAdbDevices(config.tools.adb, logger);
  if (devices.length === 0) {
    console.log("[droidbridge] No ADB devices found.");
    return 1;
  }
  for (const serial of devices) {
    console.log(serial);
  }
  return 0;
}

export function listCameras(config: BridgeConfig, logger: Logger): number {
  const query = queryCameras(config.tools.scrcpy, logger);
  if (!query.ok) {
    console.error(`[droidbridge] ${query.message}`);
    return 1;
  }
  if (query.cameras.length === 0) {
    console.log("[droidbridge] No cameras found on the device.");
    return 0;
  }

  console.log("Available cameras:");
  for (const camera of query.cameras) {
    console.log(`  ${formatCamera(camera)}`);
    if (camera.resolutions.length > 0) {
      console.log(`      resolutions: ${camera.resolutions.join(", ")}`);
    }
  }
  return 0;
}

export function listMics(): number {
  console.log("Microphone sources:");
  for (const source of MIC_SOURCES) {
    const marker = source.id === DEFAULT_MIC_SOURCE ? " (default)" : "";
    console.log(`  ${source.id.padEnd(24)} ${source.description}${marker}`);
  }
  return 0;
}
