/**
 * Device bridge queries.
 */
import type { Logger } from "../shared/logger.js";
import { runHostCommand } from "./exec.js";

/**
 * Parse `adb devices` output into the serials whose state is "device".
 * Devices that are unauthorized or offline are left out.
 */
export function parseAdbDevices(output: string): string[] {
  const devices: string[] = [];
  const lines = output.trim().split("\n").slice(1);
  for (const raw of lines) {
    const line = raw.trim();
    if (!line || line.startsWith("*")) continue;
    const [serial, state] = line.split("\t");
    if (serial && state?.trim() === "device") {
      devices.push(serial);
    }
  }
  return devices;
}

/**
 * List reachable devices. Returns an empty list (with a diagnostic) when adb
 * is missing, times out or fails.
 */
export function listAdbDevices(adb: string, logger: Logger): string[] {
  const result = runHostCommand(adb, ["devices"], { timeoutMs: 10_000 });
  if (!result.success) {
    logger.error(`Failed to check ADB devices: ${result.error ?? "unknown error"}`);
    return [];
  }
  return parseAdbDevices(result.stdout);
}
