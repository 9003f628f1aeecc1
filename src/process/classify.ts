/**
 * Line classification for capture-tool diagnostics.
 *
 * Priority: disconnect > fatal-error > warning > info.
 */
import type { LineCategory } from "../shared/types.js";

export interface ClassificationRules {
  /**
   * Each entry matches when the line contains every marker in it.
   * Any matching entry makes the line a disconnect.
   */
  disconnect: ReadonlyArray<readonly string[]>;
  /** Any marker present makes the line a fatal error. */
  fatal: readonly string[];
  /** Any marker present makes the line a warning. */
  warning: readonly string[];
}

export const DEFAULT_RULES: ClassificationRules = {
  disconnect: [["Device disconnected", "WARN:"], ["Could not find any ADB device"]],
  fatal: ["ERROR:", "FATAL:", "Failed", "Error", "Cannot"],
  warning: ["WARN:"],
};

export function classifyLine(
  line: string,
  rules: ClassificationRules = DEFAULT_RULES,
): LineCategory {
  if (rules.disconnect.some((markers) => markers.every((marker) => line.includes(marker)))) {
    return "disconnect";
  }
  if (rules.fatal.some((marker) => line.includes(marker))) {
    return "fatal-error";
  }
  if (rules.warning.some((marker) => line.includes(marker))) {
    return "warning";
  }
  return "info";
}
