import { createRequire } from "node:module";

const CORE_PACKAGE_NAME = "droidbridge";

const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json", "./package.json"] as const;

function readField(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

function readVersionFromPackageJson(moduleUrl: string): string | null {
  const require = createRequire(moduleUrl);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let parsed: unknown;
    try {
      parsed = require(candidate);
    } catch {
      continue;
    }
    const name = readField(parsed, "name");
    const version = readField(parsed, "version");
    if (name === CORE_PACKAGE_NAME && typeof version === "string" && version.trim()) {
      return version.trim();
    }
  }
  return null;
}

export const VERSION = readVersionFromPackageJson(import.meta.url) ?? "0.0.0";
