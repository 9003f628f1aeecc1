/**
 * Structural invariant tests: mechanically enforce architectural rules.
 *
 * These tests scan the source tree and verify the import layering, naming
 * conventions, test co-location and the supervision state machine table.
 * They do NOT test runtime behavior.
 */
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const SRC = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../src");

/** Recursively collect all .ts files under a directory. */
function walk(dir: string, ext = ".ts"): string[] {
  const results: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory() && entry.name !== "node_modules") {
      results.push(...walk(full, ext));
    } else if (entry.isFile() && entry.name.endsWith(ext)) {
      results.push(full);
    }
  }
  return results;
}

/** Extract import paths from a TS file (both `import` and `import type`). */
function extractImports(filePath: string): string[] {
  const content = fs.readFileSync(filePath, "utf-8");
  return [...content.matchAll(/from\s+["']([^"']+)["']/g)].flatMap((m) => (m[1] ? [m[1]] : []));
}

/** Top-level src/ entry (directory or file) a relative import points into. */
function resolveModuleDir(fromFile: string, importPath: string): string | null {
  if (!importPath.startsWith(".")) return null;
  const resolved = path.resolve(path.dirname(fromFile), importPath);
  const rel = path.relative(SRC, resolved);
  if (rel.startsWith("..")) return null;
  return rel.split(path.sep)[0] ?? null;
}

/** Top-level module of a source file, or null for files directly under src/. */
function moduleOf(file: string): string | null {
  const parts = path.relative(SRC, file).split(path.sep);
  return parts.length > 1 ? (parts[0] ?? null) : null;
}

const allSourceFiles = walk(SRC).filter((f) => !f.endsWith(".test.ts"));
const allTestFiles = walk(SRC).filter((f) => f.endsWith(".test.ts"));

// ---------------------------------------------------------------------------
// 1. Layered Architecture: import boundary enforcement
// ---------------------------------------------------------------------------

/** Lower layers never import from higher ones. */
const LAYERS: Record<string, number> = {
  shared: 0,
  config: 1,
  host: 2,
  process: 2,
  supervision: 3,
  bridge: 4,
  cli: 5,
};

describe("layered architecture", () => {
  it("every module directory has a layer", () => {
    const dirs = fs
      .readdirSync(SRC, { withFileTypes: true })
      .filter((e) => e.isDirectory())
      .map((e) => e.name);
    expect(dirs.filter((d) => !(d in LAYERS))).toEqual([]);
  });

  it("modules only import from lower layers", () => {
    const violations: string[] = [];

    for (const file of allSourceFiles) {
      const mod = moduleOf(file);
      if (!mod) continue;
      const layer = LAYERS[mod];
      if (layer === undefined) continue;

      for (const imp of extractImports(file)) {
        const target = resolveModuleDir(file, imp);
        if (!target || target === mod) continue;
        const targetLayer = LAYERS[target];
        // version.ts sits at the top of src/ and is only read by the CLI
        if (targetLayer === undefined ? mod !== "cli" : targetLayer >= layer) {
          violations.push(`${path.relative(SRC, file)} imports from ${target} (${imp})`);
        }
      }
    }

    expect(violations).toEqual([]);
  });

  it("host/ and process/ do not depend on each other", () => {
    const violations: string[] = [];
    for (const [from, to] of [
      ["host", "process"],
      ["process", "host"],
    ] as const) {
      for (const file of allSourceFiles.filter((f) => moduleOf(f) === from)) {
        for (const imp of extractImports(file)) {
          if (resolveModuleDir(file, imp) === to) {
            violations.push(`${path.relative(SRC, file)} imports from ${to}/ (${imp})`);
          }
        }
      }
    }
    expect(violations).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// 2. Naming conventions
// ---------------------------------------------------------------------------

describe("naming conventions", () => {
  it("all source files use kebab-case", () => {
    const violations: string[] = [];
    const kebabRe = /^[a-z0-9]+(-[a-z0-9]+)*\.ts$/;

    for (const file of [...allSourceFiles, ...allTestFiles]) {
      const normalized = path.basename(file).replace(".test.ts", ".ts");
      if (normalized !== "index.ts" && !kebabRe.test(normalized)) {
        violations.push(path.relative(SRC, file));
      }
    }

    expect(violations).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// 3. Test co-location
// ---------------------------------------------------------------------------

describe("test co-location", () => {
  const exemptPatterns = [
    /index\.ts$/, // barrel files and the config module (tested by config.test.ts)
    /types\.ts$/, // pure type files
  ];

  it("every source file under a module directory has a co-located .test.ts file", () => {
    const missing: string[] = [];

    for (const file of allSourceFiles) {
      if (!moduleOf(file)) continue;
      if (exemptPatterns.some((re) => re.test(path.basename(file)))) continue;
      if (!fs.existsSync(file.replace(/\.ts$/, ".test.ts"))) {
        missing.push(path.relative(SRC, file));
      }
    }

    expect(missing).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// 4. State machine integrity
// ---------------------------------------------------------------------------

function listLiteral(source: string, pattern: RegExp): string[] {
  const body = source.match(pattern)?.[1] ?? "";
  return body
    .split(",")
    .map((s) => s.trim().replace(/['"]/g, ""))
    .filter(Boolean);
}

describe("state machine integrity", () => {
  const types = fs.readFileSync(path.join(SRC, "shared", "types.ts"), "utf-8");
  const loop = fs.readFileSync(path.join(SRC, "supervision", "supervision-loop.ts"), "utf-8");
  const states = listLiteral(types, /SUPERVISION_STATES\s*=\s*\[([\s\S]*?)\]\s*as\s*const/);

  it("SUPERVISION_STATES starts with INIT and ends with DONE", () => {
    expect(states[0]).toBe("INIT");
    expect(states[states.length - 1]).toBe("DONE");
  });

  it("TRANSITIONS covers every supervision state", () => {
    const table = loop.match(/const TRANSITIONS[\s\S]*?=\s*\{([\s\S]*?)\};/)?.[1] ?? "";
    const keys = [...table.matchAll(/(\w+)\s*:/g)].map((m) => m[1]);
    expect(keys).toEqual(states);
  });

  it("every state before SHUTTING_DOWN can reach it directly", () => {
    for (const state of ["INIT", "LAUNCHING", "RUNNING"]) {
      const targets = listLiteral(loop, new RegExp(`\\b${state}\\s*:\\s*\\[(.*?)\\]`));
      expect(targets).toContain("SHUTTING_DOWN");
    }
  });

  it("SHUTTING_DOWN only leads to DONE and DONE is terminal", () => {
    expect(listLiteral(loop, /SHUTTING_DOWN\s*:\s*\[(.*?)\]/)).toEqual(["DONE"]);
    expect(listLiteral(loop, /DONE\s*:\s*\[(.*?)\]/)).toEqual([]);
  });
});
