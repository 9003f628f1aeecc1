/**
 * Configuration system for droidbridge.
 *
 * Handles locating ~/.droidbridge/, loading and validating config.yaml, and
 * layering CLI overrides on top of the built-in defaults.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "../shared/errors.js";
import { LOG_LEVELS, type LogLevel } from "../shared/types.js";

const STATE_DIRNAME = ".droidbridge";
const CONFIG_FILENAME = "config.yaml";
const LOGS_DIRNAME = "logs";

export function resolveHomeDir(): string {
  const override = process.env.DROIDBRIDGE_HOME?.trim();
  if (override) {
    if (override.includes("..")) {
      throw new ConfigError(
        `Invalid DROIDBRIDGE_HOME path '${override}': path must not contain '..' traversal segments`,
      );
    }
    if (!override.startsWith("/")) {
      throw new ConfigError(
        `Invalid DROIDBRIDGE_HOME path '${override}': path must be absolute`,
      );
    }
    return path.resolve(override);
  }
  return os.homedir();
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.DROIDBRIDGE_STATE_DIR?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(resolveHomeDir(), STATE_DIRNAME);
}

export function resolveConfigPath(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, CONFIG_FILENAME);
}

export function resolveLogDir(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, LOGS_DIRNAME);
}

export interface InitResult {
  /** Whether the state directory was freshly created. */
  created: boolean;
  /** Absolute path to the state directory. */
  stateDir: string;
  /** Absolute path to the JSON log directory. */
  logDir: string;
}

/**
 * Initialize the ~/.droidbridge/ directory structure.
 *
 * Creates:
 *   ~/.droidbridge/
 *   ~/.droidbridge/logs/
 */
export function initStateDir(stateDir?: string): InitResult {
  const dir = stateDir ?? resolveStateDir();
  const existed = fs.existsSync(dir);
  const logDir = resolveLogDir(dir);
  fs.mkdirSync(logDir, { recursive: true });
  return { created: !existed, stateDir: dir, logDir };
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const RESOLUTION_PATTERN = /^\d+x\d+$/;

const resolutionSchema = z
  .string()
  .regex(RESOLUTION_PATTERN, "resolution must look like 1920x1080");

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();
const port = z.number().int().min(1).max(65_535);

const configFileSchema = z
  .object({
    video: z
      .object({
        device: z.string().min(1),
        cardLabel: z.string().min(1),
        videoNr: nonNegativeInt,
        port,
        camera: z.string().min(1),
        resolution: resolutionSchema,
        fps: positiveInt,
      })
      .partial()
      .strict(),
    audio: z
      .object({
        sourceName: z.string().min(1),
        pipePath: z.string().min(1),
        port,
        micSource: z.string().min(1),
      })
      .partial()
      .strict(),
    supervision: z
      .object({
        pollIntervalMs: positiveInt,
        settleDelayMs: nonNegativeInt,
        gracePeriodMs: positiveInt,
        captureToolSignature: z.string().min(1),
      })
      .partial()
      .strict(),
    tools: z
      .object({
        adb: z.string().min(1),
        scrcpy: z.string().min(1),
        pactl: z.string().min(1),
      })
      .partial()
      .strict(),
    logging: z
      .object({
        level: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ---------------------------------------------------------------------------
// Resolved configuration
// ---------------------------------------------------------------------------

export interface VideoConfig {
  /** Virtual video device the capture tool writes to. */
  device: string;
  /** Label the loopback module advertises to video apps. */
  cardLabel: string;
  /** Loopback device number (/dev/video<N>). */
  videoNr: number;
  /** Transport port for the video capture session. */
  port: number;
  /** Requested camera id; resolved against the device when unset. */
  camera?: string;
  resolution?: string;
  fps?: number;
}

export interface AudioConfig {
  /** Name of the virtual microphone source. */
  sourceName: string;
  /** Named pipe between the audio capture process and the audio server. */
  pipePath: string;
  /** Transport port for the audio capture session. */
  port: number;
  micSource: string;
}

export interface SupervisionConfig {
  pollIntervalMs: number;
  /** Delay between launching video and audio capture. */
  settleDelayMs: number;
  /** Time a process gets to exit after SIGTERM before SIGKILL. */
  gracePeriodMs: number;
  /** Command-line pattern matched when sweeping orphaned capture processes. */
  captureToolSignature: string;
}

export interface ToolsConfig {
  adb: string;
  scrcpy: string;
  pactl: string;
}

export interface BridgeConfig {
  video: VideoConfig;
  audio: AudioConfig;
  supervision: SupervisionConfig;
  tools: ToolsConfig;
  logging: { level: LogLevel };
}

export const DEFAULT_CONFIG: BridgeConfig = {
  video: {
    device: "/dev/video0",
    cardLabel: "DroidBridge",
    videoNr: 0,
    port: 27183,
  },
  audio: {
    sourceName: "DroidBridge",
    pipePath: "/tmp/droidbridge_pipe",
    port: 27184,
    micSource: "mic-camcorder",
  },
  supervision: {
    pollIntervalMs: 300,
    settleDelayMs: 2000,
    gracePeriodMs: 2000,
    captureToolSignature: "scrcpy",
  },
  tools: {
    adb: "adb",
    scrcpy: "scrcpy",
    pactl: "pactl",
  },
  logging: { level: "info" },
};

/** Merge a validated config file over the defaults. */
export function mergeConfig(file: ConfigFile, base: BridgeConfig = DEFAULT_CONFIG): BridgeConfig {
  return {
    video: { ...base.video, ...file.video },
    audio: { ...base.audio, ...file.audio },
    supervision: { ...base.supervision, ...file.supervision },
    tools: { ...base.tools, ...file.tools },
    logging: { ...base.logging, ...file.logging },
  };
}

/**
 * Validate raw (already YAML-parsed) config data.
 *
 * @throws ConfigError naming every offending path.
 */
export function parseConfigFile(raw: unknown, source = CONFIG_FILENAME): ConfigFile {
  if (raw === null || raw === undefined) {
    return {};
  }
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration in ${source}: ${problems}`, result.error);
  }
  return result.data;
}

/**
 * Load config.yaml from the state directory and merge it over the defaults.
 * A missing file yields the defaults.
 */
export function loadConfig(stateDir: string = resolveStateDir()): BridgeConfig {
  const configPath = resolveConfigPath(stateDir);
  if (!fs.existsSync(configPath)) {
    return mergeConfig({});
  }
  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(configPath, "utf-8"));
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read ${configPath}: ${msg}`, error);
  }
  return mergeConfig(parseConfigFile(raw, configPath));
}

// ---------------------------------------------------------------------------
// CLI overrides
// ---------------------------------------------------------------------------

export interface ConfigOverrides {
  camera?: string;
  resolution?: string;
  fps?: string;
  mic?: string;
  logLevel?: string;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Apply CLI flag values on top of a resolved config.
 *
 * @throws ConfigError for malformed values.
 */
export function applyOverrides(config: BridgeConfig, overrides: ConfigOverrides): BridgeConfig {
  const video = { ...config.video };
  const audio = { ...config.audio };
  const logging = { ...config.logging };

  if (overrides.camera !== undefined) {
    video.camera = overrides.camera;
  }
  if (overrides.resolution !== undefined) {
    if (!RESOLUTION_PATTERN.test(overrides.resolution)) {
      throw new ConfigError(`Invalid --resolution '${overrides.resolution}': expected WxH`);
    }
    video.resolution = overrides.resolution;
  }
  if (overrides.fps !== undefined) {
    const fps = Number(overrides.fps);
    if (!Number.isInteger(fps) || fps <= 0) {
      throw new ConfigError(`Invalid --fps '${overrides.fps}': expected a positive integer`);
    }
    video.fps = fps;
  }
  if (overrides.mic !== undefined) {
    audio.micSource = overrides.mic;
  }
  if (overrides.logLevel !== undefined) {
    if (!isLogLevel(overrides.logLevel)) {
      throw new ConfigError(
        `Invalid --log-level '${overrides.logLevel}': expected one of ${LOG_LEVELS.join(", ")}`,
      );
    }
    logging.level = overrides.logLevel;
  }

  return { ...config, video, audio, logging };
}
