/**
 * `droidbridge start`: probe the phone, resolve capture settings, acquire the
 * host resources and hand over to the supervision loop.
 *
 * The probe phase acquires nothing, so it can fail with a plain exit status.
 * From the first acquired resource on, every exit goes through the loop's
 * cleanup: a setup step that fails shows up as a failed precondition.
 */
import { confirm, isCancel } from "@clack/prompts";
import {
  applyOverrides,
  initStateDir,
  loadConfig,
  type BridgeConfig,
  type ConfigOverrides,
} from "../config/index.js";
import { listAdbDevices } from "../host/adb.js";
import { queryCameras, resolveCaptureSettings } from "../host/cameras.js";
import { buildAudioCommand, buildVideoCommand } from "../host/capture-commands.js";
import { ensureLoopback, isLoopbackLoaded } from "../host/loopback.js";
import { isAudioBridgeReady, setupVirtualMic } from "../host/virtual-mic.js";
import { createLogger, type Logger } from "../shared/logger.js";
import { registerShutdownHook } from "../shared/shutdown-hooks.js";
import type { CameraInfo, CaptureSettings } from "../shared/types.js";
import { createSupervisionContext } from "../supervision/context.js";
import { SupervisionLoop } from "../supervision/supervision-loop.js";
import type { Precondition, RunOutcome } from "../supervision/types.js";

export interface StartOptions extends ConfigOverrides {
  /** Skip the confirmation prompt. */
  yes?: boolean;
}

export interface BridgeSession {
  config: BridgeConfig;
  logger: Logger;
}

/** Load config.yaml, apply CLI overrides and build the run's logger. */
export function openSession(overrides: ConfigOverrides, stateDir?: string): BridgeSession {
  const state = initStateDir(stateDir);
  const config = applyOverrides(loadConfig(state.stateDir), overrides);
  const logger = createLogger(
    { component: "droidbridge" },
    { level: config.logging.level, logDir: state.logDir },
  );
  return { config, logger };
}

type ProbeResult = { ok: true; settings: CaptureSettings; cameras: CameraInfo[] } | { ok: false };

function probe(config: BridgeConfig, logger: Logger): ProbeResult {
  logger.info("Checking for connected ADB devices...");
  const devices = listAdbDevices(config.tools.adb, logger);
  if (devices.length === 0) {
    logger.error("No ADB devices found in 'device' state");
    logger.info(
      "Make sure the phone is connected, USB debugging is enabled and this computer is authorized.",
    );
    return { ok: false };
  }
  logger.info(`Found ADB device(s): ${devices.join(", ")}`);

  const query = queryCameras(config.tools.scrcpy, logger);
  if (!query.ok) {
    logger.error(query.message);
    return { ok: false };
  }
  if (query.cameras.length === 0) {
    logger.warn("No cameras reported by the device, using default capture settings");
  }

  const settings = resolveCaptureSettings(query.cameras, {
    camera: config.video.camera,
    resolution: config.video.resolution,
    fps: config.video.fps,
    micSource: config.audio.micSource,
  });
  return { ok: true, settings, cameras: query.cameras };
}

function describeSettings(
  settings: CaptureSettings,
  cameras: readonly CameraInfo[],
  config: BridgeConfig,
): string[] {
  const facing = cameras.find((c) => c.id === settings.cameraId)?.facing;
  return [
    `Camera: ${settings.cameraId}${facing ? ` (${facing})` : ""}`,
    `Resolution: ${settings.resolution} @ ${settings.fps} fps`,
    `Microphone: ${settings.micSource}`,
    `Video device: ${config.video.device} ('${config.video.cardLabel}')`,
    `Virtual microphone: ${config.audio.sourceName}`,
  ];
}

/**
 * Run the bridge until interrupted, disconnected or every capture process is
 * gone. Resolves with the process exit status.
 *
 * @throws ConfigError for an invalid config file, override or capture request.
 */
export async function startBridge(options: StartOptions = {}, stateDir?: string): Promise<number> {
  const { config, logger } = openSession(options, stateDir);
  const setupLogger = logger.child({ component: "setup" });

  const probed = probe(config, setupLogger);
  if (!probed.ok) return 1;
  const { settings, cameras } = probed;

  for (const line of describeSettings(settings, cameras, config)) {
    logger.info(line);
  }

  if (!options.yes) {
    const answer = await confirm({ message: "Start the bridge with these settings?" });
    if (isCancel(answer) || !answer) {
      logger.info("Cancelled.");
      return 0;
    }
  }

  const context = createSupervisionContext(config, logger);
  const preconditions: Precondition[] = [
    {
      name: "device reachable",
      check: () => listAdbDevices(config.tools.adb, setupLogger).length > 0,
    },
    { name: "video loopback loaded", check: () => isLoopbackLoaded() },
    { name: "audio bridge ready", check: () => isAudioBridgeReady(context.resources) },
  ];
  const loop = new SupervisionLoop(context, {
    launches: [
      { name: "video", argv: buildVideoCommand(config.tools.scrcpy, settings, config.video) },
      { name: "audio", argv: buildAudioCommand(config.tools.scrcpy, settings, config.audio) },
    ],
    preconditions,
    onStateChange: (_from, to) => {
      if (to === "RUNNING") {
        logger.info(
          `Camera is available at ${config.video.device} (select '${config.video.cardLabel}' in video apps)`,
        );
        logger.info(`Phone microphone is available as '${config.audio.sourceName}'`);
      }
    },
  });

  const onSignal = (signal: NodeJS.Signals): void => {
    loop.interrupt(signal);
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  const unregister = registerShutdownHook(() => loop.cleanup.cleanup());

  let outcome: RunOutcome;
  try {
    ensureLoopback(config.video, setupLogger);
    setupVirtualMic(config.audio, config.tools.pactl, context.resources, setupLogger);
    outcome = await loop.run();
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    unregister();
  }

  logger.info(outcome.exitCode === 0 ? "Bridge stopped." : "Bridge stopped after a failure.");
  return outcome.exitCode;
}
