/**
 * CLI program definition for droidbridge.
 *
 * Uses Commander to define the command structure. Each action sets
 * process.exitCode from the command's result instead of exiting, so cleanup
 * and pending log writes finish first.
 */
import { Command } from "commander";
import { listCameras, listDevices, listMics, openSession, startBridge } from "../bridge/index.js";
import type { StartOptions } from "../bridge/index.js";
import { ConfigError } from "../shared/errors.js";
import { VERSION } from "../version.js";

export interface StartCommandOptions {
  camera?: string;
  resolution?: string;
  fps?: string;
  mic?: string;
  yes?: boolean;
  logLevel?: string;
}

/**
 * Run a command body and turn its result into an exit status.
 * Configuration problems are reported without a stack trace.
 */
async function runCommand(body: () => number | Promise<number>): Promise<void> {
  try {
    process.exitCode = await body();
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      console.error(`[droidbridge] ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("droidbridge")
    .description("Use an Android phone as a webcam and microphone over adb")
    .version(VERSION);

  program
    .command("start")
    .description("Bridge the phone's camera and microphone until stopped or disconnected")
    .option("--camera <id>", "camera id (default: 0)")
    .option("--resolution <WxH>", "capture size, e.g. 1280x720 (default: 1920x1080 if supported)")
    .option("--fps <n>", "frame rate (default: highest supported)")
    .option("--mic <source>", "microphone source (see `droidbridge mics`)")
    .option("-y, --yes", "start without asking for confirmation")
    .option("--log-level <level>", "fatal, error, warn, info, debug or trace")
    .action(async (opts: StartCommandOptions) => {
      const options: StartOptions = opts;
      await runCommand(() => startBridge(options));
    });

  program
    .command("devices")
    .description("List phones reachable over adb")
    .action(async () => {
      await runCommand(() => {
        const { config, logger } = openSession({});
        return listDevices(config, logger.child({ component: "adb" }));
      });
    });

  program
    .command("cameras")
    .description("List the phone's cameras with their sizes and frame rates")
    .action(async () => {
      await runCommand(() => {
        const { config, logger } = openSession({});
        return listCameras(config, logger.child({ component: "scrcpy" }));
      });
    });

  program
    .command("mics")
    .description("List microphone sources")
    .action(async () => {
      await runCommand(() => listMics());
    });

  return program;
}
