/**
 * Virtual microphone: a named pipe read by an audio-server pipe-source module.
 *
 * Handles are written into the shared resources record as soon as each one
 * exists, so cleanup covers a setup that fails halfway.
 */
import fs from "node:fs";
import type { AudioConfig } from "../config/index.js";
import type { Logger } from "../shared/logger.js";
import type { ExternalResources } from "../shared/types.js";
import { runHostCommand } from "./exec.js";

export const PIPE_SOURCE_FORMAT = {
  channels: 2,
  format: "s16le",
  rate: 48_000,
} as const;

export function buildLoadModuleArgs(audio: AudioConfig): string[] {
  return [
    "load-module",
    "module-pipe-source",
    `source_name=${audio.sourceName}`,
    `channels=${PIPE_SOURCE_FORMAT.channels}`,
    `format=${PIPE_SOURCE_FORMAT.format}`,
    `rate=${PIPE_SOURCE_FORMAT.rate}`,
    `file=${audio.pipePath}`,
  ];
}

/**
 * Create the pipe and load the pipe-source module.
 * Returns whether the virtual microphone is ready.
 */
export function setupVirtualMic(
  audio: AudioConfig,
  pactl: string,
  resources: ExternalResources,
  logger: Logger,
): boolean {
  logger.info(`Setting up virtual mic: ${audio.sourceName}`);

  try {
    fs.rmSync(audio.pipePath, { force: true });
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to remove stale pipe ${audio.pipePath}: ${msg}`);
    return false;
  }

  const fifo = runHostCommand("mkfifo", [audio.pipePath]);
  if (!fifo.success) {
    logger.error(`Failed to create pipe: ${fifo.error ?? "unknown error"}`);
    return false;
  }
  resources.pipePath = audio.pipePath;

  const load = runHostCommand(pactl, buildLoadModuleArgs(audio));
  const moduleId = load.stdout.trim();
  if (!load.success || !moduleId) {
    logger.error(`Failed to load audio module: ${load.error ?? "no module id returned"}`);
    return false;
  }
  resources.audioModuleId = moduleId;
  logger.debug(`Audio module loaded with id ${moduleId}`);
  return true;
}

export function isAudioBridgeReady(resources: ExternalResources): boolean {
  return (
    resources.audioModuleId !== null &&
    resources.pipePath !== null &&
    fs.existsSync(resources.pipePath)
  );
}
