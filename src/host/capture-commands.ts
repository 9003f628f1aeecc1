/**
 * Argument vectors for the two capture processes.
 *
 * Video and audio use distinct transport ports so the two sessions do not
 * contend for the same one.
 */
import type { AudioConfig, VideoConfig } from "../config/index.js";
import type { CaptureSettings } from "../shared/types.js";

export function buildVideoCommand(
  scrcpy: string,
  settings: CaptureSettings,
  video: VideoConfig,
): string[] {
  return [
    scrcpy,
    "--video-source=camera",
    `--camera-id=${settings.cameraId}`,
    "--no-audio",
    `--v4l2-sink=${video.device}`,
    `--camera-size=${settings.resolution}`,
    `--camera-fps=${settings.fps}`,
    "--port",
    String(video.port),
    "--no-window",
  ];
}

export function buildAudioCommand(
  scrcpy: string,
  settings: CaptureSettings,
  audio: AudioConfig,
): string[] {
  return [
    scrcpy,
    "--no-video",
    "--no-playback",
    `--audio-source=${settings.micSource}`,
    "--audio-codec=raw",
    "--no-window",
    `--record=${audio.pipePath}`,
    "--port",
    String(audio.port),
    "--record-format=wav",
  ];
}
