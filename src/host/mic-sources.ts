/**
 * Microphone sources the capture tool can record from.
 */

export interface MicSource {
  id: string;
  description: string;
}

export const MIC_SOURCES: readonly MicSource[] = [
  { id: "mic", description: "Standard microphone" },
  { id: "mic-unprocessed", description: "Unprocessed (raw) microphone" },
  { id: "mic-camcorder", description: "Microphone tuned for video recording" },
  { id: "mic-voice-recognition", description: "Microphone tuned for voice recognition" },
  { id: "mic-voice-communication", description: "Microphone tuned for voice calls" },
];

export const DEFAULT_MIC_SOURCE = "mic-camcorder";

export function isMicSource(id: string): boolean {
  return MIC_SOURCES.some((source) => source.id === id);
}
