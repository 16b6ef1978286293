import type { SkippedReason } from "../types/transcription";
import type { Waveform } from "../types/audio";

export const DEFAULT_MIN_AUDIO_LENGTH = 1.0;
export const DEFAULT_SILENCE_RMS_THRESHOLD = 0.01;

export interface AudioGuardOptions {
  /** Seconds */
  minAudioLength?: number;
  silenceRmsThreshold?: number;
}

export type AudioCheck =
  | { ok: true; rms: number }
  | { ok: false; reason: SkippedReason; rms: number };

export function computeRms(samples: ArrayLike<number>, start = 0, end = samples.length): number {
  const count = end - start;
  if (count <= 0) return 0;
  let sum = 0;
  for (let i = start; i < end; i++) {
    sum += samples[i] * samples[i];
  }
  return Math.sqrt(sum / count);
}

/** Rejects recordings that are too short or too quiet to transcribe. */
export function checkAudio(waveform: Waveform, options: AudioGuardOptions = {}): AudioCheck {
  const minAudioLength = options.minAudioLength ?? DEFAULT_MIN_AUDIO_LENGTH;
  const threshold = options.silenceRmsThreshold ?? DEFAULT_SILENCE_RMS_THRESHOLD;
  const rms = computeRms(waveform.samples);

  if (waveform.duration < minAudioLength) {
    return { ok: false, reason: "too_short", rms };
  }
  if (rms < threshold) {
    return { ok: false, reason: "too_quiet", rms };
  }
  return { ok: true, rms };
}
