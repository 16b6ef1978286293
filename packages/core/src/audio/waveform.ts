import { mixdown } from "./mixdown";
import { resample } from "./resample";
import type { DecodedAudio, Waveform } from "../types/audio";

export const TARGET_SAMPLE_RATE = 16000;

export function toWaveform(decoded: DecodedAudio, targetRate = TARGET_SAMPLE_RATE): Waveform {
  const mono = mixdown(decoded.channels);
  const samples = resample(mono, decoded.sampleRate, targetRate);
  return {
    samples,
    sampleRate: targetRate,
    duration: samples.length / targetRate,
  };
}

/** Copies the half-open sample range [start, end) seconds out of a waveform. */
export function sliceWaveform(waveform: Waveform, startSec: number, endSec: number): Float32Array {
  const start = Math.max(0, Math.floor(startSec * waveform.sampleRate));
  const end = Math.min(waveform.samples.length, Math.ceil(endSec * waveform.sampleRate));
  if (end <= start) return new Float32Array(0);
  return waveform.samples.slice(start, end);
}
