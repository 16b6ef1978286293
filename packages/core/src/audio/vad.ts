import { computeRms } from "./guards";
import type { SpeechRegion } from "../types/audio";

export interface VadOptions {
  frameMs?: number;
  /** Fraction of the 95th-percentile frame RMS a frame must reach */
  threshold?: number;
  /** Absolute RMS floor under which a frame is never speech */
  minRms?: number;
  minSpeechMs?: number;
  minSilenceMs?: number;
  padMs?: number;
}

export interface VadResult {
  samples: Float32Array;
  regions: SpeechRegion[];
  /** Seconds */
  originalDuration: number;
  /** Seconds */
  speechDuration: number;
}

function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil(p * sorted.length) - 1));
  return sorted[index];
}

/** Energy-based speech detection; regions are sample ranges [start, end). */
export function detectSpeech(
  samples: Float32Array,
  sampleRate: number,
  options: VadOptions = {}
): SpeechRegion[] {
  const frameSize = Math.max(1, Math.round(((options.frameMs ?? 30) * sampleRate) / 1000));
  const threshold = options.threshold ?? 0.5;
  const minRms = options.minRms ?? 0.002;
  const minSpeech = Math.round(((options.minSpeechMs ?? 250) * sampleRate) / 1000);
  const minSilence = Math.round(((options.minSilenceMs ?? 100) * sampleRate) / 1000);
  const pad = Math.round(((options.padMs ?? 30) * sampleRate) / 1000);

  const frameRms: number[] = [];
  for (let start = 0; start < samples.length; start += frameSize) {
    frameRms.push(computeRms(samples, start, Math.min(samples.length, start + frameSize)));
  }
  const level = Math.max(minRms, threshold * percentile(frameRms, 0.95));

  let runs: SpeechRegion[] = [];
  let runStart = -1;
  frameRms.forEach((rms, index) => {
    const isSpeech = rms >= level;
    if (isSpeech && runStart < 0) {
      runStart = index * frameSize;
    } else if (!isSpeech && runStart >= 0) {
      runs.push({ start: runStart, end: index * frameSize });
      runStart = -1;
    }
  });
  if (runStart >= 0) {
    runs.push({ start: runStart, end: samples.length });
  }

  // close short pauses
  const merged: SpeechRegion[] = [];
  for (const run of runs) {
    const previous = merged[merged.length - 1];
    if (previous && run.start - previous.end < minSilence) {
      previous.end = run.end;
    } else {
      merged.push({ ...run });
    }
  }

  runs = merged.filter((run) => run.end - run.start >= minSpeech);

  const padded: SpeechRegion[] = [];
  for (const run of runs) {
    const region = {
      start: Math.max(0, run.start - pad),
      end: Math.min(samples.length, run.end + pad),
    };
    const previous = padded[padded.length - 1];
    if (previous && region.start <= previous.end) {
      previous.end = Math.max(previous.end, region.end);
    } else {
      padded.push(region);
    }
  }
  return padded;
}

/** Keeps only the detected speech; returns the input as-is when nothing is found. */
export function applyVad(
  samples: Float32Array,
  sampleRate: number,
  options: VadOptions = {}
): VadResult {
  const originalDuration = samples.length / sampleRate;
  const regions = detectSpeech(samples, sampleRate, options);
  if (regions.length === 0) {
    return { samples, regions: [], originalDuration, speechDuration: originalDuration };
  }

  const total = regions.reduce((acc, r) => acc + (r.end - r.start), 0);
  const output = new Float32Array(total);
  let offset = 0;
  for (const region of regions) {
    output.set(samples.subarray(region.start, region.end), offset);
    offset += region.end - region.start;
  }
  return {
    samples: output,
    regions,
    originalDuration,
    speechDuration: total / sampleRate,
  };
}
