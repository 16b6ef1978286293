import { computeRms } from "../audio/guards";
import type { Waveform } from "../types/audio";
import type { QualityMetrics } from "../types/metrics";
import type { Segment } from "../types/transcription";

export const LOW_CONFIDENCE_THRESHOLD = 0.7;
const SILENCE_FRAME_RMS = 0.01;
const FRAME_LENGTH = 2048;
const HOP_LENGTH = 512;
const CLIPPING_LEVEL = 0.99;
const CLIPPING_RATIO = 0.001;

export interface QualityInput {
  segments: Segment[];
  text: string;
  waveform?: Waveform;
}

function confidenceStats(segments: Segment[]) {
  const confidences = segments.flatMap((s) => (s.confidence === undefined ? [] : [s.confidence]));
  if (confidences.length === 0) {
    return { avgConfidence: 0, minConfidence: 0, lowConfidenceRatio: 1 };
  }
  const total = confidences.reduce((acc, c) => acc + c, 0);
  const low = confidences.filter((c) => c < LOW_CONFIDENCE_THRESHOLD).length;
  return {
    avgConfidence: total / confidences.length,
    minConfidence: Math.min(...confidences),
    lowConfidenceRatio: low / confidences.length,
  };
}

function audioStats(samples: Float32Array) {
  if (samples.length === 0) {
    return { silenceRatio: 0, audioRmsEnergy: 0, clippingDetected: false };
  }

  let frames = 0;
  let silent = 0;
  const lastStart = Math.max(0, samples.length - FRAME_LENGTH);
  for (let start = 0; start <= lastStart; start += HOP_LENGTH) {
    frames++;
    if (computeRms(samples, start, Math.min(samples.length, start + FRAME_LENGTH)) < SILENCE_FRAME_RMS) {
      silent++;
    }
  }

  let clipped = 0;
  for (let i = 0; i < samples.length; i++) {
    if (Math.abs(samples[i]) > CLIPPING_LEVEL) clipped++;
  }

  return {
    silenceRatio: silent / frames,
    audioRmsEnergy: computeRms(samples),
    clippingDetected: clipped > samples.length * CLIPPING_RATIO,
  };
}

/** Reference-free health indicators for a finished transcription. */
export function computeQualityMetrics(input: QualityInput): QualityMetrics {
  const trimmed = input.text.trim();
  return {
    ...confidenceStats(input.segments),
    ...(input.waveform
      ? audioStats(input.waveform.samples)
      : { silenceRatio: 0, audioRmsEnergy: 0, clippingDetected: false }),
    wordCount: trimmed === "" ? 0 : trimmed.split(/\s+/).length,
  };
}
