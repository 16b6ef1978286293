import { computeMagnitudes } from "../audio/fft";
import { hannWindow } from "../audio/window";

export const EMBEDDING_FRAME_SIZE = 512;
const HOP_SIZE = 256;
const BAND_COUNT = 24;
const MIN_FREQUENCY = 80;
const MAX_FREQUENCY = 7600;

/** Bin ranges [from, to) for log-spaced bands between 80 Hz and min(7600, Nyquist). */
function bandEdges(sampleRate: number): Array<[number, number]> {
  const bins = EMBEDDING_FRAME_SIZE / 2 + 1;
  const binHz = sampleRate / EMBEDDING_FRAME_SIZE;
  const top = Math.min(MAX_FREQUENCY, sampleRate / 2);
  const ratio = Math.log(top / MIN_FREQUENCY);

  const edges: Array<[number, number]> = [];
  for (let b = 0; b < BAND_COUNT; b++) {
    const lowHz = MIN_FREQUENCY * Math.exp((ratio * b) / BAND_COUNT);
    const highHz = MIN_FREQUENCY * Math.exp((ratio * (b + 1)) / BAND_COUNT);
    const from = Math.min(bins - 1, Math.floor(lowHz / binHz));
    const to = Math.min(bins, Math.max(from + 1, Math.ceil(highHz / binHz)));
    edges.push([from, to]);
  }
  return edges;
}

/**
 * Spectral voice fingerprint of an audio slice: mean and standard
 * deviation of log band energies over all frames (48 values). The band
 * means are centered on their average so that loudness does not count.
 * Returns null when the slice is shorter than one frame.
 */
export function extractEmbedding(samples: Float32Array, sampleRate: number): Float64Array | null {
  if (samples.length < EMBEDDING_FRAME_SIZE) {
    return null;
  }

  const window = hannWindow(EMBEDDING_FRAME_SIZE);
  const edges = bandEdges(sampleRate);
  const sum = new Float64Array(BAND_COUNT);
  const sumSq = new Float64Array(BAND_COUNT);
  const frame = new Float64Array(EMBEDDING_FRAME_SIZE);
  let frames = 0;

  for (let start = 0; start + EMBEDDING_FRAME_SIZE <= samples.length; start += HOP_SIZE) {
    for (let i = 0; i < EMBEDDING_FRAME_SIZE; i++) {
      frame[i] = samples[start + i] * window[i];
    }
    const magnitudes = computeMagnitudes(frame);
    edges.forEach(([from, to], band) => {
      let energy = 0;
      for (let k = from; k < to; k++) {
        energy += magnitudes[k] * magnitudes[k];
      }
      const value = Math.log(energy / (to - from) + 1e-10);
      sum[band] += value;
      sumSq[band] += value * value;
    });
    frames++;
  }

  const embedding = new Float64Array(BAND_COUNT * 2);
  let level = 0;
  for (let band = 0; band < BAND_COUNT; band++) {
    const mean = sum[band] / frames;
    embedding[band] = mean;
    embedding[BAND_COUNT + band] = Math.sqrt(Math.max(0, sumSq[band] / frames - mean * mean));
    level += mean / BAND_COUNT;
  }
  for (let band = 0; band < BAND_COUNT; band++) {
    embedding[band] -= level;
  }
  return embedding;
}
