import { fft, ifft } from "./fft";
import { hannWindow } from "./window";

export interface NoiseReductionOptions {
  fftSize?: number;
  hopSize?: number;
  /** Standard deviations above the noise mean (dB) a bin must reach to be kept */
  nStdThreshold?: number;
  /** Fraction of the quietest frames used as the noise profile */
  noiseFrameRatio?: number;
  /** 1 removes gated bins entirely, 0 leaves the signal untouched */
  propDecrease?: number;
  /** Frames in the moving average applied to the mask over time */
  smoothingFrames?: number;
}

const EPSILON = 1e-10;

interface Frame {
  real: Float64Array;
  imag: Float64Array;
  mask: Float64Array;
}

function reflectPad(samples: Float32Array, pad: number, total: number): Float64Array {
  const padded = new Float64Array(total);
  const n = samples.length;
  for (let i = 0; i < total; i++) {
    let source = i - pad;
    if (source < 0) source = -source;
    if (source >= n) source = 2 * (n - 1) - source;
    padded[i] = source >= 0 && source < n ? samples[source] : 0;
  }
  return padded;
}

/**
 * Stationary spectral gating: bins that stay under a per-frequency noise
 * threshold are attenuated, the rest pass through. The noise profile is
 * estimated from the quietest frames of the input itself.
 */
export function reduceNoise(
  samples: Float32Array,
  sampleRate: number,
  options: NoiseReductionOptions = {}
): Float32Array {
  const fftSize = options.fftSize ?? 1024;
  const hop = options.hopSize ?? fftSize / 4;
  const nStd = options.nStdThreshold ?? 1.5;
  const noiseRatio = options.noiseFrameRatio ?? 0.2;
  const propDecrease = options.propDecrease ?? 1.0;
  const smoothing = Math.max(1, Math.floor(options.smoothingFrames ?? 3));

  if (sampleRate <= 0) {
    throw new Error(`Invalid sample rate: ${sampleRate}`);
  }
  if (samples.length < fftSize) {
    return samples.slice();
  }

  const bins = fftSize / 2 + 1;
  const window = hannWindow(fftSize);
  const pad = fftSize / 2;
  const frameCount = Math.ceil((samples.length + 2 * pad - fftSize) / hop) + 1;
  const paddedLength = (frameCount - 1) * hop + fftSize;
  const padded = reflectPad(samples, pad, paddedLength);

  const spectrum = (index: number) => {
    const real = new Float64Array(fftSize);
    const imag = new Float64Array(fftSize);
    const offset = index * hop;
    for (let i = 0; i < fftSize; i++) {
      real[i] = padded[offset + i] * window[i];
    }
    fft(real, imag);
    return { real, imag };
  };

  const toDb = (real: Float64Array, imag: Float64Array, k: number) =>
    20 * Math.log10(Math.sqrt(real[k] * real[k] + imag[k] * imag[k]) + EPSILON);

  // noise profile from the quietest frames
  const energies: { index: number; energy: number }[] = [];
  for (let t = 0; t < frameCount; t++) {
    const offset = t * hop;
    let energy = 0;
    for (let i = 0; i < fftSize; i++) {
      const v = padded[offset + i] * window[i];
      energy += v * v;
    }
    energies.push({ index: t, energy });
  }
  energies.sort((a, b) => a.energy - b.energy);
  const noiseFrames = energies.slice(0, Math.max(1, Math.ceil(frameCount * noiseRatio)));

  const sum = new Float64Array(bins);
  const sumSq = new Float64Array(bins);
  for (const { index } of noiseFrames) {
    const { real, imag } = spectrum(index);
    for (let k = 0; k < bins; k++) {
      const db = toDb(real, imag, k);
      sum[k] += db;
      sumSq[k] += db * db;
    }
  }
  const threshold = new Float64Array(bins);
  for (let k = 0; k < bins; k++) {
    const mean = sum[k] / noiseFrames.length;
    const variance = Math.max(0, sumSq[k] / noiseFrames.length - mean * mean);
    threshold[k] = mean + nStd * Math.sqrt(variance);
  }

  const analyze = (index: number): Frame => {
    const { real, imag } = spectrum(index);
    const mask = new Float64Array(bins);
    for (let k = 0; k < bins; k++) {
      mask[k] = toDb(real, imag, k) >= threshold[k] ? 1 : 0;
    }
    return { real, imag, mask };
  };

  const output = new Float64Array(paddedLength);
  const norm = new Float64Array(paddedLength);
  const before = Math.floor((smoothing - 1) / 2);
  const after = smoothing - 1 - before;
  const cache = new Map<number, Frame>();
  const frameAt = (index: number): Frame => {
    let frame = cache.get(index);
    if (!frame) {
      frame = analyze(index);
      cache.set(index, frame);
    }
    return frame;
  };

  for (let t = 0; t < frameCount; t++) {
    const from = Math.max(0, t - before);
    const to = Math.min(frameCount - 1, t + after);
    const span = to - from + 1;
    const gain = new Float64Array(bins);
    for (let u = from; u <= to; u++) {
      const { mask } = frameAt(u);
      for (let k = 0; k < bins; k++) gain[k] += mask[k] / span;
    }
    for (let k = 0; k < bins; k++) {
      gain[k] = 1 - propDecrease * (1 - gain[k]);
    }

    const { real, imag } = frameAt(t);
    for (let k = 0; k < bins; k++) {
      real[k] *= gain[k];
      imag[k] *= gain[k];
      // keep the spectrum Hermitian so the inverse stays real
      if (k > 0 && k < fftSize / 2) {
        real[fftSize - k] *= gain[k];
        imag[fftSize - k] *= gain[k];
      }
    }
    ifft(real, imag);

    const offset = t * hop;
    for (let i = 0; i < fftSize; i++) {
      output[offset + i] += real[i] * window[i];
      norm[offset + i] += window[i] * window[i];
    }
    cache.delete(t - before);
  }

  const result = new Float32Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    const n = norm[i + pad];
    result[i] = n > 1e-8 ? output[i + pad] / n : 0;
  }
  return result;
}
