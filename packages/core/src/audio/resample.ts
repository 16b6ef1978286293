/**
 * Linear-interpolation resampler. Output length is
 * `round(samples.length * toRate / fromRate)`.
 */
export function resample(samples: Float32Array, fromRate: number, toRate: number): Float32Array {
  if (fromRate <= 0 || toRate <= 0) {
    throw new Error(`Invalid sample rate: ${fromRate} -> ${toRate}`);
  }
  if (fromRate === toRate) {
    return samples.slice();
  }

  const outLength = Math.round((samples.length * toRate) / fromRate);
  const output = new Float32Array(outLength);
  if (samples.length === 0) return output;

  const ratio = fromRate / toRate;
  const last = samples.length - 1;
  for (let i = 0; i < outLength; i++) {
    const position = i * ratio;
    const index = Math.floor(position);
    if (index >= last) {
      output[i] = samples[last];
      continue;
    }
    const frac = position - index;
    output[i] = samples[index] + (samples[index + 1] - samples[index]) * frac;
  }
  return output;
}
