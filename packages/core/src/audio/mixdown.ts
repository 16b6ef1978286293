/** Averages all channels into one; a single channel is copied. */
export function mixdown(channels: Float32Array[]): Float32Array {
  if (channels.length === 0) {
    return new Float32Array(0);
  }
  if (channels.length < 2) {
    return channels[0].slice();
  }

  const length = Math.min(...channels.map((c) => c.length));
  const output = new Float32Array(length);
  for (const channel of channels) {
    for (let i = 0; i < length; i++) {
      output[i] += channel[i];
    }
  }
  const scale = 1 / channels.length;
  for (let i = 0; i < length; i++) {
    output[i] *= scale;
  }
  return output;
}
