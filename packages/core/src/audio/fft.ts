function assertPowerOfTwo(size: number): void {
  const exponent = Math.floor(Math.log(size) / Math.LN2);
  if (size < 2 || 2 ** exponent !== size) {
    throw new Error("Invalid array size, must be a power of 2.");
  }
}

function bitReverse(real: Float64Array, imag: Float64Array): void {
  const size = real.length;
  let j = 0;
  for (let i = 0; i < size - 1; i++) {
    if (i < j) {
      let tmp = real[i];
      real[i] = real[j];
      real[j] = tmp;
      tmp = imag[i];
      imag[i] = imag[j];
      imag[j] = tmp;
    }
    let k = size >>> 1;
    while (k <= j) {
      j -= k;
      k >>>= 1;
    }
    j += k;
  }
}

function transform(real: Float64Array, imag: Float64Array, sign: 1 | -1): void {
  const size = real.length;
  assertPowerOfTwo(size);
  if (imag.length !== size) {
    throw new Error("Real and imaginary parts must have the same length.");
  }

  bitReverse(real, imag);

  for (let step = 2; step <= size; step <<= 1) {
    const half = step >>> 1;
    const theta = (sign * -2 * Math.PI) / step;
    const wReal = Math.cos(theta);
    const wImag = Math.sin(theta);
    for (let start = 0; start < size; start += step) {
      let curReal = 1;
      let curImag = 0;
      for (let k = 0; k < half; k++) {
        const a = start + k;
        const b = a + half;
        const tReal = real[b] * curReal - imag[b] * curImag;
        const tImag = real[b] * curImag + imag[b] * curReal;
        real[b] = real[a] - tReal;
        imag[b] = imag[a] - tImag;
        real[a] += tReal;
        imag[a] += tImag;
        const nextReal = curReal * wReal - curImag * wImag;
        curImag = curReal * wImag + curImag * wReal;
        curReal = nextReal;
      }
    }
  }
}

/** In-place forward FFT. */
export function fft(real: Float64Array, imag: Float64Array): void {
  transform(real, imag, 1);
}

/** In-place inverse FFT, scaled by 1/N. */
export function ifft(real: Float64Array, imag: Float64Array): void {
  transform(real, imag, -1);
  const scale = 1 / real.length;
  for (let i = 0; i < real.length; i++) {
    real[i] *= scale;
    imag[i] *= scale;
  }
}

/** Magnitudes of bins 0..N/2 of a real frame. */
export function computeMagnitudes(frame: Float64Array): Float64Array {
  const real = frame.slice();
  const imag = new Float64Array(frame.length);
  fft(real, imag);
  const bins = (frame.length >>> 1) + 1;
  const result = new Float64Array(bins);
  for (let i = 0; i < bins; i++) {
    result[i] = Math.sqrt(real[i] * real[i] + imag[i] * imag[i]);
  }
  return result;
}
