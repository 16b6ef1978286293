import { describe, it, expect } from "vitest";
import { reduceNoise } from "./noise-reduction";
import { computeRms } from "./guards";

const SAMPLE_RATE = 16000;

function seededNoise(length: number, amplitude: number, seed = 7): Float32Array {
  const out = new Float32Array(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (state * 1664525 + 1013904223) >>> 0;
    out[i] = ((state / 4294967296) * 2 - 1) * amplitude;
  }
  return out;
}

describe("reduceNoise", () => {
  const noise = seededNoise(2 * SAMPLE_RATE, 0.05);
  const input = noise.map((value, i) =>
    i < SAMPLE_RATE ? value : value + 0.5 * Math.sin((2 * Math.PI * 1000 * i) / SAMPLE_RATE)
  );
  const output = reduceNoise(input, SAMPLE_RATE);

  it("keeps the input length", () => {
    expect(output).toHaveLength(input.length);
  });

  it("attenuates a noise-only stretch", () => {
    expect(computeRms(output, 2000, 14000)).toBeLessThan(0.5 * computeRms(input, 2000, 14000));
  });

  it("preserves a tone well above the noise floor", () => {
    expect(computeRms(output, 18000, 30000)).toBeGreaterThan(0.8 * computeRms(input, 18000, 30000));
  });

  it("passes everything through when nothing is decreased", () => {
    const untouched = reduceNoise(input, SAMPLE_RATE, { propDecrease: 0 });
    for (const i of [0, 511, 16000, 31999]) {
      expect(untouched[i]).toBeCloseTo(input[i], 5);
    }
  });

  it("returns a copy of input shorter than one frame", () => {
    const short = new Float32Array([0.1, 0.2, 0.3]);
    const result = reduceNoise(short, SAMPLE_RATE);
    expect(result).not.toBe(short);
    expect(result).toEqual(short);
  });
});
