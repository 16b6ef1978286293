import { describe, it, expect } from "vitest";
import { mixdown } from "./mixdown";
import { resample } from "./resample";
import { toWaveform, sliceWaveform } from "./waveform";
import { fft, ifft, computeMagnitudes } from "./fft";
import { computeRms, checkAudio } from "./guards";

describe("mixdown", () => {
  it("averages channels", () => {
    const mono = mixdown([new Float32Array([1, 0.5]), new Float32Array([0, -0.5])]);
    expect(Array.from(mono)).toEqual([0.5, 0]);
  });

  it("copies a single channel", () => {
    const channel = new Float32Array([0.25]);
    const mono = mixdown([channel]);
    expect(mono).not.toBe(channel);
    expect(Array.from(mono)).toEqual([0.25]);
  });
});

describe("resample", () => {
  it("interpolates linearly when upsampling", () => {
    expect(Array.from(resample(new Float32Array([0, 1]), 8000, 16000))).toEqual([0, 0.5, 1, 1]);
  });

  it("keeps every other sample when halving the rate", () => {
    expect(Array.from(resample(new Float32Array([0, 0.5, 1, 0.5]), 32000, 16000))).toEqual([0, 1]);
  });

  it("returns a copy when the rates match", () => {
    const input = new Float32Array([0.1, 0.2]);
    const output = resample(input, 16000, 16000);
    expect(output).not.toBe(input);
    expect(output).toEqual(input);
  });
});

describe("toWaveform", () => {
  it("mixes down, resamples and reports the duration", () => {
    const waveform = toWaveform({
      sampleRate: 8000,
      channels: [new Float32Array(8000), new Float32Array(8000)],
    });
    expect(waveform.sampleRate).toBe(16000);
    expect(waveform.samples).toHaveLength(16000);
    expect(waveform.duration).toBe(1);
  });

  it("slices by seconds", () => {
    const samples = new Float32Array(100).map((_, i) => i);
    const slice = sliceWaveform({ samples, sampleRate: 10, duration: 10 }, 1, 2.5);
    expect(Array.from(slice)).toEqual([10, 11, 12, 13, 14, 15, 16, 17, 18, 19, 20, 21, 22, 23, 24]);
  });
});

describe("fft", () => {
  it("transforms an impulse into a flat spectrum", () => {
    const real = new Float64Array([1, 0, 0, 0]);
    const imag = new Float64Array(4);
    fft(real, imag);
    expect(Array.from(real)).toEqual([1, 1, 1, 1]);
    expect(Array.from(imag).map((v) => Math.abs(v))).toEqual([0, 0, 0, 0]);
  });

  it("round-trips through the inverse transform", () => {
    const input = [0.5, -0.25, 1, 0, 0.75, -1, 0.125, 0.3];
    const real = new Float64Array(input);
    const imag = new Float64Array(8);
    fft(real, imag);
    ifft(real, imag);
    input.forEach((value, i) => expect(real[i]).toBeCloseTo(value, 10));
  });

  it("puts a cosine at its bin", () => {
    const frame = new Float64Array(8).map((_, i) => Math.cos((2 * Math.PI * i) / 8));
    const magnitudes = computeMagnitudes(frame);
    expect(magnitudes).toHaveLength(5);
    expect(magnitudes[1]).toBeCloseTo(4, 10);
    expect(magnitudes[0]).toBeCloseTo(0, 10);
    expect(magnitudes[2]).toBeCloseTo(0, 10);
  });

  it("rejects sizes that are not a power of two", () => {
    expect(() => fft(new Float64Array(6), new Float64Array(6))).toThrow("power of 2");
  });
});

describe("audio guards", () => {
  const waveformOf = (samples: Float32Array) => ({
    samples,
    sampleRate: 16000,
    duration: samples.length / 16000,
  });

  it("computes RMS over a range", () => {
    expect(computeRms([3, 4, 0, 0], 0, 2)).toBeCloseTo(Math.sqrt(12.5), 10);
    expect(computeRms([])).toBe(0);
  });

  it("flags audio shorter than the minimum length first", () => {
    const check = checkAudio(waveformOf(new Float32Array(8000)));
    expect(check).toEqual({ ok: false, reason: "too_short", rms: 0 });
  });

  it("flags silent audio", () => {
    const check = checkAudio(waveformOf(new Float32Array(32000)));
    expect(check).toEqual({ ok: false, reason: "too_quiet", rms: 0 });
  });

  it("accepts audible audio with custom thresholds", () => {
    const check = checkAudio(waveformOf(new Float32Array(8000).fill(0.5)), {
      minAudioLength: 0.25,
      silenceRmsThreshold: 0.1,
    });
    expect(check.ok).toBe(true);
    expect(check.rms).toBeCloseTo(0.5, 6);
  });
});
