import { describe, it, expect } from "vitest";
import { computeRtf, describeRtf } from "./rtf";

describe("computeRtf", () => {
  it("divides processing time by audio length with 4 decimals", () => {
    expect(computeRtf(5, 10)).toBe(0.5);
    expect(computeRtf(1, 3)).toBe(0.3333);
  });

  it("returns 0 when the audio length is unknown or not positive", () => {
    expect(computeRtf(1, 0)).toBe(0);
    expect(computeRtf(1, -2)).toBe(0);
    expect(computeRtf(1, null)).toBe(0);
    expect(computeRtf(1, undefined)).toBe(0);
  });
});

describe("describeRtf", () => {
  it("describes faster and slower than real time", () => {
    expect(describeRtf(0.5)).toBe("2.00x faster than real time");
    expect(describeRtf(1)).toBe("1.00x faster than real time");
    expect(describeRtf(2.5)).toBe("2.50x slower than real time");
  });

  it("reports an unavailable RTF", () => {
    expect(describeRtf(0)).toBe("RTF unavailable");
  });
});
