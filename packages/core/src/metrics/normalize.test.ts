import { describe, it, expect } from "vitest";
import { normalizeTranscript } from "./normalize";

describe("normalizeTranscript", () => {
  it("spells digits in Korean and drops fillers and punctuation", () => {
    expect(normalizeTranscript("음 머리가 아파요. 3일 됐어요", { language: "ko" })).toBe(
      "머리가 아파요 삼일 됐어요"
    );
  });

  it("removes repeated Korean fillers only as whole words", () => {
    expect(normalizeTranscript("으음 음음 음식을 좀 먹었어요", { language: "ko" })).toBe("음식을 먹었어요");
  });

  it("handles English digits and hesitations", () => {
    expect(normalizeTranscript("Um, I have 2 kids!", { language: "en" })).toBe("i have two kids");
  });

  it("uses the base language of a regional tag", () => {
    expect(normalizeTranscript("Uhh 10 days", { language: "en-US" })).toBe("one zero days");
  });

  it("only collapses whitespace when fillers are kept", () => {
    expect(normalizeTranscript("  음,\n3일   됐어요 ", { removeFillers: false })).toBe("음, 3일 됐어요");
  });

  it("leaves digits and words alone for languages without a table", () => {
    expect(normalizeTranscript("テスト 123。", { language: "ja" })).toBe("テスト 123");
  });

  it("splits words joined by slashes and hyphens", () => {
    expect(normalizeTranscript("혈압 120/80 이에요", { language: "ko" })).toBe("혈압 일이영 팔영 이에요");
    expect(normalizeTranscript("Follow-up in 2-3 days", { language: "en" })).toBe("follow up in two three days");
  });

  it("removes apostrophes and quotes without splitting", () => {
    expect(normalizeTranscript("Don't stop “the” pills", { language: "en" })).toBe("dont stop the pills");
  });

  it("returns an empty string when only fillers remain", () => {
    expect(normalizeTranscript("음... 어, 네")).toBe("");
  });
});
