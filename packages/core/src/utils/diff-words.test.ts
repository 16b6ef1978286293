import { describe, it, expect } from "vitest";
import { diffWords } from "./diff-words";

describe("diffWords", () => {
  it("should return unchanged words when sequences are identical", () => {
    expect(diffWords(["hello", "world"], ["hello", "world"])).toEqual([
      { type: "unchanged", text: "hello" },
      { type: "unchanged", text: "world" },
    ]);
  });

  it("should detect words added at the end", () => {
    expect(diffWords(["hello"], ["hello", "world"])).toEqual([
      { type: "unchanged", text: "hello" },
      { type: "added", text: "world" },
    ]);
  });

  it("should detect words added in the middle", () => {
    expect(diffWords(["hello", "world"], ["hello", "big", "world"])).toEqual([
      { type: "unchanged", text: "hello" },
      { type: "added", text: "big" },
      { type: "unchanged", text: "world" },
    ]);
  });

  it("should detect words removed from the beginning", () => {
    expect(diffWords(["well", "hello"], ["hello"])).toEqual([
      { type: "removed", text: "well" },
      { type: "unchanged", text: "hello" },
    ]);
  });

  it("should pair a removal followed by an addition into a modification", () => {
    expect(diffWords(["a", "b", "c"], ["a", "x", "c"])).toEqual([
      { type: "unchanged", text: "a" },
      { type: "modified", text: "b", replacement: "x" },
      { type: "unchanged", text: "c" },
    ]);
  });

  it("should keep leftover additions after pairing modifications", () => {
    expect(diffWords(["a", "b"], ["a", "x", "y"])).toEqual([
      { type: "unchanged", text: "a" },
      { type: "modified", text: "b", replacement: "x" },
      { type: "added", text: "y" },
    ]);
  });

  it("should handle empty old sequence", () => {
    expect(diffWords([], ["a", "b"])).toEqual([
      { type: "added", text: "a" },
      { type: "added", text: "b" },
    ]);
  });

  it("should handle empty new sequence", () => {
    expect(diffWords(["a", "b"], [])).toEqual([
      { type: "removed", text: "a" },
      { type: "removed", text: "b" },
    ]);
  });

  it("should report tokens matched by a loose comparator as modified when they differ", () => {
    const result = diffWords(["Hello", "world"], ["hello", "world"], (l, r) => l.toLowerCase() === r.toLowerCase());
    expect(result).toEqual([
      { type: "modified", text: "Hello", replacement: "hello" },
      { type: "unchanged", text: "world" },
    ]);
  });
});
