import { diffWords, type DiffWord } from "../utils/diff-words";
import { normalizeTranscript, type NormalizeOptions } from "./normalize";

export type AlignedToken = DiffWord;

/**
 * Word-level alignment of a transcript against its reference, after the
 * same normalization used for error rates.
 */
export function alignTranscripts(
  reference: string,
  hypothesis: string,
  options: NormalizeOptions = {}
): AlignedToken[] {
  const split = (text: string) => {
    const normalized = normalizeTranscript(text, options);
    return normalized === "" ? [] : normalized.split(" ");
  };
  return diffWords(split(reference), split(hypothesis));
}

/** One-line rendering: `[-old+new]` for edits, `[-x]` / `[+x]` for gaps. */
export function formatAlignment(tokens: AlignedToken[]): string {
  return tokens
    .map((token) => {
      switch (token.type) {
        case "unchanged":
          return token.text;
        case "modified":
          return `[-${token.text}+${token.replacement}]`;
        case "removed":
          return `[-${token.text}]`;
        case "added":
          return `[+${token.text}]`;
      }
    })
    .join(" ");
}
