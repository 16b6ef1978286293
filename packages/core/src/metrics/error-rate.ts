import { normalizeTranscript, type NormalizeOptions } from "./normalize";
import { ReferenceTextError } from "./errors";
import type { ErrorRates } from "../types/metrics";

interface EditCounts {
  substitutions: number;
  deletions: number;
  insertions: number;
}

/**
 * Minimum edit alignment between two token sequences, keeping two DP rows.
 * Ties prefer substitution over deletion over insertion.
 */
export function countEdits<T>(reference: T[], hypothesis: T[]): EditCounts {
  const m = hypothesis.length;
  let cost = new Int32Array(m + 1);
  let subs = new Int32Array(m + 1);
  let dels = new Int32Array(m + 1);
  let ins = new Int32Array(m + 1);
  for (let j = 0; j <= m; j++) {
    cost[j] = j;
    ins[j] = j;
  }

  for (let i = 1; i <= reference.length; i++) {
    const nextCost = new Int32Array(m + 1);
    const nextSubs = new Int32Array(m + 1);
    const nextDels = new Int32Array(m + 1);
    const nextIns = new Int32Array(m + 1);
    nextCost[0] = i;
    nextDels[0] = i;

    for (let j = 1; j <= m; j++) {
      const same = reference[i - 1] === hypothesis[j - 1];
      const diagonal = cost[j - 1] + (same ? 0 : 1);
      const up = cost[j] + 1;
      const left = nextCost[j - 1] + 1;

      if (diagonal <= up && diagonal <= left) {
        nextCost[j] = diagonal;
        nextSubs[j] = subs[j - 1] + (same ? 0 : 1);
        nextDels[j] = dels[j - 1];
        nextIns[j] = ins[j - 1];
      } else if (up <= left) {
        nextCost[j] = up;
        nextSubs[j] = subs[j];
        nextDels[j] = dels[j] + 1;
        nextIns[j] = ins[j];
      } else {
        nextCost[j] = left;
        nextSubs[j] = nextSubs[j - 1];
        nextDels[j] = nextDels[j - 1];
        nextIns[j] = nextIns[j - 1] + 1;
      }
    }

    cost = nextCost;
    subs = nextSubs;
    dels = nextDels;
    ins = nextIns;
  }

  return { substitutions: subs[m], deletions: dels[m], insertions: ins[m] };
}

/**
 * Word and character error rates of `hypothesis` against `reference`.
 * Both texts are normalized first; CER counts spaces as characters.
 */
export function computeErrorRates(
  reference: string,
  hypothesis: string,
  options: NormalizeOptions = {}
): ErrorRates {
  const ref = normalizeTranscript(reference, options);
  const hyp = normalizeTranscript(hypothesis, options);
  if (ref === "") {
    throw new ReferenceTextError();
  }

  const refWords = ref.split(" ");
  const hypWords = hyp === "" ? [] : hyp.split(" ");
  const refChars = Array.from(ref);
  const hypChars = Array.from(hyp);

  const words = countEdits(refWords, hypWords);
  const chars = countEdits(refChars, hypChars);

  return {
    wer: hyp === "" ? 1 : (words.substitutions + words.deletions + words.insertions) / refWords.length,
    cer: hyp === "" ? 1 : (chars.substitutions + chars.deletions + chars.insertions) / refChars.length,
    refChars: refChars.length,
    hypChars: hypChars.length,
    refWords: refWords.length,
    hypWords: hypWords.length,
    ...words,
  };
}
