import { diffArrays } from "diff";

type DiffType = "added" | "removed" | "modified" | "unchanged";

interface DiffWordBase {
  type: DiffType;
}

interface DiffWordRemoved extends DiffWordBase {
  type: "removed";
  text: string;
}

interface DiffWordAdded extends DiffWordBase {
  type: "added";
  text: string;
}

interface DiffWordUnchanged extends DiffWordBase {
  type: "unchanged";
  text: string;
}

interface DiffWordModified extends DiffWordBase {
  type: "modified";
  /** Token from the old sequence */
  text: string;
  /** Token that replaced it */
  replacement: string;
}

export type DiffWord =
  | DiffWordRemoved
  | DiffWordAdded
  | DiffWordUnchanged
  | DiffWordModified;

/**
 * Compares two token sequences. A removal directly followed by an addition
 * is paired up into modifications, the leftovers stay removals/additions.
 * @param areWordsSame optional comparator, defaults to strict equality
 */
export function diffWords(
  oldWords: string[],
  newWords: string[],
  areWordsSame?: (left: string, right: string) => boolean
): DiffWord[] {
  const same = areWordsSame ?? ((left: string, right: string) => left === right);
  const diff = diffArrays(oldWords, newWords, { comparator: same });

  const result: DiffWord[] = [];

  let oldIndex = 0;
  let newIndex = 0;
  let i = 0;

  while (i < diff.length) {
    const change = diff[i];

    if (change.removed) {
      const nextChange = i + 1 < diff.length ? diff[i + 1] : null;

      if (nextChange && nextChange.added) {
        const modificationCount = Math.min(change.count, nextChange.count);

        for (let j = 0; j < modificationCount; j++) {
          result.push({
            type: "modified",
            text: oldWords[oldIndex + j],
            replacement: newWords[newIndex + j],
          });
        }
        for (let j = modificationCount; j < change.count; j++) {
          result.push({ type: "removed", text: oldWords[oldIndex + j] });
        }
        for (let j = modificationCount; j < nextChange.count; j++) {
          result.push({ type: "added", text: newWords[newIndex + j] });
        }

        oldIndex += change.count;
        newIndex += nextChange.count;
        i += 2;
      } else {
        for (let j = 0; j < change.count; j++) {
          result.push({ type: "removed", text: oldWords[oldIndex + j] });
        }
        oldIndex += change.count;
        i++;
      }
    } else if (change.added) {
      for (let j = 0; j < change.count; j++) {
        result.push({ type: "added", text: newWords[newIndex + j] });
      }
      newIndex += change.count;
      i++;
    } else {
      // a custom comparator can call two different tokens equal
      for (let j = 0; j < change.count; j++) {
        const oldWord = oldWords[oldIndex + j];
        const newWord = newWords[newIndex + j];
        if (oldWord === newWord) {
          result.push({ type: "unchanged", text: oldWord });
        } else {
          result.push({ type: "modified", text: oldWord, replacement: newWord });
        }
      }
      oldIndex += change.count;
      newIndex += change.count;
      i++;
    }
  }

  return result;
}
