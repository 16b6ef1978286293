import tables from "./normalization.json";

export interface NormalizeOptions {
  /** Language whose digit reading and filler list apply; others get no table */
  language?: string;
  /** Lowercase, spell digits, strip punctuation and fillers (default true) */
  removeFillers?: boolean;
}

interface LanguageTable {
  digits: string[];
  digitSeparator: string;
  fillers: RegExp[];
}

const LANGUAGE_TABLES = new Map<string, LanguageTable>(
  Object.entries(tables).map(([language, table]) => [
    language,
    {
      digits: table.digits,
      digitSeparator: table.digitSeparator,
      fillers: table.fillers.map((pattern) => new RegExp(`^(?:${pattern})$`, "u")),
    },
  ])
);

/** Sentence punctuation, quotes and brackets; removed without splitting words */
const STRIPPED_PUNCTUATION = /[.,!?;:'"‘’“”()[\]{}<>…·]/g;

function baseLanguage(language: string): string {
  return language.toLowerCase().split(/[-_]/)[0];
}

export function getLanguageTable(language: string): LanguageTable | undefined {
  return LANGUAGE_TABLES.get(baseLanguage(language));
}

function spellDigits(text: string, table: LanguageTable): string {
  return text.replace(/\d+/g, (run) =>
    Array.from(run, (digit) => table.digits[Number(digit)]).join(table.digitSeparator)
  );
}

/**
 * Normalizes a transcript for error-rate scoring so that spacing,
 * casing, digit style and hesitation words do not count as errors.
 *
 * @example
 * normalizeTranscript("음 머리가 아파요. 3일 됐어요", { language: "ko" })
 * // => "머리가 아파요 삼일 됐어요"
 */
export function normalizeTranscript(text: string, options: NormalizeOptions = {}): string {
  const { language = "ko", removeFillers = true } = options;

  let result = text.trim().replace(/[\r\n]+/g, " ").replace(/\s+/g, " ").trim();
  if (!removeFillers) {
    return result;
  }

  const table = getLanguageTable(language);
  result = result.toLowerCase();
  if (table) {
    result = spellDigits(result, table);
  }
  result = result.replace(STRIPPED_PUNCTUATION, "");

  // other symbols such as "/" or "-" separate words
  const tokens = result.match(/[\p{L}\p{N}]+/gu) ?? [];
  return tokens
    .filter((token) => !table || !table.fillers.some((filler) => filler.test(token)))
    .join(" ");
}
