import type { LanguageModel } from "ai";
import { createGeminiClient, createOpenAIClient, type ClientOptions } from "../lib";

export const SUMMARY_MODEL = "gpt-4o-mini";
export const SUMMARY_TEMPERATURE = 0.3;
export const SUMMARY_MAX_OUTPUT_TOKENS = 1000;
export const SUMMARY_MAX_RETRIES = 2;

export const SUMMARY_FAILED = "Summary generation failed";

interface OutputLanguage {
  name: string;
  /** Written in a section the consultation does not cover */
  none: string;
}

const OUTPUT_LANGUAGES: Record<string, OutputLanguage> = {
  ko: { name: "Korean", none: "없음" },
  en: { name: "English", none: "None" },
};

export function getOutputLanguage(language = "ko"): OutputLanguage {
  const base = language.toLowerCase().split(/[-_]/)[0];
  return OUTPUT_LANGUAGES[base] ?? { name: language, none: "None" };
}

/** Gemini model ids go to Google, everything else to OpenAI. */
export const createSummaryModel = (modelId: string, options: ClientOptions = {}): LanguageModel =>
  modelId.startsWith("gemini")
    ? createGeminiClient(options)(modelId)
    : createOpenAIClient(options)(modelId);
