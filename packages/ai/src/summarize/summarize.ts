import type { ConsultationSummary } from "@consult-scribe/core";
import { generateObject } from "ai";
import { z } from "zod";
import type { ClientOptions } from "../lib";
import {
  SUMMARY_FAILED,
  SUMMARY_MAX_OUTPUT_TOKENS,
  SUMMARY_MAX_RETRIES,
  SUMMARY_MODEL,
  SUMMARY_TEMPERATURE,
  createSummaryModel,
  getOutputLanguage,
} from "./config";

export interface SummarizeOptions extends ClientOptions {
  model?: string;
  /** Language of the consultation and of the summary */
  language?: string;
}

const buildSchema = (none: string) =>
  z.object({
    symptoms: z.string().describe(`The patient's symptoms, or "${none}"`),
    diagnosis: z.string().describe(`The doctor's diagnosis or suspected diagnosis, or "${none}"`),
    medication: z
      .string()
      .describe(`Prescribed medication with dose and schedule, or "${none}"`),
    careAdvice: z
      .string()
      .describe(`Diet, exercise, precautions and follow-up visits, or "${none}"`),
  });

export function failedSummary(model: string, error: string): ConsultationSummary {
  return {
    symptoms: SUMMARY_FAILED,
    diagnosis: SUMMARY_FAILED,
    medication: SUMMARY_FAILED,
    careAdvice: SUMMARY_FAILED,
    model,
    summaryTime: 0,
    success: false,
    error,
  };
}

/**
 * Summarizes a consultation transcript into symptoms, diagnosis,
 * medication and care advice in plain words.
 *
 * Never throws: a failed call yields a summary with `success: false`.
 */
export async function summarizeConsultation(
  transcript: string,
  options: SummarizeOptions = {}
): Promise<ConsultationSummary> {
  const modelId = options.model ?? SUMMARY_MODEL;
  const output = getOutputLanguage(options.language);

  const systemPrompt = `You summarize medical consultation transcripts accurately, in words a child could understand.

Guidelines:
- Use only what the transcript says. Do not infer or invent symptoms, diagnoses or prescriptions.
- Keep each section short and concrete (names, doses, dates when they were said).
- Write every section in ${output.name}.
- When the consultation does not cover a section, write "${output.none}".`;

  const userMessage = `Summarize the following consultation:\n\n${transcript.trim()}`;

  console.log("[Summary Request]", {
    model: modelId,
    language: output.name,
    transcriptLength: transcript.length,
    timestamp: new Date().toISOString(),
  });

  const startedAt = performance.now();
  try {
    const { object } = await generateObject({
      model: createSummaryModel(modelId, options),
      schema: buildSchema(output.none),
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userMessage },
      ],
      temperature: SUMMARY_TEMPERATURE,
      maxOutputTokens: SUMMARY_MAX_OUTPUT_TOKENS,
      maxRetries: SUMMARY_MAX_RETRIES,
    });
    const summaryTime = Math.round((performance.now() - startedAt) / 10) / 100;

    console.log("[Summary Response]", {
      success: true,
      summaryTime,
      timestamp: new Date().toISOString(),
    });

    return {
      symptoms: object.symptoms.trim(),
      diagnosis: object.diagnosis.trim(),
      medication: object.medication.trim(),
      careAdvice: object.careAdvice.trim(),
      model: modelId,
      summaryTime,
      success: true,
    };
  } catch (error) {
    const errorMessage =
      error instanceof Error ? error.message : "Unknown summary error";

    console.error("[Summary Error]", {
      error: errorMessage,
      model: modelId,
      timestamp: new Date().toISOString(),
    });

    return failedSummary(modelId, errorMessage);
  }
}
