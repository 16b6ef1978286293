import { experimental_transcribe as transcribe } from "ai";
import { generateId, type Segment } from "@consult-scribe/core";
import { createOpenAIClient, type ClientOptions } from "../lib";

export const API_TRANSCRIPTION_MODELS = [
  "whisper-1",
  "gpt-4o-transcribe",
  "gpt-4o-mini-transcribe",
] as const;

export type ApiTranscriptionModel = (typeof API_TRANSCRIPTION_MODELS)[number];

export interface OpenAITranscribeOptions extends ClientOptions {
  model: ApiTranscriptionModel;
  language?: string;
  prompt?: string;
}

export interface OpenAITranscribeResult {
  text: string;
  segments: Segment[];
  language?: string;
  /** null when the model does not report a duration */
  durationInSeconds: number | null;
}

/**
 * Sends the original file bytes to an OpenAI transcription model.
 * Failures are logged and rethrown.
 */
export async function transcribeWithOpenAI(
  audio: Uint8Array,
  options: OpenAITranscribeOptions
): Promise<OpenAITranscribeResult> {
  const client = createOpenAIClient(options);

  const openaiOptions: Record<string, string | string[]> = {};
  if (options.language) openaiOptions.language = options.language;
  if (options.prompt) openaiOptions.prompt = options.prompt;
  // only whisper-1 returns segment timestamps
  if (options.model === "whisper-1") openaiOptions.timestampGranularities = ["segment"];

  console.log("[Transcribe Request]", {
    model: options.model,
    language: options.language,
    bytes: audio.byteLength,
    timestamp: new Date().toISOString(),
  });

  try {
    const result = await transcribe({
      model: client.transcription(options.model),
      audio,
      providerOptions: { openai: openaiOptions },
    });

    const segments: Segment[] = result.segments.map((segment) => ({
      id: generateId(),
      start: segment.startSecond,
      end: segment.endSecond,
      text: segment.text.trim(),
    }));

    console.log("[Transcribe Response]", {
      success: true,
      segmentCount: segments.length,
      durationInSeconds: result.durationInSeconds,
      timestamp: new Date().toISOString(),
    });

    return {
      text: result.text.trim(),
      segments,
      language: result.language,
      durationInSeconds: result.durationInSeconds ?? null,
    };
  } catch (error) {
    const errorMessage =
      error instanceof Error ? error.message : "Unknown transcription error";

    console.error("[Transcribe Error]", {
      error: errorMessage,
      model: options.model,
      timestamp: new Date().toISOString(),
    });

    throw error;
  }
}
