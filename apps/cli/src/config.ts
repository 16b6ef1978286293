import { z } from "zod";
import {
  API_TRANSCRIPTION_MODELS,
  type ApiTranscriptionModel,
} from "@consult-scribe/ai";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly key?: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/** whisper.cpp model files per speed/accuracy preset */
export const LOCAL_MODELS = {
  fast: "ggml-small.bin",
  balanced: "ggml-medium.bin",
  accurate: "ggml-large-v3.bin",
} as const;

export type LocalModelChoice = keyof typeof LOCAL_MODELS;
export type ModelChoice = LocalModelChoice | ApiTranscriptionModel;

const LOCAL_MODEL_CHOICES: LocalModelChoice[] = ["fast", "balanced", "accurate"];

export const MODEL_CHOICES: ModelChoice[] = [...LOCAL_MODEL_CHOICES, ...API_TRANSCRIPTION_MODELS];

export type ModelEntry =
  | { kind: "local"; choice: LocalModelChoice; file: string }
  | { kind: "api"; choice: ApiTranscriptionModel };

export function isModelChoice(name: string): name is ModelChoice {
  return MODEL_CHOICES.some((choice) => choice === name);
}

export function isApiModel(name: string): boolean {
  return API_TRANSCRIPTION_MODELS.some((model) => model === name);
}

export function getModel(name: string): ModelEntry {
  for (const choice of LOCAL_MODEL_CHOICES) {
    if (choice === name) return { kind: "local", choice, file: LOCAL_MODELS[choice] };
  }
  for (const choice of API_TRANSCRIPTION_MODELS) {
    if (choice === name) return { kind: "api", choice };
  }
  throw new ConfigError(`Unknown model "${name}". Choose one of: ${MODEL_CHOICES.join(", ")}`);
}

const envSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  STT_MODEL: z
    .string()
    .default("fast")
    .refine(isModelChoice, { message: `must be one of ${MODEL_CHOICES.join(", ")}` }),
  STT_LANGUAGE: z.string().default("ko"),
  STT_INITIAL_PROMPT: z.string().optional(),
  STT_DB_PATH: z.string().default("data/stt.db"),
  WHISPER_CPP_PATH: z.string().default("whisper-cli"),
  WHISPER_MODEL_DIR: z.string().default("models"),
  FFMPEG_PATH: z.string().default("ffmpeg"),
  SUMMARY_MODEL: z.string().default("gpt-4o-mini"),
  STT_MIN_AUDIO_LENGTH: z.coerce.number().nonnegative().default(1.0),
  STT_SILENCE_RMS_THRESHOLD: z.coerce.number().nonnegative().default(0.01),
});

export interface AppConfig {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  defaultModel: ModelChoice;
  language: string;
  initialPrompt?: string;
  dbPath: string;
  whisperCppPath: string;
  whisperModelDir: string;
  ffmpegPath: string;
  summaryModel: string;
  /** Seconds */
  minAudioLength: number;
  silenceRmsThreshold: number;
}

/**
 * Reads the application settings from the environment. Empty variables
 * count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue.path.length > 0 ? String(issue.path[0]) : undefined;
    throw new ConfigError(`Invalid ${key ?? "configuration"}: ${issue.message}`, key);
  }

  const values = parsed.data;
  return {
    openaiApiKey: values.OPENAI_API_KEY,
    openaiBaseUrl: values.OPENAI_BASE_URL,
    defaultModel: values.STT_MODEL,
    language: values.STT_LANGUAGE,
    initialPrompt: values.STT_INITIAL_PROMPT,
    dbPath: values.STT_DB_PATH,
    whisperCppPath: values.WHISPER_CPP_PATH,
    whisperModelDir: values.WHISPER_MODEL_DIR,
    ffmpegPath: values.FFMPEG_PATH,
    summaryModel: values.SUMMARY_MODEL,
    minAudioLength: values.STT_MIN_AUDIO_LENGTH,
    silenceRmsThreshold: values.STT_SILENCE_RMS_THRESHOLD,
  };
}
