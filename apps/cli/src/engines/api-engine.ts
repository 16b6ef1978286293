import fs from "fs/promises";
import { transcribeWithOpenAI, type ApiTranscriptionModel } from "@consult-scribe/ai";
import type { EngineInput, EngineOutput, SttEngine } from "./types";

export interface ApiEngineOptions {
  model: ApiTranscriptionModel;
  apiKey?: string;
  baseURL?: string;
}

/** OpenAI hosted transcription; always receives the original file. */
export class ApiWhisperEngine implements SttEngine {
  readonly kind = "api" as const;
  readonly modelName: string;

  constructor(private readonly options: ApiEngineOptions) {
    this.modelName = `openai/${options.model}`;
  }

  async transcribe(input: EngineInput): Promise<EngineOutput> {
    const audio = await fs.readFile(input.audioPath);
    const result = await transcribeWithOpenAI(audio, {
      model: this.options.model,
      apiKey: this.options.apiKey,
      baseURL: this.options.baseURL,
      language: input.language,
      prompt: input.prompt,
    });

    return {
      text: result.text,
      segments: result.segments,
      language: result.language,
      audioDuration: result.durationInSeconds,
    };
  }
}
