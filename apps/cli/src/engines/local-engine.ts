import fs from "fs/promises";
import path from "path";
import { encodeWav, generateId, type Segment } from "@consult-scribe/core";
import { createTempDir, runWhisperCpp, type WhisperCppReport } from "../lib/whisper-cpp";
import type { EngineInput, EngineOutput, SttEngine } from "./types";

export interface LocalEngineOptions {
  binPath: string;
  modelPath: string;
}

const SPECIAL_TOKEN = /^\[_.*\]$/;

function segmentConfidence(tokens: Array<{ text: string; p: number }> | undefined): number | undefined {
  const scored = (tokens ?? []).filter((token) => !SPECIAL_TOKEN.test(token.text.trim()));
  if (scored.length === 0) return undefined;
  return scored.reduce((acc, token) => acc + token.p, 0) / scored.length;
}

export function segmentsFromReport(report: WhisperCppReport): Segment[] {
  return report.transcription
    .map((entry) => ({
      id: generateId(),
      start: entry.offsets.from / 1000,
      end: entry.offsets.to / 1000,
      text: entry.text.trim(),
      confidence: segmentConfidence(entry.tokens),
    }))
    .filter((segment) => segment.text !== "");
}

/** whisper.cpp running on this machine. */
export class LocalWhisperEngine implements SttEngine {
  readonly kind = "local" as const;
  readonly modelName: string;

  constructor(private readonly options: LocalEngineOptions) {
    this.modelName = `whisper.cpp/${path.basename(options.modelPath, path.extname(options.modelPath))}`;
  }

  async transcribe(input: EngineInput): Promise<EngineOutput> {
    const tempDir = input.waveform ? await createTempDir() : undefined;
    try {
      let audioPath = input.audioPath;
      if (tempDir && input.waveform) {
        audioPath = path.join(tempDir, "input.wav");
        await fs.writeFile(audioPath, encodeWav(input.waveform.samples, input.waveform.sampleRate));
      }

      const report = await runWhisperCpp(audioPath, {
        binPath: this.options.binPath,
        modelPath: this.options.modelPath,
        language: input.language,
        prompt: input.prompt,
      });

      const segments = segmentsFromReport(report);
      return {
        text: segments.map((segment) => segment.text).join(" "),
        segments,
        language: report.result?.language ?? input.language,
        audioDuration: input.waveform?.duration ?? null,
      };
    } finally {
      if (tempDir) {
        await fs.rm(tempDir, { recursive: true, force: true });
      }
    }
  }
}
