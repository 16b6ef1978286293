import type { Segment, Waveform } from "@consult-scribe/core";

export interface EngineInput {
  audioPath: string;
  /** Preprocessed audio; local engines transcribe this instead of the file */
  waveform?: Waveform;
  language: string;
  prompt?: string;
}

export interface EngineOutput {
  text: string;
  segments: Segment[];
  language?: string;
  /** Seconds of the audio the engine received, when it knows it */
  audioDuration?: number | null;
}

export interface SttEngine {
  readonly kind: "local" | "api";
  /** Name recorded with every result */
  readonly modelName: string;
  transcribe(input: EngineInput): Promise<EngineOutput>;
}
