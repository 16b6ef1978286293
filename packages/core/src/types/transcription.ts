export interface Speaker {
  id: string;
  name: string;
}

export interface Segment {
  id: string;
  start: number;
  end: number;
  text: string;
  speakerId?: string;
  /** Mean token probability reported by the engine, 0-1 */
  confidence?: number;
}

export type SkippedReason = "too_short" | "too_quiet";

export interface PreprocessingFlags {
  noiseReduction: boolean;
  vad: boolean;
}

export interface TranscriptionResult {
  text: string;
  audioFile: string;
  model: string;
  language?: string;
  /** Seconds, rounded to 2 decimals */
  processingTime: number;
  /** Seconds; null when neither the decoder nor the engine reported it */
  audioDuration: number | null;
  timestamp: string;
  segments: Segment[];
  speakers?: Speaker[];
  numSpeakers: number;
  skippedReason?: SkippedReason;
  preprocessing: PreprocessingFlags;
}
