export interface DecodedAudio {
  sampleRate: number;
  channels: Float32Array[];
}

export interface Waveform {
  samples: Float32Array;
  sampleRate: number;
  /** Seconds */
  duration: number;
}

/** Half-open sample range [start, end) */
export interface SpeechRegion {
  start: number;
  end: number;
}
