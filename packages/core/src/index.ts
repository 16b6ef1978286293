export * from "./types/transcription";
export * from "./types/audio";
export * from "./types/metrics";
export * from "./types/summary";

export * from "./utils/ids";
export * from "./utils/diff-words";

export * from "./audio/errors";
export * from "./audio/wav";
export * from "./audio/mixdown";
export * from "./audio/resample";
export * from "./audio/waveform";
export * from "./audio/window";
export * from "./audio/fft";
export * from "./audio/guards";
export * from "./audio/noise-reduction";
export * from "./audio/vad";

export * from "./metrics/errors";
export * from "./metrics/normalize";
export * from "./metrics/error-rate";
export * from "./metrics/rtf";
export * from "./metrics/quality";
export * from "./metrics/alignment";

export * from "./diarization/embedding";
export * from "./diarization/cluster";
export * from "./diarization/diarize";
export * from "./diarization/conversation";
