import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { TranscriptionResult } from "@consult-scribe/core";
import { TranscriptStore } from "./storage";

const result = (overrides: Partial<TranscriptionResult> = {}): TranscriptionResult => ({
  text: "어디가 아프세요 머리가 아파요",
  audioFile: "recordings/visit-01.wav",
  model: "whisper.cpp/ggml-small",
  language: "ko",
  processingTime: 3,
  audioDuration: 12,
  timestamp: "2026-03-01T09:00:00.000Z",
  segments: [
    { id: "a", start: 0, end: 1.2, text: "어디가 아프세요", speakerId: "SPEAKER_00", confidence: 0.91 },
    { id: "b", start: 1.4, end: 2.8, text: "머리가 아파요", speakerId: "SPEAKER_01" },
  ],
  speakers: [
    { id: "SPEAKER_00", name: "Speaker 1" },
    { id: "SPEAKER_01", name: "Speaker 2" },
  ],
  numSpeakers: 2,
  preprocessing: { noiseReduction: true, vad: false },
  ...overrides,
});

describe("TranscriptStore", () => {
  let store: TranscriptStore;

  beforeEach(() => {
    store = new TranscriptStore(":memory:", () => new Date("2026-03-01T09:00:05.000Z"));
    store.init();
  });

  afterEach(() => {
    store.close();
  });

  it("round-trips a transcript with its segments and metrics", () => {
    const id = store.saveTranscript(result(), { rtf: 0.25, fileSize: 2048 });
    store.saveSegments(id, result().segments);
    store.saveDevMetrics(id, { wer: 0.5, cer: 0.2, refChars: 15, hypChars: 14 });
    store.saveQualityMetrics(id, {
      avgConfidence: 0.91,
      minConfidence: 0.91,
      lowConfidenceRatio: 0,
      silenceRatio: 0.1,
      audioRmsEnergy: 0.05,
      clippingDetected: false,
      wordCount: 4,
    });
    store.saveSummary(id, {
      symptoms: "두통",
      diagnosis: "긴장성 두통",
      medication: "없음",
      careAdvice: "휴식",
      model: "gpt-4o-mini",
      summaryTime: 1.5,
      success: true,
    });

    const stored = store.getTranscript(id);
    expect(stored?.transcript).toEqual({
      id,
      audioFile: "recordings/visit-01.wav",
      model: "whisper.cpp/ggml-small",
      language: "ko",
      text: "어디가 아프세요 머리가 아파요",
      diarizationEnabled: true,
      numSpeakers: 2,
      processingTime: 3,
      audioDuration: 12,
      rtf: 0.25,
      fileSize: 2048,
      noiseReduction: true,
      vadFilter: false,
      skippedReason: null,
      createdAt: "2026-03-01T09:00:00.000Z",
    });
    expect(stored?.segments).toEqual([
      { id: 1, speaker: "SPEAKER_00", text: "어디가 아프세요", start: 0, end: 1.2, confidence: 0.91 },
      { id: 2, speaker: "SPEAKER_01", text: "머리가 아파요", start: 1.4, end: 2.8, confidence: null },
    ]);
    expect(stored?.devMetrics).toEqual({ wer: 0.5, cer: 0.2, refChars: 15, hypChars: 14 });
    expect(stored?.quality?.clippingDetected).toBe(false);
    expect(stored?.summary).toEqual({
      id: 1,
      symptoms: "두통",
      diagnosis: "긴장성 두통",
      medication: "없음",
      careAdvice: "휴식",
      model: "gpt-4o-mini",
      summaryTime: 1.5,
    });
  });

  it("stores skipped recordings without diarization", () => {
    const id = store.saveTranscript(
      result({ text: "", segments: [], speakers: undefined, numSpeakers: 0, skippedReason: "too_quiet", audioDuration: null }),
      { rtf: 0 }
    );
    store.saveSegments(id, []);

    const stored = store.getTranscript(id);
    expect(stored?.transcript.skippedReason).toBe("too_quiet");
    expect(stored?.transcript.diarizationEnabled).toBe(false);
    expect(stored?.transcript.audioDuration).toBeNull();
    expect(stored?.transcript.fileSize).toBeNull();
    expect(stored?.segments).toEqual([]);
    expect(stored?.devMetrics).toBeNull();
    expect(stored?.summary).toBeNull();
  });

  it("lists the newest transcripts first", () => {
    store.saveTranscript(result({ audioFile: "old.wav", timestamp: "2026-01-01T00:00:00.000Z" }), { rtf: 0.1 });
    store.saveTranscript(result({ audioFile: "new.wav", timestamp: "2026-02-01T00:00:00.000Z" }), { rtf: 0.1 });
    store.saveTranscript(result({ audioFile: "newer.wav", timestamp: "2026-02-01T00:00:00.000Z" }), { rtf: 0.1 });

    expect(store.listTranscripts().map((r) => r.audioFile)).toEqual(["newer.wav", "new.wav", "old.wav"]);
    expect(store.listTranscripts(1)).toHaveLength(1);
  });

  it("returns null for an unknown id", () => {
    expect(store.getTranscript(42)).toBeNull();
  });

  it("rejects rows for a missing transcript", () => {
    expect(() => store.saveDevMetrics(99, { wer: 0, cer: 0, refChars: 1, hypChars: 1 })).toThrow();
  });
});
