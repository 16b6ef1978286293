import fs from "fs/promises";
import os from "os";
import path from "path";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { decodeWav } from "@consult-scribe/core";
import { LocalWhisperEngine, segmentsFromReport } from "./local-engine";

const mocks = vi.hoisted(() => ({
  runWhisperCppMock: vi.fn(),
}));

vi.mock("../lib/whisper-cpp", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../lib/whisper-cpp")>();
  return { ...actual, runWhisperCpp: mocks.runWhisperCppMock };
});

const report = {
  result: { language: "ko" },
  transcription: [
    {
      offsets: { from: 0, to: 1500 },
      text: " 어디가 불편하세요?",
      tokens: [
        { text: "[_BEG_]", p: 0.1 },
        { text: " 어디가", p: 0.9 },
        { text: " 불편하세요?", p: 0.7 },
      ],
    },
    { offsets: { from: 1500, to: 1800 }, text: "   " },
    { offsets: { from: 1800, to: 3250 }, text: "머리가 아파요", tokens: [{ text: "[_TT_90]", p: 0.5 }] },
  ],
};

describe("segmentsFromReport", () => {
  it("converts offsets to seconds and drops empty segments", () => {
    const segments = segmentsFromReport(report);

    expect(segments).toHaveLength(2);
    expect(segments[0]).toMatchObject({ start: 0, end: 1.5, text: "어디가 불편하세요?" });
    expect(segments[0].confidence).toBeCloseTo(0.8, 10);
    expect(segments[1]).toMatchObject({ start: 1.8, end: 3.25, text: "머리가 아파요" });
  });

  it("leaves confidence unset when only special tokens were scored", () => {
    expect(segmentsFromReport(report)[1].confidence).toBeUndefined();
  });
});

describe("LocalWhisperEngine", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.runWhisperCppMock.mockResolvedValue(report);
  });

  it("names the model after the model file", () => {
    const engine = new LocalWhisperEngine({ binPath: "whisper-cli", modelPath: "models/ggml-small.bin" });
    expect(engine.modelName).toBe("whisper.cpp/ggml-small");
    expect(engine.kind).toBe("local");
  });

  it("writes the waveform to a temporary WAV and removes it afterwards", async () => {
    let written: Uint8Array | undefined;
    let inputPath = "";
    mocks.runWhisperCppMock.mockImplementation(async (input: string) => {
      inputPath = input;
      written = await fs.readFile(input);
      return report;
    });

    const engine = new LocalWhisperEngine({ binPath: "whisper-cli", modelPath: "models/ggml-medium.bin" });
    const samples = new Float32Array([0, 0.5, -0.5, 0.25]);
    const output = await engine.transcribe({
      audioPath: "visit.m4a",
      waveform: { samples, sampleRate: 16000, duration: 2.5 },
      language: "ko",
      prompt: "진료 상담",
    });

    expect(path.basename(inputPath)).toBe("input.wav");
    expect(inputPath.startsWith(os.tmpdir())).toBe(true);
    expect(written && decodeWav(written).channels[0].length).toBe(4);
    await expect(fs.access(inputPath)).rejects.toThrow();

    expect(mocks.runWhisperCppMock).toHaveBeenCalledWith(inputPath, {
      binPath: "whisper-cli",
      modelPath: "models/ggml-medium.bin",
      language: "ko",
      prompt: "진료 상담",
    });
    expect(output.text).toBe("어디가 불편하세요? 머리가 아파요");
    expect(output.language).toBe("ko");
    expect(output.audioDuration).toBe(2.5);
  });

  it("transcribes the file directly when no waveform is given", async () => {
    const engine = new LocalWhisperEngine({ binPath: "whisper-cli", modelPath: "models/ggml-small.bin" });
    const output = await engine.transcribe({ audioPath: "visit.wav", language: "auto" });

    expect(mocks.runWhisperCppMock.mock.calls[0][0]).toBe("visit.wav");
    expect(output.audioDuration).toBeNull();
  });
});
