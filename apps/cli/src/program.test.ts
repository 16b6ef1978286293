import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { TranscriptionResult } from "@consult-scribe/core";
import { loadConfig } from "./config";
import { TranscriptStore } from "./db/storage";
import type { SttEngine } from "./engines";
import { buildProgram, runShow, runTranscribe, type CommandDeps, type TranscribeCommandOptions } from "./program";

const options: TranscribeCommandOptions = {
  noiseReduction: false,
  vad: false,
  diarize: false,
  summary: false,
  showAlignment: false,
  db: "data/test.db",
};

const memoryStore = () => {
  const store = new TranscriptStore(":memory:");
  store.init();
  return store;
};

describe("cli commands", () => {
  const transcribeMock = vi.fn<SttEngine["transcribe"]>();
  const createEngineMock = vi.fn<CommandDeps["createEngine"]>();
  let logs: string[];
  let errors: string[];
  let tmpDir: string;

  const deps: CommandDeps = {
    createEngine: createEngineMock,
    openStore: memoryStore,
    loadAudio: async () => ({
      samples: new Float32Array(32000).fill(0.1),
      sampleRate: 16000,
      duration: 2,
    }),
    summarize: vi.fn(),
  };

  beforeEach(async () => {
    vi.clearAllMocks();
    logs = [];
    errors = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      logs.push(String(line));
    });
    vi.spyOn(console, "error").mockImplementation((line: unknown) => {
      errors.push(String(line));
    });
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "program-test-"));
    createEngineMock.mockReturnValue({ kind: "local", modelName: "whisper.cpp/ggml-small", transcribe: transcribeMock });
    transcribeMock.mockResolvedValue({ text: "배가 아파요", segments: [] });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("rejects a path that does not exist", async () => {
    const code = await runTranscribe(path.join(tmpDir, "missing.wav"), options, loadConfig({}), deps);

    expect(code).toBe(1);
    expect(errors).toEqual([`Invalid audio path: ${path.join(tmpDir, "missing.wav")}`]);
    expect(createEngineMock).not.toHaveBeenCalled();
  });

  it("transcribes a single file with the configured default model", async () => {
    const file = path.join(tmpDir, "visit.wav");
    await fs.writeFile(file, "x");
    const refFile = path.join(tmpDir, "visit.txt");
    await fs.writeFile(refFile, "배가 아파요");

    const code = await runTranscribe(file, { ...options, refFile }, loadConfig({ STT_MODEL: "balanced" }), deps);

    expect(code).toBe(0);
    expect(createEngineMock.mock.calls[0][0]).toBe("balanced");
    expect(logs).toContain("배가 아파요");
    expect(logs).toContain("Saved to data/test.db (transcript_id=1)");
    expect(logs).toContain("  WER: 0.0000  CER: 0.0000");
  });

  it("runs a directory as a batch and fails when any file fails", async () => {
    await fs.writeFile(path.join(tmpDir, "a.wav"), "x");
    await fs.writeFile(path.join(tmpDir, "b.wav"), "x");
    transcribeMock.mockResolvedValueOnce({ text: "배가 아파요", segments: [] }).mockRejectedValueOnce(new Error("boom"));

    const code = await runTranscribe(tmpDir, options, loadConfig({}), deps);

    expect(code).toBe(1);
    expect(logs).toContain("1 succeeded, 1 failed");
  });

  it("reports an unknown transcript id", () => {
    expect(runShow(5, ":memory:", memoryStore)).toBe(1);
    expect(errors).toEqual(["Transcript 5 not found"]);
  });

  it("shows a stored transcript", () => {
    const store = memoryStore();
    const result: TranscriptionResult = {
      text: "배가 아파요",
      audioFile: "visit.wav",
      model: "openai/whisper-1",
      language: "ko",
      processingTime: 1,
      audioDuration: 4,
      timestamp: "2026-03-01T09:00:00.000Z",
      segments: [],
      numSpeakers: 0,
      preprocessing: { noiseReduction: false, vad: false },
    };
    const id = store.saveTranscript(result, { rtf: 0.25 });

    expect(runShow(id, ":memory:", () => store)).toBe(0);
    expect(logs[0]).toBe("Transcript #1");
    expect(logs).toContain("배가 아파요");
  });

  it("validates option values", async () => {
    const program = buildProgram({}).exitOverride();
    for (const command of program.commands) {
      command.exitOverride().configureOutput({ writeErr: () => undefined });
    }

    await expect(
      program.parseAsync(["transcribe", "visit.wav", "--num-speakers", "0"], { from: "user" })
    ).rejects.toThrow("Must be a positive integer.");
    await expect(
      program.parseAsync(["transcribe", "visit.wav", "--model", "huge"], { from: "user" })
    ).rejects.toThrow(/Allowed choices are/);
  });
});
