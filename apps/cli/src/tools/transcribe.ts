import fs from "fs/promises";
import path from "path";
import {
  applyVad,
  checkAudio,
  computeErrorRates,
  computeQualityMetrics,
  computeRtf,
  diarizeSegments,
  reduceNoise,
  type ConsultationSummary,
  type ErrorRates,
  type QualityMetrics,
  type SkippedReason,
  type TranscriptionResult,
  type Waveform,
} from "@consult-scribe/core";
import { summarizeConsultation, type SummarizeOptions } from "@consult-scribe/ai";
import type { SttEngine } from "../engines";
import type { TranscriptStore } from "../db/storage";
import { writeJSON } from "../utils/file";

export interface PipelineOptions {
  language: string;
  prompt?: string;
  /** Local engines only */
  noiseReduction: boolean;
  /** Local engines only */
  vad: boolean;
  diarize: boolean;
  numSpeakers?: number;
  referenceText?: string;
  summary: boolean;
  summaryModel?: string;
  /** Directory for `<stem>.json` with the full result */
  outputDir?: string;
  minAudioLength?: number;
  silenceRmsThreshold?: number;
}

export interface PipelineDeps {
  engine: SttEngine;
  store: TranscriptStore;
  loadAudio: (file: string) => Promise<Waveform>;
  summarize?: (transcript: string, options: SummarizeOptions) => Promise<ConsultationSummary>;
  apiKey?: string;
  baseURL?: string;
}

export interface PipelineResult {
  transcriptId: number;
  result: TranscriptionResult;
  rtf: number;
  /** Bytes */
  fileSize: number;
  devMetrics?: ErrorRates;
  quality: QualityMetrics;
  summary?: ConsultationSummary;
  /** Set when a reference was given but scoring failed */
  devMetricsError?: string;
  outputFile?: string;
}

const roundTo = (value: number, digits: number) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const elapsedSeconds = (startedAt: number) => roundTo((performance.now() - startedAt) / 1000, 2);

function skippedResult(
  audioPath: string,
  model: string,
  reason: SkippedReason,
  waveform: Waveform,
  startedAt: number,
  options: PipelineOptions
): TranscriptionResult {
  return {
    text: "",
    audioFile: audioPath,
    model,
    language: options.language,
    processingTime: elapsedSeconds(startedAt),
    audioDuration: roundTo(waveform.duration, 2),
    timestamp: new Date().toISOString(),
    segments: [],
    numSpeakers: 0,
    skippedReason: reason,
    preprocessing: { noiseReduction: false, vad: false },
  };
}

/**
 * Runs one recording through the whole pipeline: load, guard, preprocess,
 * transcribe, diarize, score, store and summarize.
 */
export const processAudioFile = async (
  audioPath: string,
  options: PipelineOptions,
  deps: PipelineDeps
): Promise<PipelineResult> => {
  const { engine, store } = deps;
  const summarize = deps.summarize ?? summarizeConsultation;
  const fileSize = (await fs.stat(audioPath)).size;
  const isLocal = engine.kind === "local";

  // processing time includes decoding
  const startedAt = performance.now();

  let waveform: Waveform | undefined;
  if (isLocal || options.diarize) {
    waveform = await deps.loadAudio(audioPath);
  }

  let result: TranscriptionResult;
  let engineWaveform: Waveform | undefined;

  const check = waveform
    ? checkAudio(waveform, {
        minAudioLength: options.minAudioLength,
        silenceRmsThreshold: options.silenceRmsThreshold,
      })
    : undefined;

  if (waveform && check && !check.ok) {
    console.warn(
      `[Audio] ${path.basename(audioPath)} skipped: ${check.reason} (duration ${waveform.duration.toFixed(
        1
      )}s, RMS ${check.rms.toFixed(4)})`
    );
    result = skippedResult(audioPath, engine.modelName, check.reason, waveform, startedAt, options);
  } else {
    const noiseReduction = isLocal && options.noiseReduction;
    const vad = isLocal && options.vad;

    engineWaveform = waveform;
    if (waveform && noiseReduction) {
      const samples = reduceNoise(waveform.samples, waveform.sampleRate);
      engineWaveform = { ...waveform, samples };
    }
    if (engineWaveform && vad) {
      const trimmed = applyVad(engineWaveform.samples, engineWaveform.sampleRate);
      console.log("[VAD]", {
        originalDuration: roundTo(trimmed.originalDuration, 2),
        speechDuration: roundTo(trimmed.speechDuration, 2),
        regions: trimmed.regions.length,
      });
      engineWaveform = {
        samples: trimmed.samples,
        sampleRate: engineWaveform.sampleRate,
        duration: trimmed.samples.length / engineWaveform.sampleRate,
      };
    }

    const output = await engine.transcribe({
      audioPath,
      waveform: isLocal ? engineWaveform : undefined,
      language: options.language,
      prompt: options.prompt,
    });
    const processingTime = elapsedSeconds(startedAt);

    let segments = output.segments;
    let speakers: TranscriptionResult["speakers"];
    let numSpeakers = 0;
    if (options.diarize) {
      // api engines transcribe the original file, so their times match the loaded waveform
      const diarizationAudio = engineWaveform ?? waveform;
      if (diarizationAudio) {
        const diarized = diarizeSegments(diarizationAudio, segments, {
          numSpeakers: options.numSpeakers,
        });
        segments = diarized.segments;
        speakers = diarized.speakers;
        numSpeakers = diarized.numSpeakers;
      }
    }

    // the recording as loaded; a local engine only sees the VAD-trimmed audio
    const audioDuration = waveform?.duration ?? output.audioDuration ?? null;
    result = {
      text: output.text,
      audioFile: audioPath,
      model: engine.modelName,
      language: output.language ?? options.language,
      processingTime,
      audioDuration: audioDuration === null ? null : roundTo(audioDuration, 2),
      timestamp: new Date().toISOString(),
      segments,
      speakers,
      numSpeakers,
      preprocessing: { noiseReduction, vad },
    };
  }

  const rtf = computeRtf(result.processingTime, result.audioDuration);
  const quality = computeQualityMetrics({
    segments: result.segments,
    text: result.text,
    waveform,
  });

  let devMetrics: ErrorRates | undefined;
  let devMetricsError: string | undefined;
  if (options.referenceText !== undefined) {
    try {
      devMetrics = computeErrorRates(options.referenceText, result.text, { language: options.language });
    } catch (error) {
      devMetricsError = error instanceof Error ? error.message : String(error);
      console.warn(`[Metrics] ${path.basename(audioPath)}: ${devMetricsError}`);
    }
  }

  const transcriptId = store.saveTranscript(result, { rtf, fileSize });
  store.saveSegments(transcriptId, result.segments);
  store.saveQualityMetrics(transcriptId, quality);
  if (devMetrics) {
    store.saveDevMetrics(transcriptId, devMetrics);
  }

  let summary: ConsultationSummary | undefined;
  if (options.summary) {
    if (result.text.trim() === "") {
      console.log("[Summary] skipped: empty transcript");
    } else {
      summary = await summarize(result.text, {
        model: options.summaryModel,
        language: options.language,
        apiKey: deps.apiKey,
        baseURL: deps.baseURL,
      });
      if (summary.success) {
        store.saveSummary(transcriptId, summary);
      }
    }
  }

  let outputFile: string | undefined;
  if (options.outputDir) {
    const stem = path.basename(audioPath, path.extname(audioPath));
    outputFile = path.join(options.outputDir, `${stem}.json`);
    await writeJSON(outputFile, {
      transcriptId,
      ...result,
      rtf,
      fileSize,
      quality,
      devMetrics,
      summary,
    });
  }

  return { transcriptId, result, rtf, fileSize, devMetrics, quality, summary, devMetricsError, outputFile };
};
