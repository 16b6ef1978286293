import path from "path";
import {
  alignTranscripts,
  describeRtf,
  formatAlignment,
  formatConversation,
} from "@consult-scribe/core";
import { formatSummary } from "@consult-scribe/ai";
import type { PipelineResult } from "../tools/transcribe";
import type { BatchEntry } from "../tools/batch";
import type { StoredTranscript, TranscriptRecord } from "../db/storage";

const RULE = "=".repeat(50);

const heading = (title: string) => ["", RULE, title, RULE];

export const formatFileSize = (bytes: number) => `${(bytes / (1024 * 1024)).toFixed(2)} MB`;

export function formatPerformance(outcome: Pick<PipelineResult, "fileSize" | "rtf" | "result">): string[] {
  const { processingTime, audioDuration } = outcome.result;
  const lines = ["", "Performance", `  File size: ${formatFileSize(outcome.fileSize)}`];
  if (audioDuration !== null && audioDuration > 0) {
    const speed = outcome.rtf > 0 ? ` (${describeRtf(outcome.rtf)})` : "";
    lines.push(`  RTF: ${outcome.rtf.toFixed(4)}${speed}`);
    lines.push(`  Processing time: ${processingTime.toFixed(2)}s / audio length: ${audioDuration.toFixed(2)}s`);
  } else {
    lines.push(`  Processing time: ${processingTime.toFixed(2)}s (RTF unavailable: unknown audio length)`);
  }
  return lines;
}

export interface ResultReportOptions {
  dbPath: string;
  referenceText?: string;
  showAlignment?: boolean;
  language?: string;
}

export function formatResult(outcome: PipelineResult, options: ResultReportOptions): string[] {
  const { result } = outcome;
  const lines: string[] = [...heading("Transcript")];

  if (result.skippedReason) {
    lines.push(`(skipped: ${result.skippedReason === "too_short" ? "audio too short" : "audio too quiet"})`);
  } else if (result.speakers && result.speakers.length > 0) {
    lines.push(`Speakers: ${result.numSpeakers}`);
    lines.push(formatConversation(result.segments, result.speakers));
  } else {
    lines.push(result.text);
  }

  lines.push(...formatPerformance(outcome));
  lines.push(`Saved to ${options.dbPath} (transcript_id=${outcome.transcriptId})`);
  if (outcome.outputFile) {
    lines.push(`Result written to ${outcome.outputFile}`);
  }

  if (outcome.summary) {
    lines.push(...heading("Summary"));
    lines.push(formatSummary(outcome.summary));
    if (!outcome.summary.success) {
      lines.push(`Summary failed: ${outcome.summary.error ?? "unknown error"}`);
    }
  }

  if (outcome.devMetrics) {
    const m = outcome.devMetrics;
    lines.push("", "Metrics");
    lines.push(`  WER: ${m.wer.toFixed(4)}  CER: ${m.cer.toFixed(4)}`);
    lines.push(`  Reference chars: ${m.refChars}  Hypothesis chars: ${m.hypChars}`);
    lines.push(`  Substitutions: ${m.substitutions}  Deletions: ${m.deletions}  Insertions: ${m.insertions}`);
    if (options.showAlignment && options.referenceText !== undefined) {
      lines.push(`  Alignment: ${formatAlignment(alignTranscripts(options.referenceText, result.text, { language: options.language }))}`);
    }
  } else if (outcome.devMetricsError) {
    lines.push("", "Metrics", `  unavailable: ${outcome.devMetricsError}`);
  }

  const q = outcome.quality;
  lines.push("", "Quality");
  lines.push(
    `  Confidence avg/min: ${q.avgConfidence.toFixed(3)}/${q.minConfidence.toFixed(3)}  low: ${(q.lowConfidenceRatio * 100).toFixed(1)}%`
  );
  lines.push(
    `  Silence: ${(q.silenceRatio * 100).toFixed(1)}%  RMS: ${q.audioRmsEnergy.toFixed(4)}  clipping: ${q.clippingDetected ? "yes" : "no"}  words: ${q.wordCount}`
  );

  return lines;
}

const pad = (value: string, width: number) => value.padEnd(width);
const mean = (values: number[]) => values.reduce((acc, v) => acc + v, 0) / values.length;

export function formatBatchTable(entries: BatchEntry[]): string[] {
  const lines = [...heading("Batch results")];
  lines.push(`${pad("File", 32)} ${pad("RTF", 8)} ${pad("WER", 8)} ${pad("CER", 8)}`.trimEnd());

  const rtfs: number[] = [];
  const wers: number[] = [];
  const cers: number[] = [];
  for (const entry of entries) {
    const name = pad(path.basename(entry.file), 32);
    if (!entry.ok) {
      lines.push(`${name} FAILED: ${entry.error}`);
      continue;
    }
    const { rtf, devMetrics } = entry.outcome;
    if (rtf > 0) rtfs.push(rtf);
    if (devMetrics) {
      wers.push(devMetrics.wer);
      cers.push(devMetrics.cer);
    }
    lines.push(
      `${name} ${pad(rtf > 0 ? rtf.toFixed(4) : "-", 8)} ${pad(devMetrics ? devMetrics.wer.toFixed(4) : "-", 8)} ${pad(
        devMetrics ? devMetrics.cer.toFixed(4) : "-",
        8
      )}`.trimEnd()
    );
  }

  const avg = (values: number[]) => (values.length > 0 ? mean(values).toFixed(4) : "-");
  lines.push(`${pad("Mean", 32)} ${pad(avg(rtfs), 8)} ${pad(avg(wers), 8)} ${pad(avg(cers), 8)}`.trimEnd());

  const failed = entries.filter((entry) => !entry.ok).length;
  lines.push(`${entries.length - failed} succeeded, ${failed} failed`);
  return lines;
}

export function formatHistory(records: TranscriptRecord[]): string[] {
  if (records.length === 0) {
    return ["No transcripts stored yet."];
  }
  return records.map(
    (r) =>
      `#${r.id}  ${r.createdAt.slice(0, 19).replace("T", " ")}  ${path.basename(r.audioFile)}  ${r.model}  RTF ${
        r.rtf > 0 ? r.rtf.toFixed(4) : "-"
      }`
  );
}

export function formatStoredTranscript(stored: StoredTranscript): string[] {
  const { transcript: t } = stored;
  const lines = [
    `Transcript #${t.id}`,
    `  File: ${t.audioFile}`,
    `  Model: ${t.model}  Language: ${t.language ?? "-"}`,
    `  Created: ${t.createdAt}`,
    `  Processing: ${t.processingTime.toFixed(2)}s  Audio: ${t.audioDuration === null ? "-" : `${t.audioDuration.toFixed(2)}s`}  RTF: ${t.rtf.toFixed(4)}`,
    `  Noise reduction: ${t.noiseReduction ? "on" : "off"}  VAD: ${t.vadFilter ? "on" : "off"}  Speakers: ${
      t.diarizationEnabled ? t.numSpeakers : "-"
    }`,
  ];
  if (t.skippedReason) {
    lines.push(`  Skipped: ${t.skippedReason}`);
  }

  lines.push(...heading("Transcript"), t.text);

  if (stored.segments.length > 0) {
    lines.push("", "Segments");
    for (const s of stored.segments) {
      const speaker = s.speaker ? ` ${s.speaker}` : "";
      lines.push(`  [${s.start.toFixed(2)}-${s.end.toFixed(2)}]${speaker} ${s.text}`);
    }
  }

  if (stored.devMetrics) {
    lines.push("", "Metrics", `  WER: ${stored.devMetrics.wer.toFixed(4)}  CER: ${stored.devMetrics.cer.toFixed(4)}`);
  }
  if (stored.quality) {
    lines.push(
      "",
      "Quality",
      `  Confidence avg: ${stored.quality.avgConfidence.toFixed(3)}  words: ${stored.quality.wordCount}`
    );
  }
  if (stored.summary) {
    lines.push(...heading("Summary"), formatSummary({ ...stored.summary, success: true }));
  }
  return lines;
}

export const printLines = (lines: string[]) => {
  for (const line of lines) console.log(line);
};
