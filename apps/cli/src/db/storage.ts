import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import type {
  ConsultationSummary,
  ErrorRates,
  QualityMetrics,
  Segment,
  TranscriptionResult,
} from "@consult-scribe/core";
import { SCHEMA } from "./schema";

interface TranscriptRow {
  id: number;
  audio_file: string;
  model: string;
  language: string | null;
  text: string;
  diarization_enabled: number;
  num_speakers: number;
  processing_time: number;
  audio_duration: number | null;
  rtf: number;
  file_size: number | null;
  noise_reduction: number;
  vad_filter: number;
  skipped_reason: string | null;
  created_at: string;
}

interface SegmentRow {
  id: number;
  transcript_id: number;
  speaker: string | null;
  text: string;
  start_sec: number;
  end_sec: number;
  confidence: number | null;
}

interface DevMetricsRow {
  wer: number;
  cer: number;
  ref_chars: number;
  hyp_chars: number;
}

interface QualityRow {
  avg_confidence: number;
  min_confidence: number;
  low_confidence_ratio: number;
  silence_ratio: number;
  audio_rms_energy: number;
  clipping_detected: number;
  word_count: number;
}

interface SummaryRow {
  id: number;
  symptoms: string;
  diagnosis: string;
  medication: string;
  care_advice: string;
  model: string;
  summary_time: number;
}

export interface TranscriptRecord {
  id: number;
  audioFile: string;
  model: string;
  language: string | null;
  text: string;
  diarizationEnabled: boolean;
  numSpeakers: number;
  processingTime: number;
  audioDuration: number | null;
  rtf: number;
  fileSize: number | null;
  noiseReduction: boolean;
  vadFilter: boolean;
  skippedReason: string | null;
  createdAt: string;
}

export interface StoredSegment {
  id: number;
  speaker: string | null;
  text: string;
  start: number;
  end: number;
  confidence: number | null;
}

export type DevMetrics = Pick<ErrorRates, "wer" | "cer" | "refChars" | "hypChars">;
export type StoredSummary = Omit<ConsultationSummary, "success" | "error"> & { id: number };

export interface StoredTranscript {
  transcript: TranscriptRecord;
  segments: StoredSegment[];
  devMetrics: DevMetrics | null;
  quality: QualityMetrics | null;
  summary: StoredSummary | null;
}

export interface SaveTranscriptExtras {
  rtf: number;
  /** Bytes */
  fileSize?: number;
}

const toRecord = (row: TranscriptRow): TranscriptRecord => ({
  id: row.id,
  audioFile: row.audio_file,
  model: row.model,
  language: row.language,
  text: row.text,
  diarizationEnabled: row.diarization_enabled === 1,
  numSpeakers: row.num_speakers,
  processingTime: row.processing_time,
  audioDuration: row.audio_duration,
  rtf: row.rtf,
  fileSize: row.file_size,
  noiseReduction: row.noise_reduction === 1,
  vadFilter: row.vad_filter === 1,
  skippedReason: row.skipped_reason,
  createdAt: row.created_at,
});

/**
 * SQLite persistence for transcripts and everything computed from them.
 * Pass ":memory:" for a throwaway database.
 */
export class TranscriptStore {
  private readonly db: Database.Database;

  constructor(
    dbPath: string,
    private readonly now: () => Date = () => new Date()
  ) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("foreign_keys = ON");
  }

  init(): void {
    this.db.exec(SCHEMA);
  }

  saveTranscript(result: TranscriptionResult, extras: SaveTranscriptExtras): number {
    const info = this.db
      .prepare(
        `INSERT INTO transcripts (
          audio_file, model, language, text, diarization_enabled, num_speakers,
          processing_time, audio_duration, rtf, file_size, noise_reduction,
          vad_filter, skipped_reason, created_at
        ) VALUES (
          @audioFile, @model, @language, @text, @diarizationEnabled, @numSpeakers,
          @processingTime, @audioDuration, @rtf, @fileSize, @noiseReduction,
          @vadFilter, @skippedReason, @createdAt
        )`
      )
      .run({
        audioFile: result.audioFile,
        model: result.model,
        language: result.language ?? null,
        text: result.text,
        diarizationEnabled: result.speakers !== undefined ? 1 : 0,
        numSpeakers: result.numSpeakers,
        processingTime: result.processingTime,
        audioDuration: result.audioDuration,
        rtf: extras.rtf,
        fileSize: extras.fileSize ?? null,
        noiseReduction: result.preprocessing.noiseReduction ? 1 : 0,
        vadFilter: result.preprocessing.vad ? 1 : 0,
        skippedReason: result.skippedReason ?? null,
        createdAt: result.timestamp,
      });
    return Number(info.lastInsertRowid);
  }

  saveSegments(transcriptId: number, segments: Segment[]): void {
    if (segments.length === 0) return;

    const insert = this.db.prepare(
      `INSERT INTO segments (transcript_id, speaker, text, start_sec, end_sec, confidence)
       VALUES (?, ?, ?, ?, ?, ?)`
    );
    const insertAll = this.db.transaction((rows: Segment[]) => {
      for (const segment of rows) {
        insert.run(
          transcriptId,
          segment.speakerId ?? null,
          segment.text,
          segment.start,
          segment.end,
          segment.confidence ?? null
        );
      }
    });
    insertAll(segments);
  }

  saveDevMetrics(transcriptId: number, metrics: DevMetrics): number {
    const info = this.db
      .prepare(
        `INSERT INTO dev_metrics (transcript_id, wer, cer, ref_chars, hyp_chars, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(transcriptId, metrics.wer, metrics.cer, metrics.refChars, metrics.hypChars, this.timestamp());
    return Number(info.lastInsertRowid);
  }

  saveQualityMetrics(transcriptId: number, metrics: QualityMetrics): number {
    const info = this.db
      .prepare(
        `INSERT INTO quality_metrics (
          transcript_id, avg_confidence, min_confidence, low_confidence_ratio,
          silence_ratio, audio_rms_energy, clipping_detected, word_count, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        transcriptId,
        metrics.avgConfidence,
        metrics.minConfidence,
        metrics.lowConfidenceRatio,
        metrics.silenceRatio,
        metrics.audioRmsEnergy,
        metrics.clippingDetected ? 1 : 0,
        metrics.wordCount,
        this.timestamp()
      );
    return Number(info.lastInsertRowid);
  }

  saveSummary(transcriptId: number, summary: ConsultationSummary): number {
    const info = this.db
      .prepare(
        `INSERT INTO summaries (
          transcript_id, symptoms, diagnosis, medication, care_advice, model, summary_time, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        transcriptId,
        summary.symptoms,
        summary.diagnosis,
        summary.medication,
        summary.careAdvice,
        summary.model,
        summary.summaryTime,
        this.timestamp()
      );
    return Number(info.lastInsertRowid);
  }

  /** Newest first. */
  listTranscripts(limit = 10): TranscriptRecord[] {
    return this.db
      .prepare<[number], TranscriptRow>(
        "SELECT * FROM transcripts ORDER BY created_at DESC, id DESC LIMIT ?"
      )
      .all(limit)
      .map(toRecord);
  }

  getTranscript(id: number): StoredTranscript | null {
    const row = this.db
      .prepare<[number], TranscriptRow>("SELECT * FROM transcripts WHERE id = ?")
      .get(id);
    if (!row) return null;

    const segments = this.db
      .prepare<[number], SegmentRow>("SELECT * FROM segments WHERE transcript_id = ? ORDER BY start_sec, id")
      .all(id)
      .map((s) => ({
        id: s.id,
        speaker: s.speaker,
        text: s.text,
        start: s.start_sec,
        end: s.end_sec,
        confidence: s.confidence,
      }));

    const dev = this.db
      .prepare<[number], DevMetricsRow>(
        "SELECT wer, cer, ref_chars, hyp_chars FROM dev_metrics WHERE transcript_id = ? ORDER BY id DESC LIMIT 1"
      )
      .get(id);

    const quality = this.db
      .prepare<[number], QualityRow>(
        `SELECT avg_confidence, min_confidence, low_confidence_ratio, silence_ratio,
                audio_rms_energy, clipping_detected, word_count
         FROM quality_metrics WHERE transcript_id = ? ORDER BY id DESC LIMIT 1`
      )
      .get(id);

    const summary = this.db
      .prepare<[number], SummaryRow>(
        `SELECT id, symptoms, diagnosis, medication, care_advice, model, summary_time
         FROM summaries WHERE transcript_id = ? ORDER BY id DESC LIMIT 1`
      )
      .get(id);

    return {
      transcript: toRecord(row),
      segments,
      devMetrics: dev
        ? { wer: dev.wer, cer: dev.cer, refChars: dev.ref_chars, hypChars: dev.hyp_chars }
        : null,
      quality: quality
        ? {
            avgConfidence: quality.avg_confidence,
            minConfidence: quality.min_confidence,
            lowConfidenceRatio: quality.low_confidence_ratio,
            silenceRatio: quality.silence_ratio,
            audioRmsEnergy: quality.audio_rms_energy,
            clippingDetected: quality.clipping_detected === 1,
            wordCount: quality.word_count,
          }
        : null,
      summary: summary
        ? {
            id: summary.id,
            symptoms: summary.symptoms,
            diagnosis: summary.diagnosis,
            medication: summary.medication,
            careAdvice: summary.care_advice,
            model: summary.model,
            summaryTime: summary.summary_time,
          }
        : null,
    };
  }

  close(): void {
    this.db.close();
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
