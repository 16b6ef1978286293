export const SCHEMA = `
CREATE TABLE IF NOT EXISTS transcripts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  audio_file TEXT NOT NULL,
  model TEXT NOT NULL,
  language TEXT,
  text TEXT NOT NULL,
  diarization_enabled INTEGER NOT NULL DEFAULT 0,
  num_speakers INTEGER NOT NULL DEFAULT 0,
  processing_time REAL NOT NULL,
  audio_duration REAL,
  rtf REAL NOT NULL DEFAULT 0,
  file_size INTEGER,
  noise_reduction INTEGER NOT NULL DEFAULT 0,
  vad_filter INTEGER NOT NULL DEFAULT 0,
  skipped_reason TEXT,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS segments (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  transcript_id INTEGER NOT NULL REFERENCES transcripts(id) ON DELETE CASCADE,
  speaker TEXT,
  text TEXT NOT NULL,
  start_sec REAL NOT NULL,
  end_sec REAL NOT NULL,
  confidence REAL
);

CREATE TABLE IF NOT EXISTS dev_metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  transcript_id INTEGER NOT NULL REFERENCES transcripts(id) ON DELETE CASCADE,
  wer REAL NOT NULL,
  cer REAL NOT NULL,
  ref_chars INTEGER NOT NULL,
  hyp_chars INTEGER NOT NULL,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS quality_metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  transcript_id INTEGER NOT NULL REFERENCES transcripts(id) ON DELETE CASCADE,
  avg_confidence REAL NOT NULL,
  min_confidence REAL NOT NULL,
  low_confidence_ratio REAL NOT NULL,
  silence_ratio REAL NOT NULL,
  audio_rms_energy REAL NOT NULL,
  clipping_detected INTEGER NOT NULL,
  word_count INTEGER NOT NULL,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS summaries (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  transcript_id INTEGER NOT NULL REFERENCES transcripts(id) ON DELETE CASCADE,
  symptoms TEXT NOT NULL,
  diagnosis TEXT NOT NULL,
  medication TEXT NOT NULL,
  care_advice TEXT NOT NULL,
  model TEXT NOT NULL,
  summary_time REAL NOT NULL,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_segments_transcript ON segments(transcript_id);
CREATE INDEX IF NOT EXISTS idx_transcripts_created ON transcripts(created_at);
`;
