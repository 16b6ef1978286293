import fs from "fs/promises";
import path from "path";
import { fileExists, readText } from "../utils/file";
import { processAudioFile, type PipelineDeps, type PipelineOptions, type PipelineResult } from "./transcribe";

export const AUDIO_EXTENSIONS = [".wav", ".mp3", ".m4a", ".flac", ".ogg", ".webm", ".mp4"];

export type BatchEntry =
  | { file: string; ok: true; outcome: PipelineResult }
  | { file: string; ok: false; error: string };

export interface BatchOptions extends Omit<PipelineOptions, "referenceText"> {
  /** Directory holding `<stem>.txt` references */
  refDir?: string;
}

/** Audio files directly inside `dir`, sorted by name. */
export const listAudioFiles = async (dir: string): Promise<string[]> => {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && AUDIO_EXTENSIONS.includes(path.extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b))
    .map((name) => path.join(dir, name));
};

const findReference = async (refDir: string | undefined, audioFile: string) => {
  if (!refDir) return undefined;
  const refFile = path.join(refDir, `${path.basename(audioFile, path.extname(audioFile))}.txt`);
  return (await fileExists(refFile)) ? readText(refFile) : undefined;
};

/**
 * Runs every audio file of a directory. A failing file is recorded and
 * the batch moves on.
 */
export const processBatch = async (
  dir: string,
  options: BatchOptions,
  deps: PipelineDeps,
  onEntry?: (entry: BatchEntry, index: number, total: number) => void
): Promise<BatchEntry[]> => {
  const files = await listAudioFiles(dir);
  const { refDir, ...pipelineOptions } = options;
  const entries: BatchEntry[] = [];

  for (const [index, file] of files.entries()) {
    let entry: BatchEntry;
    try {
      const referenceText = await findReference(refDir, file);
      const outcome = await processAudioFile(file, { ...pipelineOptions, referenceText }, deps);
      entry = { file, ok: true, outcome };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("[Batch Error]", {
        file,
        error: message,
        timestamp: new Date().toISOString(),
      });
      entry = { file, ok: false, error: message };
    }
    entries.push(entry);
    onEntry?.(entry, index, files.length);
  }

  return entries;
};
