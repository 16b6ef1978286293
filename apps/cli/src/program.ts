import fs from "fs/promises";
import { Command, InvalidArgumentError, Option } from "commander";
import { summarizeConsultation } from "@consult-scribe/ai";
import { MODEL_CHOICES, getModel, loadConfig, type AppConfig } from "./config";
import { createEngine } from "./engines";
import { loadAudio } from "./audio/load-audio";
import { TranscriptStore } from "./db/storage";
import { processAudioFile, type PipelineDeps, type PipelineOptions } from "./tools/transcribe";
import { processBatch } from "./tools/batch";
import {
  formatBatchTable,
  formatHistory,
  formatResult,
  formatStoredTranscript,
  printLines,
} from "./report/print";
import { readText } from "./utils/file";

export interface TranscribeCommandOptions {
  model?: string;
  refFile?: string;
  refDir?: string;
  noiseReduction: boolean;
  vad: boolean;
  diarize: boolean;
  numSpeakers?: number;
  summary: boolean;
  summaryModel?: string;
  language?: string;
  prompt?: string;
  db?: string;
  output?: string;
  showAlignment: boolean;
}

export interface CommandDeps {
  createEngine: typeof createEngine;
  openStore: (dbPath: string) => TranscriptStore;
  loadAudio: PipelineDeps["loadAudio"];
  summarize: NonNullable<PipelineDeps["summarize"]>;
}

const openStore = (dbPath: string) => {
  const store = new TranscriptStore(dbPath);
  store.init();
  return store;
};

const defaultDeps = (config: AppConfig): CommandDeps => ({
  createEngine,
  openStore,
  loadAudio: (file) => loadAudio(file, { ffmpegPath: config.ffmpegPath }),
  summarize: summarizeConsultation,
});

const parsePositiveInt = (value: string) => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
};

const statOrNull = (file: string) => fs.stat(file).catch(() => null);

/**
 * Runs the transcribe command for one file or a directory of files.
 * Resolves to the process exit code.
 */
export async function runTranscribe(
  audioPath: string,
  options: TranscribeCommandOptions,
  config: AppConfig,
  deps: CommandDeps = defaultDeps(config)
): Promise<number> {
  const stats = await statOrNull(audioPath);
  if (!stats || (!stats.isFile() && !stats.isDirectory())) {
    console.error(`Invalid audio path: ${audioPath}`);
    return 1;
  }

  const modelName = options.model ?? config.defaultModel;
  // unknown names throw ConfigError before anything is opened
  const selected = getModel(modelName);
  const dbPath = options.db ?? config.dbPath;
  const language = options.language ?? config.language;

  if (options.numSpeakers !== undefined && !options.diarize) {
    console.warn("[Config] --num-speakers has no effect without --diarize");
  }

  const engine = deps.createEngine(selected.choice, config);
  const store = deps.openStore(dbPath);
  const pipelineDeps: PipelineDeps = {
    engine,
    store,
    loadAudio: deps.loadAudio,
    summarize: deps.summarize,
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl,
  };
  const pipelineOptions: PipelineOptions = {
    language,
    prompt: options.prompt ?? config.initialPrompt,
    noiseReduction: options.noiseReduction,
    vad: options.vad,
    diarize: options.diarize,
    numSpeakers: options.numSpeakers,
    summary: options.summary,
    summaryModel: options.summaryModel ?? config.summaryModel,
    outputDir: options.output,
    minAudioLength: config.minAudioLength,
    silenceRmsThreshold: config.silenceRmsThreshold,
  };

  try {
    if (stats.isDirectory()) {
      console.log(`Transcribing directory ${audioPath} with ${engine.modelName}...`);
      const entries = await processBatch(
        audioPath,
        { ...pipelineOptions, refDir: options.refDir },
        pipelineDeps,
        (entry, index, total) => {
          const status = entry.ok ? `done (id ${entry.outcome.transcriptId})` : `failed: ${entry.error}`;
          console.log(`[${index + 1}/${total}] ${entry.file} ${status}`);
        }
      );
      printLines(formatBatchTable(entries));
      return entries.some((entry) => !entry.ok) ? 1 : 0;
    }

    const referenceText = options.refFile ? await readText(options.refFile) : undefined;
    console.log(`Transcribing ${audioPath} with ${engine.modelName}...`);
    const outcome = await processAudioFile(audioPath, { ...pipelineOptions, referenceText }, pipelineDeps);
    printLines(
      formatResult(outcome, {
        dbPath,
        referenceText,
        showAlignment: options.showAlignment,
        language,
      })
    );
    return 0;
  } finally {
    store.close();
  }
}

export function runHistory(limit: number, dbPath: string, open: (dbPath: string) => TranscriptStore = openStore) {
  const store = open(dbPath);
  try {
    printLines(formatHistory(store.listTranscripts(limit)));
  } finally {
    store.close();
  }
}

export function runShow(id: number, dbPath: string, open: (dbPath: string) => TranscriptStore = openStore): number {
  const store = open(dbPath);
  try {
    const stored = store.getTranscript(id);
    if (!stored) {
      console.error(`Transcript ${id} not found`);
      return 1;
    }
    printLines(formatStoredTranscript(stored));
    return 0;
  } finally {
    store.close();
  }
}

export function buildProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();
  // read lazily so --help works with a broken environment
  const config = () => loadConfig(env);

  program
    .name("consult-scribe")
    .description("Transcribe, score and summarize medical consultation recordings");

  program
    .command("transcribe")
    .description("Transcribe an audio file, or every audio file in a directory")
    .argument("<audioPath>", "audio file or directory")
    .addOption(new Option("-m, --model <name>", "transcription model").choices(MODEL_CHOICES))
    .option("--ref-file <file>", "reference transcript for WER/CER")
    .option("--ref-dir <dir>", "directory of <name>.txt references (batch mode)")
    .option("--no-noise-reduction", "skip spectral noise reduction (local models)")
    .option("--vad", "trim non-speech before transcribing (local models)", false)
    .option("--diarize", "label speakers", false)
    .option("--num-speakers <n>", "expected number of speakers", parsePositiveInt)
    .option("--no-summary", "skip the consultation summary")
    .option("--summary-model <id>", "model used for the summary")
    .option("-l, --language <code>", "spoken language")
    .option("--prompt <text>", "initial prompt passed to the model")
    .option("--db <path>", "SQLite database file")
    .option("-o, --output <dir>", "also write <name>.json results here")
    .option("--show-alignment", "print the word alignment against the reference", false)
    .action(async (audioPath: string, options: TranscribeCommandOptions) => {
      process.exitCode = await runTranscribe(audioPath, options, config());
    });

  program
    .command("history")
    .description("List recent transcripts")
    .option("-n, --limit <n>", "number of rows", parsePositiveInt, 10)
    .option("--db <path>", "SQLite database file")
    .action((options: { limit: number; db?: string }) => {
      runHistory(options.limit, options.db ?? config().dbPath);
    });

  program
    .command("show")
    .description("Show a stored transcript with its metrics and summary")
    .argument("<id>", "transcript id", parsePositiveInt)
    .option("--db <path>", "SQLite database file")
    .action((id: number, options: { db?: string }) => {
      process.exitCode = runShow(id, options.db ?? config().dbPath);
    });

  return program;
}
