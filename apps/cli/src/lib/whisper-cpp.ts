import { spawn } from "child_process";
import { once } from "events";
import os from "os";
import path from "path";
import fs from "fs/promises";
import { z } from "zod";
import { readJSON } from "../utils/file";
import { ToolNotFoundError, isMissingBinary } from "./ffmpeg";

const whisperCppReportSchema = z.object({
  result: z.object({ language: z.string() }).partial().optional(),
  transcription: z.array(
    z.object({
      // milliseconds
      offsets: z.object({
        from: z.number(),
        to: z.number(),
      }),
      text: z.string(),
      tokens: z.array(z.object({ text: z.string(), p: z.number() })).optional(),
    })
  ),
});

export type WhisperCppReport = z.infer<typeof whisperCppReportSchema>;

export interface WhisperCppOptions {
  binPath?: string;
  modelPath: string;
  language?: string; // default: "auto"
  prompt?: string;
  threads?: number;
  extra?: string[];
}

export const createTempDir = () => fs.mkdtemp(path.join(os.tmpdir(), "consult-scribe-"));

/**
 * Runs the whisper.cpp CLI on an audio file and returns its full JSON report.
 */
export const runWhisperCpp = async (
  input: string,
  options: WhisperCppOptions
): Promise<WhisperCppReport> => {
  const {
    binPath = "whisper-cli",
    modelPath,
    language = "auto",
    prompt,
    threads,
    extra = [],
  } = options;

  const output = await createTempDir();
  const outputBase = path.join(output, "result");

  const args = ["-m", modelPath, "-f", input, "-l", language, "-oj", "-ojf", "-of", outputBase, "-np", ...extra];

  if (prompt) {
    args.push("--prompt", prompt);
  }

  if (threads) {
    args.push("-t", String(threads));
  }

  try {
    const child = spawn(binPath, args, {
      stdio: ["ignore", "pipe", "pipe"],
      shell: false,
    });
    console.log(`Running command: ${binPath} ${args.join(" ")}`);

    let stdoutData = "";
    let stderrData = "";
    child.stdout.on("data", (data: Buffer) => {
      stdoutData += data.toString("utf8");
    });
    child.stderr.on("data", (data: Buffer) => {
      stderrData += data.toString("utf8");
    });

    let exitCode: unknown;
    try {
      [exitCode] = await once(child, "close");
    } catch (error) {
      if (isMissingBinary(error)) {
        throw new ToolNotFoundError("whisper.cpp", binPath, "WHISPER_CPP_PATH");
      }
      throw error;
    }

    if (exitCode !== 0) {
      throw new Error(
        `whisper.cpp exited with code ${String(exitCode)}\nStderr:\n${stderrData}\nStdout:\n${stdoutData}`
      );
    }

    const report = await readJSON(`${outputBase}.json`, whisperCppReportSchema);
    if (!report) {
      throw new Error(`whisper.cpp did not write ${outputBase}.json`);
    }
    return report;
  } finally {
    await fs.rm(output, { recursive: true, force: true });
  }
};
