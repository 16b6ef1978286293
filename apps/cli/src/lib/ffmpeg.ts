import { spawn } from "child_process";
import { once } from "events";

export class ToolNotFoundError extends Error {
  constructor(tool: string, binPath: string, envVar: string) {
    super(`${tool} not found at "${binPath}". Install it or set ${envVar}.`);
    this.name = "ToolNotFoundError";
  }
}

export const isMissingBinary = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Converts any audio/video file ffmpeg understands into a 16 kHz mono
 * 16-bit WAV, returned as bytes from stdout.
 */
export const convertToWav = async (input: string, ffmpegPath = "ffmpeg"): Promise<Uint8Array> => {
  const args = [
    "-hide_banner",
    "-loglevel",
    "error",
    "-i",
    input,
    "-vn",
    "-ac",
    "1",
    "-ar",
    "16000",
    "-acodec",
    "pcm_s16le",
    "-f",
    "wav",
    "pipe:1",
  ];

  const child = spawn(ffmpegPath, args, {
    stdio: ["ignore", "pipe", "pipe"],
    shell: false,
  });

  const chunks: Buffer[] = [];
  let stderrData = "";
  child.stdout.on("data", (data: Buffer) => {
    chunks.push(data);
  });
  child.stderr.on("data", (data: Buffer) => {
    stderrData += data.toString("utf8");
  });

  let exitCode: unknown;
  try {
    [exitCode] = await once(child, "close");
  } catch (error) {
    if (isMissingBinary(error)) {
      throw new ToolNotFoundError("ffmpeg", ffmpegPath, "FFMPEG_PATH");
    }
    throw error;
  }

  if (exitCode !== 0) {
    throw new Error(`ffmpeg exited with code ${String(exitCode)}\nStderr:\n${stderrData}`);
  }
  return Buffer.concat(chunks);
};
