import fs from "fs/promises";
import path from "path";
import { AudioDecodeError, decodeWav, toWaveform, type Waveform } from "@consult-scribe/core";
import { convertToWav } from "../lib/ffmpeg";

export interface LoadAudioOptions {
  ffmpegPath?: string;
}

/**
 * Loads an audio file as a 16 kHz mono waveform. WAV files are decoded in
 * process; everything else, and WAVs the decoder rejects, go through ffmpeg.
 */
export const loadAudio = async (file: string, options: LoadAudioOptions = {}): Promise<Waveform> => {
  if (path.extname(file).toLowerCase() === ".wav") {
    const bytes = await fs.readFile(file);
    try {
      return toWaveform(decodeWav(bytes));
    } catch (error) {
      if (!(error instanceof AudioDecodeError)) throw error;
      console.warn(`[Audio] ${path.basename(file)}: ${error.message}; converting with ffmpeg`);
    }
  }

  const wav = await convertToWav(file, options.ffmpegPath);
  return toWaveform(decodeWav(wav));
};
