import { AudioDecodeError } from "./errors";
import type { DecodedAudio } from "../types/audio";

const FORMAT_PCM = 1;
const FORMAT_FLOAT = 3;
const FORMAT_EXTENSIBLE = 0xfffe;

interface FmtChunk {
  format: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  blockAlign: number;
}

function readFmt(view: DataView, offset: number, size: number): FmtChunk {
  if (size < 16) {
    throw new AudioDecodeError(`fmt chunk too small (${size} bytes)`);
  }
  let format = view.getUint16(offset, true);
  const channels = view.getUint16(offset + 2, true);
  const sampleRate = view.getUint32(offset + 4, true);
  const blockAlign = view.getUint16(offset + 12, true);
  const bitsPerSample = view.getUint16(offset + 14, true);

  if (format === FORMAT_EXTENSIBLE) {
    if (size < 40) {
      throw new AudioDecodeError("WAVE_FORMAT_EXTENSIBLE fmt chunk is truncated");
    }
    // first two bytes of the sub-format GUID carry the real format tag
    format = view.getUint16(offset + 24, true);
  }

  return { format, channels, sampleRate, bitsPerSample, blockAlign };
}

function sampleReader(fmt: FmtChunk): (view: DataView, offset: number) => number {
  const { format, bitsPerSample } = fmt;
  if (format === FORMAT_PCM) {
    switch (bitsPerSample) {
      case 8:
        return (view, offset) => (view.getUint8(offset) - 128) / 128;
      case 16:
        return (view, offset) => view.getInt16(offset, true) / 32768;
      case 24:
        return (view, offset) => {
          const value =
            view.getUint8(offset) |
            (view.getUint8(offset + 1) << 8) |
            (view.getInt8(offset + 2) << 16);
          return value / 8388608;
        };
      case 32:
        return (view, offset) => view.getInt32(offset, true) / 2147483648;
    }
  }
  if (format === FORMAT_FLOAT) {
    if (bitsPerSample === 32) return (view, offset) => view.getFloat32(offset, true);
    if (bitsPerSample === 64) return (view, offset) => view.getFloat64(offset, true);
  }
  throw new AudioDecodeError(
    `Unsupported WAV encoding: format ${format}, ${bitsPerSample} bits per sample`
  );
}

/**
 * Decodes a RIFF/WAVE buffer into per-channel float samples in [-1, 1].
 * Chunks other than `fmt ` and `data` are skipped.
 */
export function decodeWav(buffer: Uint8Array): DecodedAudio {
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  if (
    buffer.byteLength < 12 ||
    readTag(view, 0) !== "RIFF" ||
    readTag(view, 8) !== "WAVE"
  ) {
    throw new AudioDecodeError("Not a RIFF/WAVE file");
  }

  let fmt: FmtChunk | undefined;
  let dataOffset = -1;
  let dataSize = 0;
  let offset = 12;

  while (offset + 8 <= buffer.byteLength) {
    const id = readTag(view, offset);
    const size = view.getUint32(offset + 4, true);
    const body = offset + 8;
    if (id === "fmt ") {
      fmt = readFmt(view, body, size);
    } else if (id === "data") {
      dataOffset = body;
      // a WAV written to a pipe declares 0 or 0xFFFFFFFF; read to the end
      const available = buffer.byteLength - body;
      dataSize = size === 0 || size === 0xffffffff ? available : Math.min(size, available);
      break;
    }
    offset = body + size + (size % 2);
  }

  if (!fmt) throw new AudioDecodeError("Missing fmt chunk");
  if (dataOffset < 0) throw new AudioDecodeError("Missing data chunk");
  if (fmt.channels < 1) throw new AudioDecodeError("WAV declares zero channels");

  const read = sampleReader(fmt);
  const bytesPerSample = fmt.bitsPerSample / 8;
  const blockAlign = fmt.blockAlign || bytesPerSample * fmt.channels;
  const frameCount = Math.floor(dataSize / blockAlign);

  const channels: Float32Array[] = [];
  for (let c = 0; c < fmt.channels; c++) {
    channels.push(new Float32Array(frameCount));
  }
  for (let i = 0; i < frameCount; i++) {
    const frameOffset = dataOffset + i * blockAlign;
    for (let c = 0; c < fmt.channels; c++) {
      channels[c][i] = read(view, frameOffset + c * bytesPerSample);
    }
  }

  return { sampleRate: fmt.sampleRate, channels };
}

/** 16-bit PCM mono WAV with the canonical 44-byte header. */
export function encodeWav(samples: Float32Array, sampleRate: number): Uint8Array {
  const dataSize = samples.length * 2;
  const out = new Uint8Array(44 + dataSize);
  const view = new DataView(out.buffer);

  writeTag(view, 0, "RIFF");
  view.setUint32(4, 36 + dataSize, true);
  writeTag(view, 8, "WAVE");
  writeTag(view, 12, "fmt ");
  view.setUint32(16, 16, true);
  view.setUint16(20, FORMAT_PCM, true);
  view.setUint16(22, 1, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * 2, true);
  view.setUint16(32, 2, true);
  view.setUint16(34, 16, true);
  writeTag(view, 36, "data");
  view.setUint32(40, dataSize, true);

  for (let i = 0; i < samples.length; i++) {
    const s = Math.max(-1, Math.min(1, samples[i]));
    view.setInt16(44 + i * 2, s < 0 ? Math.round(s * 32768) : Math.round(s * 32767), true);
  }
  return out;
}

function readTag(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3)
  );
}

function writeTag(view: DataView, offset: number, tag: string): void {
  for (let i = 0; i < 4; i++) {
    view.setUint8(offset + i, tag.charCodeAt(i));
  }
}
