/** Real-time factor: processing seconds per second of audio, 4 decimals. */
export function computeRtf(processingTime: number, audioLength: number | null | undefined): number {
  if (audioLength == null || audioLength <= 0) {
    return 0;
  }
  return Math.round((processingTime / audioLength) * 10000) / 10000;
}

export function describeRtf(rtf: number): string {
  if (rtf <= 0) {
    return "RTF unavailable";
  }
  if (rtf <= 1) {
    return `${(1 / rtf).toFixed(2)}x faster than real time`;
  }
  return `${rtf.toFixed(2)}x slower than real time`;
}
