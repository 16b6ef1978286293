import type { Segment, Speaker } from "../types/transcription";

/** mm:ss.s */
export function formatTimestamp(seconds: number): string {
  const tenths = Math.max(0, Math.round(seconds * 10));
  const minutes = Math.floor(tenths / 600);
  const rest = ((tenths % 600) / 10).toFixed(1).padStart(4, "0");
  return `${String(minutes).padStart(2, "0")}:${rest}`;
}

export function formatConversation(segments: Segment[], speakers: Speaker[] = []): string {
  const names = new Map(speakers.map((s) => [s.id, s.name]));
  return segments
    .map((segment) => {
      const who = segment.speakerId
        ? names.get(segment.speakerId) ?? segment.speakerId
        : "Unknown";
      return `[${formatTimestamp(segment.start)} - ${formatTimestamp(segment.end)}] ${who}: ${segment.text.trim()}`;
    })
    .join("\n");
}

/** Concatenated text per speaker id, in order of first appearance. */
export function groupTextBySpeaker(segments: Segment[]): Record<string, string> {
  const grouped: Record<string, string> = {};
  for (const segment of segments) {
    const id = segment.speakerId ?? "UNKNOWN";
    const text = segment.text.trim();
    if (text === "") continue;
    grouped[id] = grouped[id] ? `${grouped[id]} ${text}` : text;
  }
  return grouped;
}
