import { extractEmbedding } from "./embedding";
import { clusterEmbeddings, type ClusterOptions } from "./cluster";
import { sliceWaveform } from "../audio/waveform";
import type { Waveform } from "../types/audio";
import type { Segment, Speaker } from "../types/transcription";

export type DiarizeOptions = ClusterOptions;

export interface DiarizationResult {
  segments: Segment[];
  speakers: Speaker[];
  numSpeakers: number;
}

export function speakerId(index: number): string {
  return `SPEAKER_${String(index).padStart(2, "0")}`;
}

/**
 * Assigns a speaker to every segment by clustering the voice embedding of
 * each segment's audio. Segments too short to embed take the speaker of
 * the segment before them.
 */
export function diarizeSegments(
  waveform: Waveform,
  segments: Segment[],
  options: DiarizeOptions = {}
): DiarizationResult {
  if (segments.length === 0) {
    return { segments: [], speakers: [], numSpeakers: 0 };
  }

  const embedded: { index: number; vector: Float64Array }[] = [];
  segments.forEach((segment, index) => {
    const slice = sliceWaveform(waveform, segment.start, segment.end);
    const vector = extractEmbedding(slice, waveform.sampleRate);
    if (vector) embedded.push({ index, vector });
  });

  const labels = clusterEmbeddings(
    embedded.map((e) => e.vector),
    options
  );
  const labelByIndex = new Map<number, number>(embedded.map((e, i) => [e.index, labels[i]]));

  let current = labels.length > 0 ? labels[0] : 0;
  const labeled = segments.map((segment, index) => {
    current = labelByIndex.get(index) ?? current;
    return { ...segment, speakerId: speakerId(current) };
  });

  const count = labels.length > 0 ? Math.max(...labels) + 1 : 1;
  const speakers: Speaker[] = Array.from({ length: count }, (_, i) => ({
    id: speakerId(i),
    name: `Speaker ${i + 1}`,
  }));

  return { segments: labeled, speakers, numSpeakers: count };
}
