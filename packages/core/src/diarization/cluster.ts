export interface ClusterOptions {
  /** Exact number of clusters to produce, when known */
  numSpeakers?: number;
  maxSpeakers?: number;
  /** Average-linkage distance above which clusters stop merging */
  distanceThreshold?: number;
}

export const DEFAULT_DISTANCE_THRESHOLD = 1.0;

/** Root-mean-square difference between two embeddings. */
export function embeddingDistance(a: Float64Array, b: Float64Array): number {
  let total = 0;
  for (let d = 0; d < a.length; d++) {
    const diff = a[d] - b[d];
    total += diff * diff;
  }
  return Math.sqrt(total / a.length);
}

/**
 * Agglomerative clustering with average linkage. Merging continues while
 * the closest pair is within the threshold, or while there are more
 * clusters than allowed; `numSpeakers` forces an exact count instead.
 * Returns one label per vector, numbered by first appearance.
 */
export function clusterEmbeddings(vectors: Float64Array[], options: ClusterOptions = {}): number[] {
  if (vectors.length === 0) return [];

  const maxSpeakers = Math.max(1, options.maxSpeakers ?? 4);
  const threshold = options.distanceThreshold ?? DEFAULT_DISTANCE_THRESHOLD;
  const target =
    options.numSpeakers !== undefined
      ? Math.max(1, Math.min(options.numSpeakers, vectors.length))
      : undefined;

  const distance = vectors.map((a) => vectors.map((b) => embeddingDistance(a, b)));

  // cluster id -> member indices
  const clusters = new Map<number, number[]>(vectors.map((_, i) => [i, [i]]));
  const linkage = (a: number[], b: number[]) => {
    let total = 0;
    for (const i of a) for (const j of b) total += distance[i][j];
    return total / (a.length * b.length);
  };

  while (clusters.size > 1) {
    let best: { a: number; b: number; distance: number } | undefined;
    const entries = [...clusters.entries()];
    for (let x = 0; x < entries.length; x++) {
      for (let y = x + 1; y < entries.length; y++) {
        const d = linkage(entries[x][1], entries[y][1]);
        if (!best || d < best.distance) {
          best = { a: entries[x][0], b: entries[y][0], distance: d };
        }
      }
    }
    if (!best) break;

    const shouldMerge =
      target !== undefined
        ? clusters.size > target
        : clusters.size > maxSpeakers || best.distance <= threshold;
    if (!shouldMerge) break;

    clusters.set(best.a, [...(clusters.get(best.a) ?? []), ...(clusters.get(best.b) ?? [])]);
    clusters.delete(best.b);
  }

  const raw = new Array<number>(vectors.length).fill(0);
  for (const [id, members] of clusters) {
    for (const member of members) raw[member] = id;
  }
  const renumber = new Map<number, number>();
  return raw.map((id) => {
    let label = renumber.get(id);
    if (label === undefined) {
      label = renumber.size;
      renumber.set(id, label);
    }
    return label;
  });
}
