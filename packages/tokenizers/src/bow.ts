/**
 * Bag-of-tokens projections onto the vocabulary dimension.
 */
import { sparse, type ProjectionKind, type SparseMatrix, type SparseRow } from "@lexembed/core";
import type { Vocabulary } from "./vocabulary.js";

/** Maps the tokens of one example to a sparse row over the vocabulary. */
export type Projection = (tokens: Iterable<string>) => SparseRow;

function termCounts(vocabulary: Vocabulary, tokens: Iterable<string>): Map<number, number> {
  const counts = new Map<number, number>();
  for (const t of tokens) {
    const id = vocabulary.id(t);
    if (id !== undefined) counts.set(id, (counts.get(id) ?? 0) + 1);
  }
  return counts;
}

function toRow(entries: Map<number, number>): SparseRow {
  const indices = Int32Array.from(entries.keys()).sort();
  const values = new Float64Array(indices.length);
  for (let k = 0; k < indices.length; k++) values[k] = entries.get(indices[k]) ?? 0;
  return { indices, values };
}

/** 1 for every vocabulary token present, whatever its count. */
export function indicatorProjection(vocabulary: Vocabulary): Projection {
  return (tokens) => {
    const counts = termCounts(vocabulary, tokens);
    for (const k of counts.keys()) counts.set(k, 1);
    return toRow(counts);
  };
}

/** Term count times IDF, scaled to unit L2 norm. */
export function tfidfProjection(vocabulary: Vocabulary): Projection {
  return (tokens) => {
    const counts = termCounts(vocabulary, tokens);
    let norm = 0;
    for (const [k, c] of counts) {
      const w = c * vocabulary.idf[k];
      counts.set(k, w);
      norm += w * w;
    }
    if (norm > 0) {
      const inv = 1 / Math.sqrt(norm);
      for (const [k, w] of counts) counts.set(k, w * inv);
    }
    return toRow(counts);
  };
}

export function projectionFor(kind: ProjectionKind, vocabulary: Vocabulary): Projection {
  switch (kind) {
    case "indicator": return indicatorProjection(vocabulary);
    case "tfidf": return tfidfProjection(vocabulary);
  }
}

export function project(
  examples: readonly Iterable<string>[],
  projection: Projection,
  vocabulary: Vocabulary,
): SparseMatrix {
  return sparse(examples.map((e) => projection(e)), vocabulary.size);
}
