import { RetrievedPassage } from '../config/types';

export interface IndexedPassage {
  id: string;
  vector: number[];
  text: string;
  source: string;
}

/** Dot product over the product of norms; 0 for mismatched or zero vectors */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let sqA = 0;
  let sqB = 0;
  a.forEach((x, i) => {
    const y = b[i];
    dot += x * y;
    sqA += x * x;
    sqB += y * y;
  });
  const norm = Math.sqrt(sqA * sqB);
  return norm === 0 ? 0 : dot / norm;
}

/**
 * Brute-force nearest-neighbour index held in memory.
 * Scores are returned raw; score floors are applied by the retrieval orchestrator.
 */
export class VectorStore {
  private passages: readonly IndexedPassage[] = [];

  /** Swap in a freshly built index */
  load(passages: readonly IndexedPassage[]): void {
    this.passages = passages;
  }

  get size(): number {
    return this.passages.length;
  }

  search(query: readonly number[], topK = 5): RetrievedPassage[] {
    return this.passages
      .map((p) => ({ passage: p, score: cosineSimilarity(query, p.vector) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, topK))
      .map(({ passage, score }) => ({ text: passage.text, score, source: passage.source }));
  }
}
