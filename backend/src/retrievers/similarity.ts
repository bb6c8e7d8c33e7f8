import { PolicyChunk, RankedChunk } from "../models/policy.js";

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Top-k chunks by cosine similarity to `queryEmbedding`, highest first.
 * Equal scores keep their corpus order.
 */
export function rankBySimilarity(
  queryEmbedding: number[],
  corpus: PolicyChunk[],
  k: number,
): RankedChunk[] {
  if (k <= 0 || corpus.length === 0) {
    return [];
  }

  return corpus
    .map((chunk, index) => ({
      index,
      ranked: {
        chunkId: chunk.chunkId,
        text: chunk.text,
        similarity: cosineSimilarity(queryEmbedding, chunk.embedding),
      },
    }))
    .sort((a, b) => b.ranked.similarity - a.ranked.similarity || a.index - b.index)
    .slice(0, k)
    .map(({ ranked }) => ranked);
}
