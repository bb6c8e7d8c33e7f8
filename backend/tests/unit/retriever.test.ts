import { describe, test, expect } from "vitest";
import { EmbeddingsCache } from "../../src/embeddings/cache.js";
import { PolicyChunk } from "../../src/models/policy.js";
import { PolicyRetriever } from "../../src/retrievers/index.js";
import { cosineSimilarity, rankBySimilarity } from "../../src/retrievers/similarity.js";
import { makeCaller, makeEmbeddings } from "../helpers/fakes.js";

const corpus: PolicyChunk[] = [
  { chunkId: "c1", text: "shipping times", embedding: [0, 1] },
  { chunkId: "c2", text: "refund window", embedding: [1, 0] },
  { chunkId: "c3", text: "refund window copy", embedding: [2, 0] },
  { chunkId: "c4", text: "mixed", embedding: [1, 1] },
];

describe("cosineSimilarity", () => {
  test("should be 1 for parallel vectors and 0 for orthogonal ones", () => {
    expect(cosineSimilarity([1, 0], [3, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 2])).toBe(0);
  });

  test("should return 0 when either vector has zero norm", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  test("should reject vectors of different lengths", () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow("Vector length mismatch: 2 vs 3");
  });
});

describe("rankBySimilarity", () => {
  test("should order by similarity and keep corpus order for ties", () => {
    const ranked = rankBySimilarity([1, 0], corpus, 3);
    expect(ranked.map((chunk) => chunk.chunkId)).toEqual(["c2", "c3", "c4"]);
    expect(ranked[0].similarity).toBe(1);
    expect(ranked[1].similarity).toBe(1);
  });

  test("should return everything when k exceeds the corpus", () => {
    expect(rankBySimilarity([0, 1], corpus, 10).map((chunk) => chunk.chunkId)).toEqual([
      "c1",
      "c4",
      "c2",
      "c3",
    ]);
  });

  test("should return nothing for k <= 0 or an empty corpus", () => {
    expect(rankBySimilarity([1, 0], corpus, 0)).toEqual([]);
    expect(rankBySimilarity([1, 0], [], 3)).toEqual([]);
  });
});

describe("PolicyRetriever", () => {
  function makeRetriever(chunks: PolicyChunk[] = corpus) {
    const { embeddings, embed } = makeEmbeddings();
    const cache = new EmbeddingsCache(10);
    const retriever = new PolicyRetriever(
      embeddings,
      cache,
      { listChunks: async () => chunks },
      makeCaller(),
      { topK: 2, embeddingsTimeoutMs: 1000, datastoreTimeoutMs: 1000 },
    );
    return { retriever, embed, cache };
  }

  test("should rank stored chunks against the query embedding", async () => {
    const { retriever } = makeRetriever();
    // "refund" embeds to [1.1, 0.1]
    const results = await retriever.retrieve("refund");
    expect(results.map((chunk) => chunk.chunkId)).toEqual(["c2", "c3"]);
  });

  test("should embed a repeated query only once", async () => {
    const { retriever, embed, cache } = makeRetriever();
    await retriever.retrieve("Refund please");
    await retriever.retrieve("  refund PLEASE ");

    expect(embed).toHaveBeenCalledTimes(1);
    expect(embed).toHaveBeenCalledWith(["Refund please"]);
    expect(cache.getMetrics().cacheHits).toBe(1);
  });

  test("should skip embedding when the corpus is empty", async () => {
    const { retriever, embed } = makeRetriever([]);
    expect(await retriever.retrieve("refund")).toEqual([]);
    expect(embed).not.toHaveBeenCalled();
  });
});
