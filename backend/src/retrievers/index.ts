import { PolicyChunkRepository } from "../database/repositories.js";
import { EmbeddingsCache } from "../embeddings/cache.js";
import { EmbeddingService } from "../embeddings/index.js";
import { componentLogger } from "../logger.js";
import { PolicyChunk, RankedChunk } from "../models/policy.js";
import { ResilientCaller } from "../resilience/resilient-call.js";
import { rankBySimilarity } from "./similarity.js";

const log = componentLogger("policy-retriever");

export interface PolicyRetrieverOptions {
  topK: number;
  embeddingsTimeoutMs: number;
  datastoreTimeoutMs: number;
}

export class PolicyRetriever {
  constructor(
    private readonly embeddings: EmbeddingService,
    private readonly cache: EmbeddingsCache,
    private readonly chunks: PolicyChunkRepository,
    private readonly caller: ResilientCaller,
    private readonly options: PolicyRetrieverOptions,
  ) {}

  async embedQuery(query: string): Promise<number[]> {
    return this.cache.getOrCompute(query, (text) =>
      this.caller.call(
        "embeddings",
        async () => {
          const [vector] = await this.embeddings.embed([text]);
          if (!vector) {
            throw new Error("Embedding service returned no vector");
          }
          return vector;
        },
        { label: "embed-query", timeoutMs: this.options.embeddingsTimeoutMs },
      ),
    );
  }

  async search(query: string, corpus: PolicyChunk[], k: number): Promise<RankedChunk[]> {
    if (corpus.length === 0 || k <= 0) {
      return [];
    }
    const queryEmbedding = await this.embedQuery(query);
    return rankBySimilarity(queryEmbedding, corpus, k);
  }

  async retrieve(query: string, k: number = this.options.topK): Promise<RankedChunk[]> {
    const corpus = await this.caller.call("datastore", () => this.chunks.listChunks(), {
      label: "list-policy-chunks",
      timeoutMs: this.options.datastoreTimeoutMs,
    });

    const results = await this.search(query, corpus, k);
    log.debug(
      {
        corpusSize: corpus.length,
        returned: results.length,
        topSimilarity: results[0]?.similarity,
      },
      "Policy chunks ranked",
    );
    return results;
  }
}
