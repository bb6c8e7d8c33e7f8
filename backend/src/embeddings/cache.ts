import { createHash } from "crypto";
import { componentLogger } from "../logger.js";
import { Semaphore } from "../resilience/rate-limiters.js";

const log = componentLogger("embeddings-cache");

export type EmbeddingVector = number[];

export type ComputeEmbedding = (text: string) => Promise<EmbeddingVector>;

export interface CacheMetrics {
  cacheHits: number;
  cacheMisses: number;
  hitRate: number;
  estimatedSavingsUsd: number;
  cacheSize: number;
  maxSize: number;
}

/**
 * Content-addressed LRU cache of embedding vectors.
 *
 * Keys are SHA-256 digests of the lowercased, trimmed text. The mutex only
 * guards the map bookkeeping; `computeFn` always runs outside it, and
 * concurrent misses on the same key share one computation.
 */
export class EmbeddingsCache {
  // Map iteration order doubles as recency order: first entry is the LRU one.
  private readonly entries = new Map<string, EmbeddingVector>();
  private readonly inFlight = new Map<string, Promise<EmbeddingVector>>();
  private readonly lock = new Semaphore(1);
  private hits = 0;
  private misses = 0;

  constructor(
    readonly maxSize: number = 100,
    private readonly costPerEmbeddingUsd: number = 0.0001,
  ) {
    if (!Number.isInteger(maxSize) || maxSize < 0) {
      throw new RangeError(`maxSize must be a non-negative integer, got ${maxSize}`);
    }
  }

  static normalize(text: string): string {
    return text.toLowerCase().trim();
  }

  static keyFor(text: string): string {
    return createHash("sha256").update(EmbeddingsCache.normalize(text), "utf8").digest("hex");
  }

  async get(text: string): Promise<EmbeddingVector | undefined> {
    const key = EmbeddingsCache.keyFor(text);
    return this.lock.use(() => {
      const cached = this.entries.get(key);
      if (cached === undefined) {
        this.misses += 1;
        return undefined;
      }
      this.entries.delete(key);
      this.entries.set(key, cached);
      this.hits += 1;
      log.debug(
        { cacheKey: key.slice(0, 16), hits: this.hits, misses: this.misses },
        "Embeddings cache hit",
      );
      return cached;
    });
  }

  async set(text: string, vector: EmbeddingVector): Promise<void> {
    const key = EmbeddingsCache.keyFor(text);
    await this.lock.use(() => this.insert(key, vector));
  }

  async getOrCompute(text: string, computeFn: ComputeEmbedding): Promise<EmbeddingVector> {
    const cached = await this.get(text);
    if (cached !== undefined) {
      return cached;
    }

    const key = EmbeddingsCache.keyFor(text);
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const computation = (async () => {
      const vector = await computeFn(text);
      await this.lock.use(() => this.insert(key, vector));
      log.debug(
        { cacheKey: key.slice(0, 16), misses: this.misses, hitRate: this.hitRate },
        "Embeddings cache miss computed",
      );
      return vector;
    })();
    this.inFlight.set(key, computation);

    try {
      return await computation;
    } finally {
      this.inFlight.delete(key);
    }
  }

  /** Membership check that does not touch recency. */
  has(text: string): boolean {
    return this.entries.has(EmbeddingsCache.keyFor(text));
  }

  get size(): number {
    return this.entries.size;
  }

  get hitRate(): number {
    const total = this.hits + this.misses;
    return total > 0 ? this.hits / total : 0;
  }

  getMetrics(): CacheMetrics {
    return {
      cacheHits: this.hits,
      cacheMisses: this.misses,
      hitRate: this.hitRate,
      estimatedSavingsUsd: this.hits * this.costPerEmbeddingUsd,
      cacheSize: this.entries.size,
      maxSize: this.maxSize,
    };
  }

  private insert(key: string, vector: EmbeddingVector): void {
    if (this.maxSize === 0) {
      return;
    }
    this.entries.delete(key);
    this.entries.set(key, vector);

    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      log.debug(
        { evictedKey: oldest.value.slice(0, 16), cacheSize: this.entries.size },
        "Embeddings cache eviction",
      );
    }
  }
}
