import { Config } from "../config/env.js";
import { componentLogger } from "../logger.js";

const log = componentLogger("rate-limiters");

export type ServiceClass = "llm" | "embeddings" | "datastore";

export class Semaphore {
  private permits: number;
  private readonly waiting: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.permits = capacity;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits -= 1;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      // hand the permit straight to the next waiter
      next();
      return;
    }
    if (this.permits < this.capacity) {
      this.permits += 1;
    }
  }

  async use<T>(operation: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await operation();
    } finally {
      this.release();
    }
  }

  get available(): number {
    return this.permits;
  }

  get queued(): number {
    return this.waiting.length;
  }
}

export type RateLimits = Record<ServiceClass, number>;

/**
 * One counting semaphore per dependency class, so a saturated slow class
 * (LLM) never starves a fast one (datastore). Built once per process and
 * handed to whatever issues external calls.
 */
export class RateLimiters {
  private readonly semaphores: Record<ServiceClass, Semaphore>;

  constructor(limits: RateLimits) {
    this.semaphores = {
      llm: new Semaphore(limits.llm),
      embeddings: new Semaphore(limits.embeddings),
      datastore: new Semaphore(limits.datastore),
    };
    log.info(limits, "Rate limiters initialized");
  }

  static fromConfig(config: Config): RateLimiters {
    return new RateLimiters({
      llm: config.llmRateLimit,
      embeddings: config.embeddingsRateLimit,
      datastore: config.datastoreRateLimit,
    });
  }

  get(serviceClass: ServiceClass): Semaphore {
    return this.semaphores[serviceClass];
  }
}
