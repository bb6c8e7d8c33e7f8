import { ConnectionError, TimeoutError, toErrorMessage } from "../errors.js";
import { Logger, componentLogger } from "../logger.js";
import { RateLimiters, ServiceClass } from "./rate-limiters.js";
import { RetryPolicy, classifyFailure, computeBackoffDelay, sleep } from "./retry.js";

// Rough blended price used only for the cost estimate in call logs.
export const ESTIMATED_COST_PER_TOKEN_USD = 0.00002;

export interface AttemptContext {
  /** Aborted when the attempt times out. */
  signal: AbortSignal;
  attempt: number;
}

export interface CallOptions<T> {
  label: string;
  timeoutMs: number;
  /** Reports token usage of a successful result for the cost estimate. */
  tokensUsed?: (result: T) => number | undefined;
}

/**
 * Wraps external calls with a per-class concurrency slot, a wall-clock
 * timeout per attempt and retry with exponential backoff.
 *
 * A timed-out attempt is abandoned: its AbortSignal fires, but a transport
 * that ignores the signal keeps running in the background and its eventual
 * result is discarded.
 */
export class ResilientCaller {
  private readonly log: Logger;

  constructor(
    private readonly limiters: RateLimiters,
    private readonly policy: RetryPolicy,
    log?: Logger,
  ) {
    this.log = log ?? componentLogger("resilient-call");
  }

  async call<T>(
    serviceClass: ServiceClass,
    operation: (context: AttemptContext) => Promise<T>,
    options: CallOptions<T>,
  ): Promise<T> {
    const wait = this.policy.sleep ?? sleep;

    for (let attempt = 1; ; attempt += 1) {
      try {
        return await this.attempt(serviceClass, operation, options, attempt);
      } catch (error) {
        const failure = classifyFailure(error);
        if (!this.policy.isRetryable(failure) || attempt >= this.policy.maxAttempts) {
          throw failure;
        }

        const delayMs = computeBackoffDelay(this.policy, attempt);
        this.log.warn(
          {
            serviceClass,
            label: options.label,
            attempt,
            maxAttempts: this.policy.maxAttempts,
            delayMs,
            error: toErrorMessage(failure),
          },
          "Retrying external call",
        );
        await wait(delayMs);
      }
    }
  }

  private async attempt<T>(
    serviceClass: ServiceClass,
    operation: (context: AttemptContext) => Promise<T>,
    options: CallOptions<T>,
    attempt: number,
  ): Promise<T> {
    const semaphore = this.limiters.get(serviceClass);
    await semaphore.acquire();

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const startTime = Date.now();

    this.log.info(
      { serviceClass, label: options.label, attempt, timeoutMs: options.timeoutMs },
      "External call started",
    );

    try {
      const pending = operation({ signal: controller.signal, attempt });
      pending.catch((error: unknown) => {
        if (controller.signal.aborted) {
          this.log.debug(
            { serviceClass, label: options.label, attempt, error: toErrorMessage(error) },
            "Abandoned call settled with an error",
          );
        }
      });

      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          controller.abort();
          reject(new TimeoutError(options.label, options.timeoutMs));
        }, options.timeoutMs);
      });

      const result = await Promise.race([pending, timeout]);

      const tokensUsed = options.tokensUsed?.(result);
      this.log.info(
        {
          serviceClass,
          label: options.label,
          attempt,
          durationMs: Date.now() - startTime,
          ...(tokensUsed !== undefined && {
            tokensUsed,
            estimatedCostUsd: Number((tokensUsed * ESTIMATED_COST_PER_TOKEN_USD).toFixed(6)),
          }),
        },
        "External call completed",
      );
      return result;
    } catch (error) {
      const failure = classifyFailure(error);
      const details = {
        serviceClass,
        label: options.label,
        attempt,
        durationMs: Date.now() - startTime,
        error: toErrorMessage(failure),
      };
      if (failure instanceof TimeoutError) {
        this.log.error(details, "External call timed out");
      } else if (failure instanceof ConnectionError) {
        this.log.error(details, "External call connection failure");
      } else {
        this.log.error(details, "External call failed");
      }
      throw failure;
    } finally {
      clearTimeout(timer);
      semaphore.release();
    }
  }
}
