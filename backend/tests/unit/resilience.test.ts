import { describe, test, expect, vi, afterEach } from "vitest";
import { ConnectionError, TimeoutError, ValidationError } from "../../src/errors.js";
import { RateLimiters, Semaphore } from "../../src/resilience/rate-limiters.js";
import { ResilientCaller } from "../../src/resilience/resilient-call.js";
import {
  classifyFailure,
  computeBackoffDelay,
  createRetryPolicy,
} from "../../src/resilience/retry.js";

function networkError(code: string): Error {
  return Object.assign(new Error("socket hang up"), { code });
}

describe("Semaphore", () => {
  test("should cap concurrent holders at its capacity", async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    const task = () =>
      semaphore.use(async () => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((done) => setTimeout(done, 5));
        active -= 1;
      });

    await Promise.all([task(), task(), task(), task(), task()]);
    expect(peak).toBe(2);
    expect(semaphore.available).toBe(2);
    expect(semaphore.queued).toBe(0);
  });

  test("should release the permit when the operation throws", async () => {
    const semaphore = new Semaphore(1);
    await expect(
      semaphore.use(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(semaphore.available).toBe(1);
  });

  test("should reject a capacity below one", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });
});

describe("RateLimiters", () => {
  test("should keep one independent semaphore per service class", async () => {
    const limiters = new RateLimiters({ llm: 1, embeddings: 3, datastore: 5 });
    await limiters.get("llm").acquire();

    expect(limiters.get("llm").available).toBe(0);
    expect(limiters.get("embeddings").available).toBe(3);
    expect(limiters.get("datastore").available).toBe(5);
  });
});

describe("computeBackoffDelay", () => {
  test("should double from the base delay and cap at the maximum", () => {
    const policy = createRetryPolicy();
    expect([1, 2, 3, 4, 5].map((attempt) => computeBackoffDelay(policy, attempt))).toEqual([
      1000, 2000, 4000, 8000, 10000,
    ]);
  });

  test("should add jitter proportional to the delay", () => {
    const policy = createRetryPolicy({ jitterRatio: 0.5, random: () => 0.5 });
    expect(computeBackoffDelay(policy, 2)).toBe(2500);
  });
});

describe("classifyFailure", () => {
  test("should map socket errors to ConnectionError", () => {
    const failure = classifyFailure(networkError("ECONNRESET"));
    expect(failure).toBeInstanceOf(ConnectionError);
    expect(failure).toHaveProperty("message", "ECONNRESET: socket hang up");
  });

  test("should look at the error cause", () => {
    const wrapped = new Error("fetch failed", { cause: networkError("ECONNREFUSED") });
    expect(classifyFailure(wrapped)).toBeInstanceOf(ConnectionError);
  });

  test("should leave other errors untouched", () => {
    const error = new Error("bad request");
    expect(classifyFailure(error)).toBe(error);
  });
});

describe("ResilientCaller", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  function makeCaller(maxAttempts = 3) {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const limiters = new RateLimiters({ llm: 1, embeddings: 1, datastore: 1 });
    const caller = new ResilientCaller(limiters, createRetryPolicy({ maxAttempts, sleep }));
    return { caller, sleep, limiters };
  }

  test("should return the operation result and free the slot", async () => {
    const { caller, limiters } = makeCaller();
    const result = await caller.call("llm", async () => ({ text: "ok", tokensUsed: 10 }), {
      label: "test",
      timeoutMs: 1000,
      tokensUsed: (value) => value.tokensUsed,
    });

    expect(result).toEqual({ text: "ok", tokensUsed: 10 });
    expect(limiters.get("llm").available).toBe(1);
  });

  test("should retry connection failures with exponential backoff", async () => {
    const { caller, sleep } = makeCaller(3);
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(networkError("ECONNRESET"))
      .mockRejectedValueOnce(networkError("ETIMEDOUT"))
      .mockResolvedValueOnce("done");

    await expect(caller.call("datastore", operation, { label: "test", timeoutMs: 1000 })).resolves.toBe(
      "done",
    );
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  test("should surface the last transient failure once attempts run out", async () => {
    const { caller, limiters } = makeCaller(2);
    const operation = vi.fn(async () => {
      throw networkError("ECONNREFUSED");
    });

    await expect(caller.call("embeddings", operation, { label: "test", timeoutMs: 1000 })).rejects.toBeInstanceOf(
      ConnectionError,
    );
    expect(operation).toHaveBeenCalledTimes(2);
    expect(limiters.get("embeddings").available).toBe(1);
  });

  test("should not retry non-transient errors", async () => {
    const { caller, sleep } = makeCaller(3);
    const operation = vi.fn(async () => {
      throw new ValidationError("bad input");
    });

    await expect(caller.call("llm", operation, { label: "test", timeoutMs: 1000 })).rejects.toThrow("bad input");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  test("should time out a hanging attempt, abort it and retry", async () => {
    vi.useFakeTimers();
    const { caller, limiters } = makeCaller(2);
    const signals: AbortSignal[] = [];
    const operation = vi.fn(({ signal }: { signal: AbortSignal }) => {
      signals.push(signal);
      return new Promise<string>(() => undefined);
    });

    const pending = caller.call("llm", operation, { label: "slow-call", timeoutMs: 50 });
    const assertion = expect(pending).rejects.toThrow("slow-call timed out after 50ms");
    await vi.advanceTimersByTimeAsync(50);
    await vi.advanceTimersByTimeAsync(50);
    await assertion;

    expect(operation).toHaveBeenCalledTimes(2);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
    expect(limiters.get("llm").available).toBe(1);
  });

  test("should raise TimeoutError instances", async () => {
    vi.useFakeTimers();
    const { caller } = makeCaller(1);
    const pending = caller.call("llm", () => new Promise<string>(() => undefined), {
      label: "never",
      timeoutMs: 10,
    });
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await vi.advanceTimersByTimeAsync(10);
    await assertion;
  });
});
