import { describe, test, expect, vi, afterEach } from "vitest";
import { z } from "zod";
import { getConfig, resetConfig } from "../../src/config/env.js";

describe("getConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  test("should fall back to defaults for unset values", () => {
    vi.stubEnv("RAG_TOP_K", "");
    vi.stubEnv("REFUND_WINDOW_DAYS", "");

    const config = getConfig();

    expect(config.ragTopK).toBe(3);
    expect(config.refundWindowDays).toBe(14);
  });

  test("should read numeric and boolean settings from the environment", () => {
    vi.stubEnv("LLM_TIMEOUT_MS", "45000");
    vi.stubEnv("EMBEDDINGS_CACHE_SIZE", "0");
    vi.stubEnv("HISTORY_SUMMARIZATION", "false");
    vi.stubEnv("SUPPORT_CONTACT", "help@example.com");

    const config = getConfig();

    expect(config.llmTimeoutMs).toBe(45000);
    expect(config.embeddingsCacheSize).toBe(0);
    expect(config.historySummarization).toBe(false);
    expect(config.supportContact).toBe("help@example.com");
  });

  test("should reject values outside their bounds", () => {
    vi.stubEnv("LLM_TIMEOUT_MS", "100");

    expect(() => getConfig()).toThrow(z.ZodError);
  });

  test("should memoize until reset", () => {
    vi.stubEnv("RAG_TOP_K", "5");
    const first = getConfig();
    vi.stubEnv("RAG_TOP_K", "7");

    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig().ragTopK).toBe(7);
  });
});
