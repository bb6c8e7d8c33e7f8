import { z } from "zod";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

export const ConfigSchema = z.object({
  openaiApiKey: z.string().min(1).optional(),
  llmModel: z.string().default("gpt-4o-mini"),
  embeddingModel: z.string().default("text-embedding-3-small"),
  llmTimeoutMs: z.number().int().min(5000).max(120000).default(30000),
  llmMaxRetries: z.number().int().min(1).max(5).default(3),
  llmRateLimit: z.number().int().min(1).max(20).default(5),
  embeddingsRateLimit: z.number().int().min(1).max(50).default(10),
  embeddingsTimeoutMs: z.number().int().positive().default(10000),
  datastoreRateLimit: z.number().int().min(1).max(100).default(20),
  datastoreTimeoutMs: z.number().int().positive().default(5000),
  ragTopK: z.number().int().min(1).max(10).default(3),
  embeddingsCacheSize: z.number().int().min(0).max(1000).default(100),
  chunkSize: z.number().int().positive().default(800),
  chunkOverlap: z.number().int().nonnegative().default(100),
  refundWindowDays: z.number().int().positive().default(14),
  historyMaxTokens: z.number().int().positive().default(16000),
  historyTargetTokens: z.number().int().positive().default(12000),
  historyKeepRecent: z.number().int().min(1).default(8),
  historySummarization: z.boolean().default(true),
  databasePath: z.string().default("./data/refunds.db"),
  port: z.number().int().positive().default(3001),
  corsOrigin: z.string().default("http://localhost:5173"),
  supportContact: z.string().default("support@example.com"),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  langfuseEnabled: z.boolean().default(false),
  langfuseSecretKey: z.string().optional(),
  langfusePublicKey: z.string().optional(),
  langfuseBaseUrl: z.string().default("https://cloud.langfuse.com"),
});

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | null = null;

function intFromEnv(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function flagFromEnv(value: string | undefined): boolean | undefined {
  return value === undefined ? undefined : value === "true";
}

export function getConfig(): Config {
  if (config) {
    return config;
  }

  const rawConfig = {
    openaiApiKey: process.env.OPENAI_API_KEY || undefined,
    llmModel: process.env.LLM_MODEL,
    embeddingModel: process.env.EMBEDDING_MODEL,
    llmTimeoutMs: intFromEnv(process.env.LLM_TIMEOUT_MS),
    llmMaxRetries: intFromEnv(process.env.LLM_MAX_RETRIES),
    llmRateLimit: intFromEnv(process.env.LLM_RATE_LIMIT),
    embeddingsRateLimit: intFromEnv(process.env.EMBEDDINGS_RATE_LIMIT),
    embeddingsTimeoutMs: intFromEnv(process.env.EMBEDDINGS_TIMEOUT_MS),
    datastoreRateLimit: intFromEnv(process.env.DATASTORE_RATE_LIMIT),
    datastoreTimeoutMs: intFromEnv(process.env.DATASTORE_TIMEOUT_MS),
    ragTopK: intFromEnv(process.env.RAG_TOP_K),
    embeddingsCacheSize: intFromEnv(process.env.EMBEDDINGS_CACHE_SIZE),
    chunkSize: intFromEnv(process.env.CHUNK_SIZE),
    chunkOverlap: intFromEnv(process.env.CHUNK_OVERLAP),
    refundWindowDays: intFromEnv(process.env.REFUND_WINDOW_DAYS),
    historyMaxTokens: intFromEnv(process.env.HISTORY_MAX_TOKENS),
    historyTargetTokens: intFromEnv(process.env.HISTORY_TARGET_TOKENS),
    historyKeepRecent: intFromEnv(process.env.HISTORY_KEEP_RECENT),
    historySummarization: flagFromEnv(process.env.HISTORY_SUMMARIZATION),
    databasePath: process.env.DATABASE_PATH,
    port: intFromEnv(process.env.PORT),
    corsOrigin: process.env.CORS_ORIGIN,
    supportContact: process.env.SUPPORT_CONTACT,
    logLevel: process.env.LOG_LEVEL,
    nodeEnv: process.env.NODE_ENV,
    langfuseEnabled: process.env.LANGFUSE_ENABLED === "true",
    langfuseSecretKey: process.env.LANGFUSE_SECRET_KEY,
    langfusePublicKey: process.env.LANGFUSE_PUBLIC_KEY,
    langfuseBaseUrl: process.env.LANGFUSE_BASE_URL,
  };

  config = ConfigSchema.parse(rawConfig);
  return config;
}

// Drops the memoized config so the next getConfig() re-reads process.env.
export function resetConfig(): void {
  config = null;
}
