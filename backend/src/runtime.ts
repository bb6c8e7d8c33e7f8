import Database from "better-sqlite3";
import { Config } from "./config/env.js";
import { createPolicyExpert } from "./agents/policy-agent.js";
import { TaskHandler } from "./agents/task-handler.js";
import { createTransactionAgent } from "./agents/transaction-agent.js";
import {
  OrderRepository,
  SqliteOrderRepository,
  SqlitePolicyChunkRepository,
  createDatabase,
} from "./database/index.js";
import { EmbeddingsCache } from "./embeddings/cache.js";
import { EmbeddingService, createOpenAIEmbeddings } from "./embeddings/index.js";
import { GenerativeService } from "./llm/index.js";
import { createOpenAILLM } from "./llm/providers/openai.js";
import { componentLogger } from "./logger.js";
import { ConversationHistoryManager } from "./memory/conversation-history.js";
import { createLlmSummarizer } from "./memory/summarizer.js";
import { Coordinator } from "./orchestrator/coordinator.js";
import { Orchestrator } from "./orchestrator/index.js";
import { RateLimiters } from "./resilience/rate-limiters.js";
import { ResilientCaller } from "./resilience/resilient-call.js";
import { RetryPolicy, createRetryPolicy } from "./resilience/retry.js";
import { PolicyRetriever } from "./retrievers/index.js";

const log = componentLogger("runtime");

export interface RuntimeOverrides {
  db?: Database.Database;
  llm?: GenerativeService;
  embeddings?: EmbeddingService;
  retryPolicy?: RetryPolicy;
  now?: () => Date;
}

/** Conversations keyed by session id, created on first use. */
export class SessionStore {
  private readonly sessions = new Map<string, Orchestrator>();

  constructor(private readonly create: (sessionId: string) => Orchestrator) {}

  get(sessionId: string): Orchestrator {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }
    const orchestrator = this.create(sessionId);
    this.sessions.set(sessionId, orchestrator);
    log.debug({ sessionId }, "Session created");
    return orchestrator;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}

export interface Runtime {
  config: Config;
  db: Database.Database;
  orders: OrderRepository;
  limiters: RateLimiters;
  caller: ResilientCaller;
  embeddingsCache: EmbeddingsCache;
  retriever: PolicyRetriever;
  policyExpert: TaskHandler;
  transactionAgent: TaskHandler;
  coordinator: Coordinator;
  sessions: SessionStore;
}

/**
 * Builds the process-scoped resources once and wires them into every
 * component that needs them.
 */
export function createRuntime(config: Config, overrides: RuntimeOverrides = {}): Runtime {
  const db = overrides.db ?? createDatabase(config.databasePath);
  const llm = overrides.llm ?? createOpenAILLM(config);
  const embeddings = overrides.embeddings ?? createOpenAIEmbeddings(config);

  const limiters = RateLimiters.fromConfig(config);
  const caller = new ResilientCaller(
    limiters,
    overrides.retryPolicy ?? createRetryPolicy({ maxAttempts: config.llmMaxRetries }),
  );
  const embeddingsCache = new EmbeddingsCache(config.embeddingsCacheSize);

  const orders = new SqliteOrderRepository(db);
  const retriever = new PolicyRetriever(
    embeddings,
    embeddingsCache,
    new SqlitePolicyChunkRepository(db),
    caller,
    {
      topK: config.ragTopK,
      embeddingsTimeoutMs: config.embeddingsTimeoutMs,
      datastoreTimeoutMs: config.datastoreTimeoutMs,
    },
  );

  const policyExpert = createPolicyExpert(retriever, config.ragTopK);
  const transactionAgent = createTransactionAgent(orders, caller, {
    datastoreTimeoutMs: config.datastoreTimeoutMs,
    refundWindowDays: config.refundWindowDays,
    now: overrides.now,
  });

  const coordinator = new Coordinator(llm, caller, [policyExpert, transactionAgent], {
    llmTimeoutMs: config.llmTimeoutMs,
    supportContact: config.supportContact,
  });

  const summarize = config.historySummarization
    ? createLlmSummarizer(llm, caller, config.llmTimeoutMs)
    : undefined;

  const sessions = new SessionStore(
    (sessionId) =>
      new Orchestrator(
        coordinator,
        transactionAgent,
        new ConversationHistoryManager({
          maxTokens: config.historyMaxTokens,
          targetTokens: config.historyTargetTokens,
          keepRecent: config.historyKeepRecent,
          summarize,
        }),
        { sessionId, contextMessages: config.historyKeepRecent },
      ),
  );

  log.info(
    { databasePath: config.databasePath, llmModel: config.llmModel, ragTopK: config.ragTopK },
    "Runtime initialized",
  );

  return {
    config,
    db,
    orders,
    limiters,
    caller,
    embeddingsCache,
    retriever,
    policyExpert,
    transactionAgent,
    coordinator,
    sessions,
  };
}
