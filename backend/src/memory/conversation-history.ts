import { toErrorMessage } from "../errors.js";
import { componentLogger } from "../logger.js";
import { Semaphore } from "../resilience/rate-limiters.js";

const log = componentLogger("conversation-history");

export type MessageRole = "user" | "assistant";

export interface ConversationMessage {
  role: MessageRole;
  content: string;
  timestamp: string;
  tokenCount: number;
  metadata: Record<string, unknown>;
}

export interface ConversationSummary {
  text: string;
  tokenCount: number;
  summarizedMessages: number;
  createdAt: string;
}

export interface HistoryStats {
  totalMessages: number;
  totalTokens: number;
  summaryTokens: number;
  hasSummary: boolean;
  tokenUsagePercent: number;
  isNearLimit: boolean;
}

export type Summarizer = (
  messages: readonly ConversationMessage[],
  previousSummary?: string,
) => Promise<string>;

export type TokenCounter = (text: string) => number;

export interface HistoryOptions {
  maxTokens: number;
  targetTokens: number;
  keepRecent: number;
  /** Omit to always prune instead of summarizing. */
  summarize?: Summarizer;
  countTokens?: TokenCounter;
}

const NEAR_LIMIT_RATIO = 0.8;

export const estimateTokens: TokenCounter = (text) => Math.ceil(text.length / 4);

function isImportant(message: ConversationMessage): boolean {
  const { responseType } = message.metadata;
  return (
    message.metadata.refundProcessed === true ||
    message.metadata.intent === "refund" ||
    (typeof responseType === "string" && (responseType.startsWith("refund") || responseType === "error"))
  );
}

/**
 * Token-budgeted conversation buffer. Above `targetTokens` the messages
 * between the first one and the last `keepRecent` are folded into a running
 * summary, or pruned down to refund and error turns. `maxTokens` is a hard
 * cap enforced afterwards by dropping the oldest messages after the first.
 */
export class ConversationHistoryManager {
  private messages: ConversationMessage[] = [];
  private summary: ConversationSummary | null = null;
  private readonly lock = new Semaphore(1);
  private readonly countTokens: TokenCounter;

  constructor(private readonly options: HistoryOptions) {
    if (options.targetTokens > options.maxTokens) {
      throw new RangeError("targetTokens must not exceed maxTokens");
    }
    this.countTokens = options.countTokens ?? estimateTokens;
  }

  async addMessage(
    role: MessageRole,
    content: string,
    metadata: Record<string, unknown> = {},
  ): Promise<ConversationMessage> {
    const message: ConversationMessage = {
      role,
      content,
      timestamp: new Date().toISOString(),
      tokenCount: this.countTokens(content),
      metadata,
    };

    await this.lock.use(async () => {
      this.messages.push(message);
      if (this.totalTokens() > this.options.targetTokens) {
        await this.compact();
      }
      this.enforceMaxTokens();
    });
    return message;
  }

  getMessages(): ConversationMessage[] {
    return [...this.messages];
  }

  getRecentMessages(count: number): ConversationMessage[] {
    return count > 0 ? this.messages.slice(-count) : [];
  }

  getSummary(): ConversationSummary | null {
    return this.summary;
  }

  getContextForLlm(maxMessages?: number): string {
    const messages = maxMessages === undefined ? this.messages : this.getRecentMessages(maxMessages);
    const lines = messages.map(
      (message) => `${message.role === "user" ? "User" : "Assistant"}: ${message.content}`,
    );
    if (this.summary) {
      lines.unshift(`Summary of earlier conversation: ${this.summary.text}`);
    }
    return lines.join("\n");
  }

  clear(): void {
    this.messages = [];
    this.summary = null;
    log.debug("Conversation history cleared");
  }

  getStats(): HistoryStats {
    const totalTokens = this.totalTokens();
    return {
      totalMessages: this.messages.length,
      totalTokens,
      summaryTokens: this.summary?.tokenCount ?? 0,
      hasSummary: this.summary !== null,
      tokenUsagePercent: Math.round((totalTokens / this.options.maxTokens) * 1000) / 10,
      isNearLimit: totalTokens >= this.options.maxTokens * NEAR_LIMIT_RATIO,
    };
  }

  private totalTokens(): number {
    const messageTokens = this.messages.reduce((sum, message) => sum + message.tokenCount, 0);
    return messageTokens + (this.summary?.tokenCount ?? 0);
  }

  private async compact(): Promise<void> {
    const { keepRecent } = this.options;
    if (this.messages.length <= keepRecent + 1) {
      return;
    }

    const first = this.messages[0];
    const middle = this.messages.slice(1, this.messages.length - keepRecent);
    const recent = this.messages.slice(this.messages.length - keepRecent);
    const before = this.totalTokens();

    if (this.options.summarize && middle.length > 2) {
      try {
        const text = await this.options.summarize(middle, this.summary?.text);
        this.summary = {
          text,
          tokenCount: this.countTokens(text),
          summarizedMessages: (this.summary?.summarizedMessages ?? 0) + middle.length,
          createdAt: new Date().toISOString(),
        };
        this.messages = [first, ...recent];
        log.info(
          { summarized: middle.length, tokensBefore: before, tokensAfter: this.totalTokens() },
          "Conversation history summarized",
        );
        return;
      } catch (error) {
        log.warn({ error: toErrorMessage(error) }, "Summarization failed, pruning instead");
      }
    }

    const kept = middle.filter(isImportant);
    this.messages = [first, ...kept, ...recent];
    log.info(
      { pruned: middle.length - kept.length, tokensBefore: before, tokensAfter: this.totalTokens() },
      "Conversation history pruned",
    );
  }

  private enforceMaxTokens(): void {
    let dropped = 0;
    while (this.totalTokens() > this.options.maxTokens && this.messages.length > 1) {
      this.messages.splice(1, 1);
      dropped += 1;
    }
    if (dropped > 0) {
      log.warn({ dropped, totalTokens: this.totalTokens() }, "History truncated to token limit");
    }
  }
}
