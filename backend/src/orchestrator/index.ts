import { PROCESS_REFUND } from "../agents/transaction-agent.js";
import { TRANSACTION_AGENT, createTaskRequest } from "../agents/protocol.js";
import { TaskHandler } from "../agents/task-handler.js";
import { componentLogger } from "../logger.js";
import {
  ConversationHistoryManager,
  ConversationMessage,
} from "../memory/conversation-history.js";
import { orderTotal } from "../models/order.js";
import { RefundProcessingResultSchema } from "../models/schemas.js";
import { SpanParent, openSpan, traceSafely } from "../utils/tracing.js";
import { Coordinator } from "./coordinator.js";
import { TurnResult } from "./types.js";

const log = componentLogger("orchestrator");

const CONFIRMATION =
  /(?:^|[^\p{L}])(?:yes|si|sí|ok|okay|confirmar|confirmo|proceder|adelante|vale|afirmativo|correcto)(?=$|[^\p{L}])/iu;

export function isConfirmation(text: string): boolean {
  return CONFIRMATION.test(text.trim());
}

export interface PendingRefund {
  orderId: string;
  amount: number;
}

export interface OrchestratorOptions {
  sessionId: string;
  /** Number of recent messages forwarded to the coordinator. */
  contextMessages?: number;
}

/**
 * One conversation: feeds the history manager, forwards turns to the
 * coordinator and, after an eligible reply, waits for the customer to
 * confirm before processing the refund.
 */
export class Orchestrator {
  private pendingRefund: PendingRefund | null = null;

  constructor(
    private readonly coordinator: Coordinator,
    private readonly transactionAgent: TaskHandler,
    private readonly history: ConversationHistoryManager,
    private readonly options: OrchestratorOptions,
  ) {
    log.debug({ sessionId: options.sessionId }, "Orchestrator initialized");
  }

  get sessionId(): string {
    return this.options.sessionId;
  }

  getPendingRefund(): PendingRefund | null {
    return this.pendingRefund;
  }

  async processMessage(message: string, trace?: SpanParent): Promise<TurnResult> {
    const historyContext = this.history.getContextForLlm(this.options.contextMessages);
    await this.history.addMessage("user", message);

    log.info(
      { sessionId: this.sessionId, message: message.substring(0, 100) },
      "Processing message",
    );

    const pending = this.pendingRefund;
    if (pending && isConfirmation(message)) {
      this.pendingRefund = null;
      const reply = await this.confirmRefund(pending, trace);
      await this.history.addMessage("assistant", reply.message, {
        intent: reply.intent,
        responseType: reply.responseType,
        agentsCalled: reply.agentsCalled,
        refundProcessed: reply.responseType === "refund_already_processed",
      });
      return reply;
    }

    const result = await this.coordinator.handleTurn(message, {
      sessionId: this.sessionId,
      history: historyContext || undefined,
      trace,
    });

    if (
      result.responseType === "refund_eligible" &&
      result.eligibility?.eligible &&
      result.extractedOrderId &&
      result.order
    ) {
      const amount = orderTotal(result.order);
      if (amount > 0) {
        this.pendingRefund = { orderId: result.extractedOrderId, amount };
        log.info({ sessionId: this.sessionId, ...this.pendingRefund }, "Refund awaiting confirmation");
      }
    }

    await this.history.addMessage("assistant", result.message, {
      intent: result.intent,
      responseType: result.responseType,
      agentsCalled: result.agentsCalled,
    });
    return result;
  }

  private async confirmRefund(pending: PendingRefund, trace?: SpanParent): Promise<TurnResult> {
    const startTime = Date.now();
    const span = openSpan(trace, { name: "confirm-refund", input: pending });
    const response = await this.transactionAgent.handle(
      createTaskRequest(TRANSACTION_AGENT, PROCESS_REFUND, { ...pending }, { sessionId: this.sessionId }),
      span,
    );

    const base = {
      agentsCalled: [TRANSACTION_AGENT],
      intent: "refund" as const,
      intentConfidence: 1,
      extractedOrderId: pending.orderId,
    };
    const parsed =
      response.status === "success" ? RefundProcessingResultSchema.safeParse(response.result) : null;

    let reply: TurnResult;
    if (parsed?.success && parsed.data.success) {
      const { transactionId, amount, refundDate } = parsed.data;
      reply = {
        ...base,
        responseType: "refund_already_processed",
        message: `Refund processed successfully! Transaction ID: ${transactionId}, Amount: $${amount.toFixed(2)}`,
        actionRequired: "",
        keyDetails: [
          `Order ${pending.orderId} status: RETURNED`,
          `Transaction ID: ${transactionId}`,
          `Amount: $${amount.toFixed(2)}`,
          ...(refundDate ? [`Refund date: ${refundDate}`] : []),
        ],
        latencyMs: Date.now() - startTime,
      };
    } else if (parsed?.success) {
      reply = {
        ...base,
        responseType: "error",
        message: `Refund failed: ${parsed.data.error ?? "unknown reason"}`,
        actionRequired: "",
        keyDetails: [],
        latencyMs: Date.now() - startTime,
      };
    } else {
      log.error({ sessionId: this.sessionId, error: response.error }, "Refund processing failed");
      reply = {
        ...base,
        responseType: "error",
        message: "Your refund could not be processed right now. Please try again later.",
        actionRequired: "",
        keyDetails: [],
        latencyMs: Date.now() - startTime,
      };
    }

    traceSafely(() => span?.end({ output: { responseType: reply.responseType } }));
    return reply;
  }

  getHistory(): ConversationMessage[] {
    return this.history.getMessages();
  }

  clearHistory(): void {
    this.history.clear();
    this.pendingRefund = null;
  }
}
