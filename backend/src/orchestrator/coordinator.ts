import { SEARCH_POLICY } from "../agents/policy-agent.js";
import {
  HandlerId,
  POLICY_EXPERT,
  TRANSACTION_AGENT,
  TaskResponse,
  createTaskRequest,
  errorResponse,
} from "../agents/protocol.js";
import { TaskHandler } from "../agents/task-handler.js";
import { CHECK_ELIGIBILITY, GET_ORDER } from "../agents/transaction-agent.js";
import { AssemblyFormatError, toErrorMessage } from "../errors.js";
import { GenerativeService, completeStructured } from "../llm/index.js";
import { componentLogger } from "../logger.js";
import {
  EligibilityResult,
  EligibilityResultSchema,
  GetOrderResultSchema,
  Intent,
  IntentClassification,
  ResponseTemplate,
  ResponseType,
} from "../models/schemas.js";
import { OrderRecord } from "../models/order.js";
import { assemblyPrompt, intentParser, intentPrompt, responseParser } from "../prompts/refund.js";
import { ResilientCaller } from "../resilience/resilient-call.js";
import { SpanParent, openSpan, traceSafely } from "../utils/tracing.js";
import { extractOrderId } from "./order-id.js";
import {
  AssembledResponse,
  CallSpec,
  DispatchResults,
  PlanContext,
  SessionContext,
  TurnResult,
} from "./types.js";

const log = componentLogger("coordinator");

/** Fixed query so every refund turn hits the same cached embedding. */
export const REFUND_POLICY_QUERY = "refund policy requirements";

export const GENERIC_APOLOGY =
  "I'm sorry, something went wrong while handling your request. Please try again in a moment.";

const NO_HISTORY = "(no previous messages)";

export interface CoordinatorOptions {
  llmTimeoutMs: number;
  supportContact: string;
}

export function fallbackTemplate(supportContact: string): ResponseTemplate {
  return {
    responseType: "error",
    message:
      "I apologize, but I encountered an error processing your request. Please contact our support team for assistance.",
    actionRequired: `Contact ${supportContact}`,
    keyDetails: [],
  };
}

function eligibilityResponseType(eligibility: EligibilityResult): ResponseType {
  if (eligibility.alreadyRefunded) {
    return "refund_already_processed";
  }
  return eligibility.eligible ? "refund_eligible" : "refund_not_eligible";
}

/**
 * Routes one user turn: classifies intent, plans and dispatches handler
 * calls, then asks the model to assemble a structured reply.
 */
export class Coordinator {
  private readonly handlers: Map<HandlerId, TaskHandler>;

  constructor(
    private readonly llm: GenerativeService,
    private readonly caller: ResilientCaller,
    handlers: TaskHandler[],
    private readonly options: CoordinatorOptions,
  ) {
    this.handlers = new Map(handlers.map((handler) => [handler.name, handler]));
  }

  async classifyIntent(
    message: string,
    history: string = NO_HISTORY,
    parent?: SpanParent,
  ): Promise<IntentClassification> {
    const span = openSpan(parent, { name: "classify-intent", input: { message } });

    try {
      const prompt = await intentPrompt.format({
        history,
        message,
        format_instructions: intentParser.getFormatInstructions(),
      });
      const classification = await completeStructured(this.caller, this.llm, prompt, intentParser, {
        label: "classify-intent",
        timeoutMs: this.options.llmTimeoutMs,
      });
      traceSafely(() => span?.end({ output: classification }));
      log.info(classification, "Intent classified");
      return classification;
    } catch (error) {
      if (error instanceof AssemblyFormatError) {
        log.warn({ error: error.message }, "Intent output failed validation, defaulting to general");
      } else {
        log.error({ error: toErrorMessage(error) }, "Intent classification failed, defaulting to general");
      }
      traceSafely(() => {
        span?.update({ level: "WARNING", statusMessage: toErrorMessage(error) });
        span?.end();
      });
      return { intent: "general", confidence: 0 };
    }
  }

  planCalls(intent: Intent, context: PlanContext): CallSpec[] {
    if (intent === "refund") {
      return [
        {
          handler: POLICY_EXPERT,
          task: SEARCH_POLICY,
          context: { query: REFUND_POLICY_QUERY },
          parallel: true,
        },
        {
          handler: TRANSACTION_AGENT,
          task: GET_ORDER,
          context: { orderId: context.orderId },
          parallel: true,
        },
      ];
    }

    return [{ handler: POLICY_EXPERT, task: SEARCH_POLICY, context: { query: context.message }, parallel: false }];
  }

  private async invoke(call: CallSpec, parent?: SpanParent): Promise<TaskResponse> {
    const startTime = Date.now();
    const failed = (cause: string): TaskResponse =>
      errorResponse(call.handler, `Task failed in ${call.handler}: ${cause}`, {
        timestamp: new Date().toISOString(),
        latencyMs: Date.now() - startTime,
        task: call.task,
        state: "failed",
      });

    const handler = this.handlers.get(call.handler);
    if (!handler) {
      log.error({ handler: call.handler, task: call.task }, "No handler registered");
      return failed("no handler registered");
    }

    try {
      return await handler.handle(createTaskRequest(call.handler, call.task, call.context), parent);
    } catch (error) {
      log.error(
        { handler: call.handler, task: call.task, error: toErrorMessage(error) },
        "Handler raised past its boundary",
      );
      return failed(toErrorMessage(error));
    }
  }

  /**
   * Runs every parallel call concurrently and waits for all of them before
   * the sequential calls run in list order. A failing branch becomes an
   * error response under its own handler name and never aborts the others.
   */
  async dispatch(calls: CallSpec[], parent?: SpanParent): Promise<DispatchResults> {
    const span = openSpan(parent, {
      name: "dispatch",
      input: calls.map(({ handler, task, parallel }) => ({ handler, task, parallel })),
    });
    const results: DispatchResults = new Map();

    const parallel = calls.filter((call) => call.parallel);
    const responses = await Promise.all(parallel.map((call) => this.invoke(call, span)));
    parallel.forEach((call, index) => results.set(call.handler, responses[index]));

    for (const call of calls.filter((candidate) => !candidate.parallel)) {
      results.set(call.handler, await this.invoke(call, span));
    }

    traceSafely(() =>
      span?.end({
        output: [...results.values()].map(({ source, status }) => ({ source, status })),
      }),
    );
    return results;
  }

  private async checkEligibility(
    order: OrderRecord,
    parent?: SpanParent,
  ): Promise<EligibilityResult | undefined> {
    const response = await this.invoke(
      { handler: TRANSACTION_AGENT, task: CHECK_ELIGIBILITY, context: { order }, parallel: false },
      parent,
    );
    if (response.status === "error") {
      log.warn({ error: response.error }, "Eligibility check failed");
      return undefined;
    }
    const parsed = EligibilityResultSchema.safeParse(response.result);
    if (!parsed.success) {
      log.error({ issues: parsed.error.issues }, "Eligibility result has unexpected shape");
      return undefined;
    }
    return parsed.data;
  }

  private describeResults(results: DispatchResults, eligibility?: EligibilityResult): string {
    const sections = [...results.values()].map((response) => {
      if (response.status === "error") {
        // Internal error text stays in the logs.
        return `[${response.source}] could not complete its task.`;
      }
      return `[${response.source}] ${JSON.stringify(response.result)}`;
    });
    if (eligibility) {
      sections.push(`[eligibility] ${JSON.stringify(eligibility)}`);
    }
    return sections.join("\n\n");
  }

  async assembleResponse(
    intent: Intent,
    message: string,
    results: DispatchResults,
    sessionContext: SessionContext = {},
    parent?: SpanParent,
  ): Promise<AssembledResponse> {
    const span = openSpan(parent, { name: "assemble-response", input: { intent } });
    const agentsCalled: HandlerId[] = [];
    let order: OrderRecord | undefined;
    let eligibility: EligibilityResult | undefined;

    const transaction = results.get(TRANSACTION_AGENT);
    if (intent === "refund" && transaction?.status === "success") {
      const lookup = GetOrderResultSchema.safeParse(transaction.result);
      if (lookup.success && lookup.data.found && lookup.data.order) {
        order = lookup.data.order;
        agentsCalled.push(TRANSACTION_AGENT);
        eligibility = await this.checkEligibility(order, span);
      }
    }

    const prompt = await assemblyPrompt.format({
      intent,
      history: sessionContext.history ?? NO_HISTORY,
      message,
      results: this.describeResults(results, eligibility),
      format_instructions: responseParser.getFormatInstructions(),
    });

    let template: ResponseTemplate;
    try {
      template = await completeStructured(this.caller, this.llm, prompt, responseParser, {
        label: "assemble-response",
        timeoutMs: this.options.llmTimeoutMs,
      });
    } catch (error) {
      if (!(error instanceof AssemblyFormatError)) {
        traceSafely(() => {
          span?.update({ level: "ERROR", statusMessage: toErrorMessage(error) });
          span?.end();
        });
        throw error;
      }
      log.warn({ error: error.message }, "Response output failed validation, using fallback template");
      template = fallbackTemplate(this.options.supportContact);
    }

    if (eligibility && template.responseType !== "error") {
      const decided = eligibilityResponseType(eligibility);
      if (template.responseType !== decided) {
        log.warn(
          { modelResponseType: template.responseType, responseType: decided },
          "Model response type disagrees with eligibility decision",
        );
        template = { ...template, responseType: decided };
      }
    }

    traceSafely(() => span?.end({ output: template }));
    return { template, order, eligibility, agentsCalled };
  }

  /** Never rejects: unrecoverable faults become a generic apology. */
  async handleTurn(userText: string, sessionContext: SessionContext = {}): Promise<TurnResult> {
    const startTime = Date.now();
    const span = openSpan(sessionContext.trace, {
      name: "coordinator",
      input: { message: userText },
      metadata: { sessionId: sessionContext.sessionId },
    });
    let classification: IntentClassification = { intent: "general", confidence: 0 };
    const agentsCalled: HandlerId[] = [];

    try {
      classification = await this.classifyIntent(userText, sessionContext.history, span);
      const extracted = extractOrderId(userText);
      if (extracted) {
        log.info(extracted, "Order id extracted");
      }

      const calls = this.planCalls(classification.intent, {
        message: userText,
        orderId: extracted?.orderId ?? null,
      });
      const results = await this.dispatch(calls, span);
      for (const call of calls) {
        agentsCalled.push(call.handler);
      }

      const assembled = await this.assembleResponse(
        classification.intent,
        userText,
        results,
        sessionContext,
        span,
      );
      for (const handler of assembled.agentsCalled) {
        if (!agentsCalled.includes(handler)) {
          agentsCalled.push(handler);
        }
      }

      const result: TurnResult = {
        ...assembled.template,
        agentsCalled,
        latencyMs: Date.now() - startTime,
        intent: classification.intent,
        intentConfidence: classification.confidence,
        extractedOrderId: extracted?.orderId,
        extractionMethod: extracted?.method,
        order: assembled.order,
        eligibility: assembled.eligibility,
      };

      traceSafely(() =>
        span?.end({
          output: { responseType: result.responseType, agentsCalled },
          metadata: { latencyMs: result.latencyMs },
        }),
      );
      log.info(
        { intent: result.intent, responseType: result.responseType, agentsCalled, latencyMs: result.latencyMs },
        "Turn handled",
      );
      return result;
    } catch (error) {
      log.error({ error: toErrorMessage(error) }, "Turn failed");
      traceSafely(() => {
        span?.update({ level: "ERROR", statusMessage: toErrorMessage(error) });
        span?.end();
      });
      return {
        responseType: "error",
        message: GENERIC_APOLOGY,
        actionRequired: "",
        keyDetails: [],
        agentsCalled,
        latencyMs: Date.now() - startTime,
        intent: classification.intent,
        intentConfidence: classification.confidence,
      };
    }
  }
}
