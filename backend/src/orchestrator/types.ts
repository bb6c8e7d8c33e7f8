import { HandlerId, TaskName, TaskResponse } from "../agents/protocol.js";
import { OrderRecord } from "../models/order.js";
import {
  EligibilityResult,
  Intent,
  ResponseTemplate,
  ResponseType,
} from "../models/schemas.js";
import { SpanParent } from "../utils/tracing.js";
import { ExtractionMethod } from "./order-id.js";

export interface CallSpec {
  handler: HandlerId;
  task: TaskName;
  context: Record<string, unknown>;
  /** Parallel calls fan out together; sequential ones run afterwards in list order. */
  parallel: boolean;
}

export interface PlanContext {
  message: string;
  orderId: string | null;
}

export type DispatchResults = Map<HandlerId, TaskResponse>;

export interface SessionContext {
  sessionId?: string;
  /** Compacted conversation so far, rendered for prompts. */
  history?: string;
  trace?: SpanParent;
}

export interface AssembledResponse {
  template: ResponseTemplate;
  order?: OrderRecord;
  eligibility?: EligibilityResult;
  /** Handlers invoked during assembly, e.g. for the eligibility check. */
  agentsCalled: HandlerId[];
}

export interface TurnResult {
  responseType: ResponseType;
  message: string;
  actionRequired: string;
  keyDetails: string[];
  agentsCalled: HandlerId[];
  latencyMs: number;
  intent: Intent;
  intentConfidence: number;
  extractedOrderId?: string;
  extractionMethod?: ExtractionMethod;
  order?: OrderRecord;
  eligibility?: EligibilityResult;
}
