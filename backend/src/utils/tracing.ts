import { logger } from "../logger.js";

export type ObservationLevel = "DEBUG" | "DEFAULT" | "WARNING" | "ERROR";

export interface ObservationBody {
  input?: unknown;
  output?: unknown;
  metadata?: unknown;
  level?: ObservationLevel;
  statusMessage?: string;
}

export interface SpanBody extends ObservationBody {
  name: string;
}

/**
 * Anything spans can be opened under. Langfuse traces and spans both fit,
 * so handlers never depend on the Langfuse client directly.
 */
export interface SpanParent {
  span(body: SpanBody): TraceSpan;
}

export interface TraceSpan extends SpanParent {
  update(body: ObservationBody): unknown;
  end(body?: ObservationBody): unknown;
}

/**
 * Runs a tracing side effect. A failing sink is logged and otherwise ignored.
 */
export function traceSafely<T>(operation: () => T): T | undefined {
  try {
    return operation();
  } catch (error) {
    logger.warn({ error }, "Tracing operation failed");
    return undefined;
  }
}

export function openSpan(
  parent: SpanParent | undefined,
  body: SpanBody,
): TraceSpan | undefined {
  if (!parent) {
    return undefined;
  }
  return traceSafely(() => parent.span(body));
}
