import { componentLogger } from "../logger.js";

const log = componentLogger("order-id");

export type ExtractionMethod = "canonical" | "keyword" | "reversed" | "fallback";

export interface ExtractedOrderId {
  orderId: string;
  method: ExtractionMethod;
}

const CANONICAL = /ORD-(\d{4,6})/i;

// "order 12345", "order is #12345", "pedido número 12345", "orden de compra 12345".
// The optional leading group tags the reversed Spanish phrasing
// "número de pedido 12345" so it can be told apart in logs.
const KEYWORD =
  /(?:\b(n[uú]mero\s+de\s+))?\b(?:order|purchase|pedido|orden|compra)\b(?:\s+(?:id|is|es|number|no\.?|n[uú]mero(?:\s+de)?|de\s+compra))*\s*[:#]?\s*(\d{4,6})\b/i;

const FALLBACK = /\b(\d{4,6})\b/;

/**
 * Finds an order id in free text. Patterns are tried in priority order and
 * the first class that matches wins, so a canonical id anywhere in the text
 * beats a bare number that appears before it.
 */
export function extractOrderId(text: string): ExtractedOrderId | null {
  const canonical = CANONICAL.exec(text);
  if (canonical) {
    return { orderId: `ORD-${canonical[1]}`, method: "canonical" };
  }

  const keyword = KEYWORD.exec(text);
  if (keyword) {
    return { orderId: `ORD-${keyword[2]}`, method: keyword[1] ? "reversed" : "keyword" };
  }

  const fallback = FALLBACK.exec(text);
  if (fallback) {
    log.warn({ orderId: `ORD-${fallback[1]}` }, "Low-confidence order id extracted from bare number");
    return { orderId: `ORD-${fallback[1]}`, method: "fallback" };
  }

  return null;
}
