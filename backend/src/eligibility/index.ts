import { z } from "zod";
import { componentLogger } from "../logger.js";
import { toErrorMessage } from "../errors.js";
import { EligibilityResult } from "../models/schemas.js";

const log = componentLogger("eligibility");

export const REFUND_WINDOW_DAYS = 14;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * The slice of an order that eligibility depends on. Looser than
 * OrderRecord on purpose: records arriving through a task context may be
 * missing their purchase date or carry an unparsable one.
 */
export const EligibilityOrderSchema = z.object({
  status: z.string(),
  purchaseDate: z.union([z.string(), z.date()]).nullish(),
  refundTransactionId: z.string().nullish(),
  refundDate: z.string().nullish(),
  refundAmount: z.number().nonnegative().nullish(),
});

export type EligibilityOrder = z.infer<typeof EligibilityOrderSchema>;

function toDate(value: string | Date): Date {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid purchase date: ${String(value)}`);
  }
  return date;
}

export function daysBetween(from: Date, to: Date): number {
  const elapsed = Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
  if (elapsed < 0) {
    throw new Error(`Purchase date ${from.toISOString()} is in the future`);
  }
  return elapsed;
}

/**
 * Decides refund eligibility with ordered, fail-fast checks:
 * already returned, then non-delivered status, then missing purchase date,
 * then the refund window. Never throws.
 */
export function checkRefundEligibility(
  order: EligibilityOrder,
  now: Date = new Date(),
  windowDays: number = REFUND_WINDOW_DAYS,
): EligibilityResult {
  const orderStatus = order.status.toUpperCase();

  if (orderStatus === "RETURNED") {
    log.info({ orderStatus, refundDate: order.refundDate }, "Order already refunded");
    return {
      eligible: false,
      reason: "Order was already refunded",
      alreadyRefunded: true,
      invalidStatus: false,
      orderStatus,
      refundTransactionId: order.refundTransactionId ?? undefined,
      refundDate: order.refundDate ?? undefined,
      refundAmount: order.refundAmount ?? undefined,
    };
  }

  if (orderStatus !== "DELIVERED") {
    log.info({ orderStatus, requiredStatus: "DELIVERED" }, "Order status not refundable");
    return {
      eligible: false,
      reason: `Order status is '${orderStatus}'. Only DELIVERED orders can be refunded.`,
      alreadyRefunded: false,
      invalidStatus: true,
      orderStatus,
    };
  }

  if (!order.purchaseDate) {
    return {
      eligible: false,
      reason: "Purchase date not found in order data",
      alreadyRefunded: false,
      invalidStatus: false,
      orderStatus,
    };
  }

  try {
    const daysSincePurchase = daysBetween(toDate(order.purchaseDate), now);

    if (daysSincePurchase <= windowDays) {
      return {
        eligible: true,
        reason: `Order is within ${windowDays}-day refund window`,
        alreadyRefunded: false,
        invalidStatus: false,
        orderStatus,
        daysSincePurchase,
        daysRemaining: windowDays - daysSincePurchase,
      };
    }

    return {
      eligible: false,
      reason: `Order is ${daysSincePurchase} days old, exceeds ${windowDays}-day limit`,
      alreadyRefunded: false,
      invalidStatus: false,
      orderStatus,
      daysSincePurchase,
    };
  } catch (error) {
    log.error({ error: toErrorMessage(error) }, "Eligibility check failed");
    return {
      eligible: false,
      reason: `Error checking eligibility: ${toErrorMessage(error)}`,
      alreadyRefunded: false,
      invalidStatus: false,
      orderStatus,
    };
  }
}
