import { readFile } from "fs/promises";
import { z } from "zod";
import { OrderItemSchema, OrderRecord, OrderStatusSchema, validateOrderRecord } from "../models/order.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Sample orders are stored with relative dates so the seeded data stays
 * inside or outside the refund window no matter when it is loaded.
 */
export const SeedOrderSchema = z.object({
  orderId: z.string(),
  userId: z.string(),
  purchaseDaysAgo: z.number().int().nonnegative(),
  status: OrderStatusSchema,
  items: z.array(OrderItemSchema),
  refundTransactionId: z.string().optional(),
  refundDaysAgo: z.number().int().nonnegative().optional(),
  refundAmount: z.number().nonnegative().optional(),
});

export type SeedOrder = z.infer<typeof SeedOrderSchema>;

function daysAgo(now: Date, days: number): string {
  return new Date(now.getTime() - days * MS_PER_DAY).toISOString();
}

export function seedToOrderRecord(seed: SeedOrder, now: Date = new Date()): OrderRecord {
  return validateOrderRecord({
    orderId: seed.orderId,
    userId: seed.userId,
    purchaseDate: daysAgo(now, seed.purchaseDaysAgo),
    status: seed.status,
    items: seed.items,
    refundTransactionId: seed.refundTransactionId,
    refundDate: seed.refundDaysAgo === undefined ? undefined : daysAgo(now, seed.refundDaysAgo),
    refundAmount: seed.refundAmount,
  });
}

export async function loadSeedOrders(filePath: string, now: Date = new Date()): Promise<OrderRecord[]> {
  const raw: unknown = JSON.parse(await readFile(filePath, "utf-8"));
  return z
    .array(SeedOrderSchema)
    .parse(raw)
    .map((seed) => seedToOrderRecord(seed, now));
}
