import { z } from "zod";

export const ORDER_ID_PATTERN = /^ORD-\d+$/;

export const OrderStatusSchema = z.enum([
  "PENDING",
  "SHIPPED",
  "DELIVERED",
  "RETURNED",
  "CANCELLED",
]);

export const OrderItemSchema = z.object({
  name: z.string().min(1),
  price: z.number().nonnegative(),
});

export const OrderRecordSchema = z.object({
  orderId: z.string().regex(ORDER_ID_PATTERN, "Order ID must look like ORD-12345"),
  userId: z.string().min(1),
  purchaseDate: z.string().datetime({ offset: true }),
  status: OrderStatusSchema,
  items: z.array(OrderItemSchema),
  refundTransactionId: z.string().optional(),
  refundDate: z.string().optional(),
  refundAmount: z.number().nonnegative().optional(),
});

export type OrderStatus = z.infer<typeof OrderStatusSchema>;
export type OrderItem = z.infer<typeof OrderItemSchema>;
export type OrderRecord = z.infer<typeof OrderRecordSchema>;

export interface RefundFields {
  refundTransactionId: string;
  refundDate: string;
  refundAmount: number;
}

export function validateOrderRecord(order: unknown): OrderRecord {
  return OrderRecordSchema.parse(order);
}

export function orderTotal(order: Pick<OrderRecord, "items">): number {
  const total = order.items.reduce((sum, item) => sum + item.price, 0);
  return Math.round(total * 100) / 100;
}
