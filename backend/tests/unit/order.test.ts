import { describe, test, expect } from "vitest";
import {
  OrderItemSchema,
  OrderRecordSchema,
  orderTotal,
  validateOrderRecord,
} from "../../src/models/order.js";
import { z } from "zod";

describe("Order Validation", () => {
  const validOrder = {
    orderId: "ORD-84315",
    userId: "user-001",
    purchaseDate: "2025-03-15T12:00:00.000Z",
    status: "DELIVERED" as const,
    items: [{ name: "Trail Runner Shoes", price: 129.99 }],
  };

  describe("OrderItemSchema", () => {
    test("should validate a valid item", () => {
      expect(OrderItemSchema.safeParse({ name: "Merino Socks", price: 18 }).success).toBe(true);
    });

    test("should accept a free item", () => {
      expect(OrderItemSchema.safeParse({ name: "Gift Card Sleeve", price: 0 }).success).toBe(true);
    });

    test("should reject a negative price", () => {
      expect(OrderItemSchema.safeParse({ name: "Merino Socks", price: -1 }).success).toBe(false);
    });

    test("should reject an empty name", () => {
      expect(OrderItemSchema.safeParse({ name: "", price: 18 }).success).toBe(false);
    });
  });

  describe("OrderRecordSchema", () => {
    test("should validate a valid order", () => {
      expect(OrderRecordSchema.safeParse(validOrder).success).toBe(true);
    });

    test("should accept refund details", () => {
      const result = OrderRecordSchema.safeParse({
        ...validOrder,
        status: "RETURNED",
        refundTransactionId: "REF-1A2B3C4D",
        refundDate: "2025-03-18T09:30:00.000Z",
        refundAmount: 129.99,
      });
      expect(result.success).toBe(true);
    });

    test("should accept purchase dates with an offset", () => {
      expect(
        OrderRecordSchema.safeParse({ ...validOrder, purchaseDate: "2025-03-15T08:00:00-04:00" }).success,
      ).toBe(true);
    });

    test("should reject order ids without the ORD- prefix", () => {
      const result = OrderRecordSchema.safeParse({ ...validOrder, orderId: "84315" });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe("Order ID must look like ORD-12345");
      }
    });

    test("should validate the status enum", () => {
      const statuses = ["PENDING", "SHIPPED", "DELIVERED", "RETURNED", "CANCELLED"] as const;
      for (const status of statuses) {
        expect(OrderRecordSchema.safeParse({ ...validOrder, status }).success).toBe(true);
      }
    });

    test("should reject an invalid status", () => {
      expect(OrderRecordSchema.safeParse({ ...validOrder, status: "delivered" }).success).toBe(false);
    });

    test("should reject a purchase date that is not a timestamp", () => {
      expect(OrderRecordSchema.safeParse({ ...validOrder, purchaseDate: "last week" }).success).toBe(false);
    });
  });

  describe("validateOrderRecord", () => {
    test("should return the parsed order", () => {
      expect(validateOrderRecord(validOrder)).toEqual(validOrder);
    });

    test("should throw for an invalid order structure", () => {
      expect(() => validateOrderRecord({ orderId: "ORD-1" })).toThrow(z.ZodError);
    });
  });

  describe("orderTotal", () => {
    test("should sum item prices", () => {
      expect(
        orderTotal({
          items: [
            { name: "Minimalist Sandals", price: 59.5 },
            { name: "Merino Socks", price: 18 },
          ],
        }),
      ).toBe(77.5);
    });

    test("should round away floating point noise", () => {
      expect(
        orderTotal({
          items: [
            { name: "Laces", price: 0.1 },
            { name: "Insoles", price: 0.2 },
          ],
        }),
      ).toBe(0.3);
    });

    test("should be zero for an order without items", () => {
      expect(orderTotal({ items: [] })).toBe(0);
    });
  });
});
