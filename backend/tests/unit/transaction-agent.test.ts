import { describe, test, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { TRANSACTION_AGENT, createTaskRequest } from "../../src/agents/protocol.js";
import { TaskHandler } from "../../src/agents/task-handler.js";
import {
  CHECK_ELIGIBILITY,
  GET_ORDER,
  PROCESS_REFUND,
  createTransactionAgent,
  generateRefundTransactionId,
} from "../../src/agents/transaction-agent.js";
import { OrderRepository, SqliteOrderRepository, getOrderById } from "../../src/database/index.js";
import { NOW, daysBefore, makeCaller, makeDatabase, makeOrder } from "../helpers/fakes.js";

describe("transaction agent", () => {
  let db: Database.Database;
  let agent: TaskHandler;

  function buildAgent(orders: OrderRepository): TaskHandler {
    return createTransactionAgent(orders, makeCaller(), {
      datastoreTimeoutMs: 1000,
      refundWindowDays: 14,
      now: () => NOW,
    });
  }

  beforeEach(() => {
    db = makeDatabase([
      makeOrder(),
      makeOrder({ orderId: "ORD-47102", purchaseDate: daysBefore(30) }),
      makeOrder({ orderId: "ORD-55021", status: "SHIPPED", purchaseDate: daysBefore(2) }),
      makeOrder({
        orderId: "ORD-70419",
        status: "RETURNED",
        refundTransactionId: "REF-1A2B3C4D",
        refundDate: daysBefore(3),
        refundAmount: 119,
      }),
    ]);
    agent = buildAgent(new SqliteOrderRepository(db));
  });

  afterEach(() => {
    db.close();
  });

  describe(GET_ORDER, () => {
    test("should return a stored order", async () => {
      const response = await agent.handle(
        createTaskRequest(TRANSACTION_AGENT, GET_ORDER, { orderId: "ord-84315" }),
      );

      expect(response.status).toBe("success");
      expect(response.result).toEqual({ orderId: "ORD-84315", order: makeOrder(), found: true });
    });

    test("should report a missing order id as a normal result", async () => {
      const response = await agent.handle(createTaskRequest(TRANSACTION_AGENT, GET_ORDER, { orderId: null }));

      expect(response.status).toBe("success");
      expect(response.result).toEqual({
        orderId: null,
        order: null,
        found: false,
        error: "MISSING_ORDER_ID",
        userMessage: "Please provide your order ID (for example ORD-12345) so I can look it up.",
      });
    });

    test("should report an unknown order as not found", async () => {
      const response = await agent.handle(
        createTaskRequest(TRANSACTION_AGENT, GET_ORDER, { orderId: "ORD-99999" }),
      );

      expect(response.result).toEqual({
        orderId: "ORD-99999",
        order: null,
        found: false,
        error: "ORDER_NOT_FOUND",
        userMessage: "Order 'ORD-99999' not found in database.",
      });
    });

    test("should turn a datastore failure into an error response", async () => {
      const failing = buildAgent({
        getOrder: async () => {
          throw new Error("disk I/O error");
        },
        updateOrderStatus: async () => "ok",
      });

      const response = await failing.handle(
        createTaskRequest(TRANSACTION_AGENT, GET_ORDER, { orderId: "ORD-84315" }),
      );
      expect(response.status).toBe("error");
      expect(response.error).toBe("Task failed in transaction_agent: disk I/O error");
    });
  });

  describe(CHECK_ELIGIBILITY, () => {
    test("should evaluate the order passed in the context", async () => {
      const response = await agent.handle(
        createTaskRequest(TRANSACTION_AGENT, CHECK_ELIGIBILITY, { order: makeOrder() }),
      );

      expect(response.result).toMatchObject({ eligible: true, daysSincePurchase: 5, daysRemaining: 9 });
    });

    test("should reject a context without an order", async () => {
      const response = await agent.handle(createTaskRequest(TRANSACTION_AGENT, CHECK_ELIGIBILITY, {}));

      expect(response.status).toBe("error");
      expect(response.error).toBe(
        "Task failed in transaction_agent: Invalid context for check_eligibility: order: Required",
      );
    });
  });

  describe(PROCESS_REFUND, () => {
    test("should mark an eligible order as returned", async () => {
      const response = await agent.handle(
        createTaskRequest(TRANSACTION_AGENT, PROCESS_REFUND, { orderId: "ORD-84315", amount: 129.99 }),
      );

      expect(response.status).toBe("success");
      expect(response.result).toMatchObject({
        orderId: "ORD-84315",
        amount: 129.99,
        success: true,
        refundDate: NOW.toISOString(),
      });
      expect(response.result?.transactionId).toMatch(/^REF-[0-9A-F]{8}$/);

      const stored = getOrderById(db, "ORD-84315");
      expect(stored?.status).toBe("RETURNED");
      expect(stored?.refundAmount).toBe(129.99);
      expect(stored?.refundTransactionId).toBe(response.result?.transactionId);
    });

    test("should refuse an order that was already refunded", async () => {
      const response = await agent.handle(
        createTaskRequest(TRANSACTION_AGENT, PROCESS_REFUND, { orderId: "ORD-70419", amount: 119 }),
      );

      expect(response.result).toEqual({
        orderId: "ORD-70419",
        amount: 119,
        success: false,
        transactionId: "REF-1A2B3C4D",
        refundDate: daysBefore(3),
        error: "Order was already refunded",
      });
    });

    test("should refuse orders outside the refund window", async () => {
      const response = await agent.handle(
        createTaskRequest(TRANSACTION_AGENT, PROCESS_REFUND, { orderId: "ORD-47102", amount: 129.99 }),
      );

      expect(response.result).toEqual({
        orderId: "ORD-47102",
        amount: 129.99,
        success: false,
        error: "Order is 30 days old, exceeds 14-day limit",
      });
      expect(getOrderById(db, "ORD-47102")?.status).toBe("DELIVERED");
    });

    test("should refuse orders that were not delivered", async () => {
      const response = await agent.handle(
        createTaskRequest(TRANSACTION_AGENT, PROCESS_REFUND, { orderId: "ORD-55021", amount: 129.99 }),
      );

      expect(response.result).toMatchObject({
        success: false,
        error: "Order status is 'SHIPPED'. Only DELIVERED orders can be refunded.",
      });
    });

    test("should report a status change during processing as a conflict", async () => {
      const racing = buildAgent({
        getOrder: async () => makeOrder(),
        updateOrderStatus: async () => "conflict",
      });

      const response = await racing.handle(
        createTaskRequest(TRANSACTION_AGENT, PROCESS_REFUND, { orderId: "ORD-84315", amount: 129.99 }),
      );

      expect(response.result).toEqual({
        orderId: "ORD-84315",
        amount: 129.99,
        success: false,
        error: "Order status changed while processing the refund (conflict)",
      });
    });

    test("should only refund once when confirmed twice", async () => {
      const first = await agent.handle(
        createTaskRequest(TRANSACTION_AGENT, PROCESS_REFUND, { orderId: "ORD-84315", amount: 129.99 }),
      );
      const second = await agent.handle(
        createTaskRequest(TRANSACTION_AGENT, PROCESS_REFUND, { orderId: "ORD-84315", amount: 129.99 }),
      );

      expect(first.result?.success).toBe(true);
      expect(second.result).toMatchObject({
        success: false,
        error: "Order was already refunded",
        transactionId: first.result?.transactionId,
      });
    });

    test("should validate the amount", async () => {
      const response = await agent.handle(
        createTaskRequest(TRANSACTION_AGENT, PROCESS_REFUND, { orderId: "ORD-84315", amount: 0 }),
      );

      expect(response.status).toBe("error");
      expect(response.error).toBe(
        "Task failed in transaction_agent: Invalid context for process_refund: amount: Number must be greater than 0",
      );
    });
  });

  test("should generate refund ids with eight upper-case hex digits", () => {
    expect(generateRefundTransactionId()).toMatch(/^REF-[0-9A-F]{8}$/);
  });
});
