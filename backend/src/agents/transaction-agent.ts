import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import { OrderRepository } from "../database/repositories.js";
import { EligibilityOrderSchema, checkRefundEligibility } from "../eligibility/index.js";
import { OrderRecord } from "../models/order.js";
import {
  EligibilityResult,
  GetOrderResult,
  RefundProcessingResult,
} from "../models/schemas.js";
import { ResilientCaller } from "../resilience/resilient-call.js";
import { TRANSACTION_AGENT, TaskRequest } from "./protocol.js";
import { ExecutionScope, TaskExecutor, TaskHandler, parseContext } from "./task-handler.js";

export const GET_ORDER = "get_order";
export const CHECK_ELIGIBILITY = "check_eligibility";
export const PROCESS_REFUND = "process_refund";

export const MISSING_ORDER_ID = "MISSING_ORDER_ID";
export const ORDER_NOT_FOUND = "ORDER_NOT_FOUND";

const GetOrderContextSchema = z.object({
  orderId: z.string().trim().min(1).nullish(),
});

const CheckEligibilityContextSchema = z.object({
  order: EligibilityOrderSchema.passthrough(),
});

const ProcessRefundContextSchema = z.object({
  orderId: z.string().trim().min(1),
  amount: z.number().positive(),
});

export interface TransactionExecutorOptions {
  datastoreTimeoutMs: number;
  refundWindowDays: number;
  /** Injectable clock for eligibility decisions. */
  now?: () => Date;
}

export function generateRefundTransactionId(): string {
  return `REF-${uuidv4().split("-")[0].toUpperCase()}`;
}

export class TransactionExecutor implements TaskExecutor {
  readonly tasks = [GET_ORDER, CHECK_ELIGIBILITY, PROCESS_REFUND] as const;
  private readonly now: () => Date;

  constructor(
    private readonly orders: OrderRepository,
    private readonly caller: ResilientCaller,
    private readonly options: TransactionExecutorOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async execute(
    request: TaskRequest,
    scope: ExecutionScope,
  ): Promise<GetOrderResult | EligibilityResult | RefundProcessingResult> {
    switch (request.task) {
      case GET_ORDER:
        return this.getOrder(parseContext(GetOrderContextSchema, request).orderId ?? null, scope);
      case CHECK_ELIGIBILITY:
        return checkRefundEligibility(
          parseContext(CheckEligibilityContextSchema, request).order,
          this.now(),
          this.options.refundWindowDays,
        );
      case PROCESS_REFUND: {
        const { orderId, amount } = parseContext(ProcessRefundContextSchema, request);
        return this.processRefund(orderId.toUpperCase(), amount, scope);
      }
      default:
        throw new Error(`Unsupported task '${request.task}'`);
    }
  }

  private loadOrder(orderId: string): Promise<OrderRecord | null> {
    return this.caller.call("datastore", () => this.orders.getOrder(orderId), {
      label: "get-order",
      timeoutMs: this.options.datastoreTimeoutMs,
    });
  }

  private async getOrder(orderId: string | null, scope: ExecutionScope): Promise<GetOrderResult> {
    if (!orderId) {
      scope.log.info("Order lookup requested without an order id");
      return {
        orderId: null,
        order: null,
        found: false,
        error: MISSING_ORDER_ID,
        userMessage: "Please provide your order ID (for example ORD-12345) so I can look it up.",
      };
    }

    const normalized = orderId.toUpperCase();
    const order = await this.loadOrder(normalized);
    if (!order) {
      scope.log.info({ orderId: normalized }, "Order not found");
      return {
        orderId: normalized,
        order: null,
        found: false,
        error: ORDER_NOT_FOUND,
        userMessage: `Order '${normalized}' not found in database.`,
      };
    }

    return { orderId: normalized, order, found: true };
  }

  private async processRefund(
    orderId: string,
    amount: number,
    scope: ExecutionScope,
  ): Promise<RefundProcessingResult> {
    const order = await this.loadOrder(orderId);
    if (!order) {
      return { orderId, amount, success: false, error: `Order '${orderId}' not found in database.` };
    }

    if (order.status === "RETURNED") {
      return {
        orderId,
        amount: order.refundAmount ?? amount,
        success: false,
        transactionId: order.refundTransactionId,
        refundDate: order.refundDate,
        error: "Order was already refunded",
      };
    }

    const eligibility = checkRefundEligibility(order, this.now(), this.options.refundWindowDays);
    if (!eligibility.eligible) {
      return { orderId, amount, success: false, error: eligibility.reason };
    }

    const transactionId = generateRefundTransactionId();
    const refundDate = this.now().toISOString();
    const outcome = await this.caller.call(
      "datastore",
      () =>
        this.orders.updateOrderStatus(orderId, order.status, "RETURNED", {
          refundTransactionId: transactionId,
          refundDate,
          refundAmount: amount,
        }),
      { label: "update-order-status", timeoutMs: this.options.datastoreTimeoutMs },
    );

    if (outcome !== "ok") {
      scope.log.warn({ orderId, outcome }, "Refund not applied");
      return {
        orderId,
        amount,
        success: false,
        error:
          outcome === "conflict"
            ? "Order status changed while processing the refund (conflict)"
            : `Order '${orderId}' not found in database.`,
      };
    }

    scope.log.info({ orderId, transactionId, amount }, "Refund processed");
    return { orderId, amount, success: true, transactionId, refundDate };
  }
}

export function createTransactionAgent(
  orders: OrderRepository,
  caller: ResilientCaller,
  options: TransactionExecutorOptions,
): TaskHandler {
  return new TaskHandler(TRANSACTION_AGENT, new TransactionExecutor(orders, caller, options));
}
