import Database from "better-sqlite3";
import { OrderRecord, OrderStatus, RefundFields } from "../models/order.js";
import { PolicyChunk } from "../models/policy.js";
import {
  UpdateOrderOutcome,
  getAllPolicyChunks,
  getOrderById,
  updateOrderStatus,
} from "./operations.js";

export interface OrderRepository {
  getOrder(orderId: string): Promise<OrderRecord | null>;
  updateOrderStatus(
    orderId: string,
    expectedStatus: OrderStatus,
    status: OrderStatus,
    refund?: RefundFields,
  ): Promise<UpdateOrderOutcome>;
}

export interface PolicyChunkRepository {
  listChunks(): Promise<PolicyChunk[]>;
}

export class SqliteOrderRepository implements OrderRepository {
  constructor(private readonly db: Database.Database) {}

  async getOrder(orderId: string): Promise<OrderRecord | null> {
    return getOrderById(this.db, orderId);
  }

  async updateOrderStatus(
    orderId: string,
    expectedStatus: OrderStatus,
    status: OrderStatus,
    refund?: RefundFields,
  ): Promise<UpdateOrderOutcome> {
    return updateOrderStatus(this.db, orderId, expectedStatus, status, refund);
  }
}

export class SqlitePolicyChunkRepository implements PolicyChunkRepository {
  constructor(private readonly db: Database.Database) {}

  async listChunks(): Promise<PolicyChunk[]> {
    return getAllPolicyChunks(this.db);
  }
}
