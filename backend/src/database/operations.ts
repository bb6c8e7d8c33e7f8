import Database from "better-sqlite3";
import {
  OrderRecord,
  OrderStatus,
  RefundFields,
  validateOrderRecord,
} from "../models/order.js";
import { PolicyChunk, PolicyChunkSchema } from "../models/policy.js";
import { logger } from "../logger.js";

interface OrderRow {
  order_id: string;
  user_id: string;
  purchase_date: string;
  status: string;
  items: string;
  refund_transaction_id: string | null;
  refund_date: string | null;
  refund_amount: number | null;
}

interface PolicyChunkRow {
  chunk_id: string;
  text: string;
  embedding: string;
}

export type UpdateOrderOutcome = "ok" | "conflict" | "not_found";

function rowToOrder(row: OrderRow): OrderRecord {
  const items: unknown = JSON.parse(row.items);
  return validateOrderRecord({
    orderId: row.order_id,
    userId: row.user_id,
    purchaseDate: row.purchase_date,
    status: row.status,
    items,
    refundTransactionId: row.refund_transaction_id ?? undefined,
    refundDate: row.refund_date ?? undefined,
    refundAmount: row.refund_amount ?? undefined,
  });
}

export function upsertOrder(db: Database.Database, order: OrderRecord): OrderRecord {
  const record = validateOrderRecord(order);

  db.prepare(`
    INSERT INTO orders (
      order_id, user_id, purchase_date, status, items,
      refund_transaction_id, refund_date, refund_amount
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(order_id) DO UPDATE SET
      user_id = excluded.user_id,
      purchase_date = excluded.purchase_date,
      status = excluded.status,
      items = excluded.items,
      refund_transaction_id = excluded.refund_transaction_id,
      refund_date = excluded.refund_date,
      refund_amount = excluded.refund_amount
  `).run(
    record.orderId,
    record.userId,
    record.purchaseDate,
    record.status,
    JSON.stringify(record.items),
    record.refundTransactionId ?? null,
    record.refundDate ?? null,
    record.refundAmount ?? null,
  );

  logger.debug({ orderId: record.orderId }, "Order stored");
  return record;
}

export function getOrderById(db: Database.Database, orderId: string): OrderRecord | null {
  const row = db
    .prepare<[string], OrderRow>("SELECT * FROM orders WHERE order_id = ?")
    .get(orderId);

  return row ? rowToOrder(row) : null;
}

export function getAllOrders(db: Database.Database): OrderRecord[] {
  return db
    .prepare<[], OrderRow>("SELECT * FROM orders ORDER BY purchase_date DESC")
    .all()
    .map(rowToOrder);
}

/**
 * Conditional write: the row is only updated while its status still equals
 * `expectedStatus`. A concurrent writer that got there first yields "conflict".
 */
export function updateOrderStatus(
  db: Database.Database,
  orderId: string,
  expectedStatus: OrderStatus,
  status: OrderStatus,
  refund?: RefundFields,
): UpdateOrderOutcome {
  const result = db
    .prepare(`
      UPDATE orders
      SET status = ?,
          refund_transaction_id = COALESCE(?, refund_transaction_id),
          refund_date = COALESCE(?, refund_date),
          refund_amount = COALESCE(?, refund_amount)
      WHERE order_id = ? AND status = ?
    `)
    .run(
      status,
      refund?.refundTransactionId ?? null,
      refund?.refundDate ?? null,
      refund?.refundAmount ?? null,
      orderId,
      expectedStatus,
    );

  if (result.changes > 0) {
    logger.info({ orderId, from: expectedStatus, to: status }, "Order status updated");
    return "ok";
  }

  const exists = db
    .prepare<[string], { order_id: string }>("SELECT order_id FROM orders WHERE order_id = ?")
    .get(orderId);

  if (!exists) {
    logger.warn({ orderId }, "Order not found for status update");
    return "not_found";
  }

  logger.warn({ orderId, expectedStatus }, "Order status changed before update");
  return "conflict";
}

export function replacePolicyChunks(db: Database.Database, chunks: PolicyChunk[]): number {
  const insert = db.prepare(
    "INSERT INTO policy_chunks (chunk_id, text, embedding, position) VALUES (?, ?, ?, ?)",
  );

  const replaceAll = db.transaction((entries: PolicyChunk[]) => {
    db.prepare("DELETE FROM policy_chunks").run();
    entries.forEach((chunk, position) => {
      const valid = PolicyChunkSchema.parse(chunk);
      insert.run(valid.chunkId, valid.text, JSON.stringify(valid.embedding), position);
    });
  });

  replaceAll(chunks);
  logger.info({ chunkCount: chunks.length }, "Policy chunks stored");
  return chunks.length;
}

export function getAllPolicyChunks(db: Database.Database): PolicyChunk[] {
  return db
    .prepare<[], PolicyChunkRow>(
      "SELECT chunk_id, text, embedding FROM policy_chunks ORDER BY position ASC",
    )
    .all()
    .map((row) => {
      const embedding: unknown = JSON.parse(row.embedding);
      return PolicyChunkSchema.parse({ chunkId: row.chunk_id, text: row.text, embedding });
    });
}
