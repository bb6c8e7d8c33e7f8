import Database from "better-sqlite3";
import { dirname } from "path";
import { existsSync, mkdirSync } from "fs";
import { logger } from "../logger.js";

export const IN_MEMORY_DATABASE = ":memory:";

export function initializeDatabase(db: Database.Database): void {
  logger.debug("Initializing database schema");

  db.exec(`
    CREATE TABLE IF NOT EXISTS orders (
      order_id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      purchase_date TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'PENDING',
      items TEXT NOT NULL,
      refund_transaction_id TEXT,
      refund_date TEXT,
      refund_amount REAL
    );

    CREATE INDEX IF NOT EXISTS idx_orders_user_id ON orders(user_id);
    CREATE INDEX IF NOT EXISTS idx_orders_status ON orders(status);

    CREATE TABLE IF NOT EXISTS policy_chunks (
      chunk_id TEXT PRIMARY KEY,
      text TEXT NOT NULL,
      embedding TEXT NOT NULL,
      position INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_policy_chunks_position ON policy_chunks(position);
  `);

  logger.debug("Database schema initialized");
}

export function createDatabase(databasePath: string): Database.Database {
  if (databasePath !== IN_MEMORY_DATABASE) {
    const dir = dirname(databasePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(databasePath);
  db.pragma("journal_mode = WAL");
  initializeDatabase(db);
  return db;
}
