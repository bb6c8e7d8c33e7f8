import { getConfig } from "../src/config/env.js";
import { createDatabase, replacePolicyChunks, upsertOrder } from "../src/database/index.js";
import { createOpenAIEmbeddings } from "../src/embeddings/index.js";
import { loadSeedOrders } from "../src/loaders/order-loader.js";
import {
  embedPolicySections,
  loadPolicyDocument,
  splitPolicyDocument,
} from "../src/loaders/policy-loader.js";
import { logger } from "../src/logger.js";
import { createTextSplitter } from "../src/splitters/index.js";
import { getDataPath } from "../src/utils/paths.js";

async function seed(): Promise<void> {
  const config = getConfig();
  const db = createDatabase(config.databasePath);

  try {
    logger.info({ databasePath: config.databasePath }, "Seeding database");

    const orders = await loadSeedOrders(getDataPath("orders.json"));
    const insertAll = db.transaction(() => {
      for (const order of orders) {
        upsertOrder(db, order);
      }
    });
    insertAll();
    logger.info({ count: orders.length }, "Orders seeded");

    const markdown = await loadPolicyDocument(getDataPath("refund-policy.md"));
    const sections = await splitPolicyDocument(
      markdown,
      createTextSplitter({ chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap }),
    );
    logger.info({ count: sections.length }, "Policy split into chunks");

    const chunks = await embedPolicySections(sections, createOpenAIEmbeddings(config));
    replacePolicyChunks(db, chunks);

    logger.info("Seeding completed successfully");
  } finally {
    db.close();
  }
}

seed().catch((error: unknown) => {
  logger.error({ error }, "Failed to seed database");
  process.exit(1);
});
