import { getConfig } from "./config/env.js";
import { logger } from "./logger.js";
import { createApp } from "./app.js";
import { createRuntime } from "./runtime.js";
import { getLangfuse, safeLangfuseOperation } from "./utils/langfuse.js";

const config = getConfig();
const runtime = createRuntime(config);

const app = createApp({
  runtime,
  startTrace: (name, metadata) => getLangfuse()?.trace({ name, metadata }),
});

const server = app.listen(config.port, () => {
  logger.info({ port: config.port, env: config.nodeEnv }, "Refund assistant listening");
});

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutting down");
  await safeLangfuseOperation((langfuse) => langfuse.shutdownAsync());
  server.close(() => {
    runtime.db.close();
    logger.info("Server closed");
    process.exit(0);
  });
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error }, "Shutdown failed");
      process.exit(1);
    });
  });
}
