import { Langfuse } from "langfuse";
import { getConfig } from "../config/env.js";
import { componentLogger } from "../logger.js";

const log = componentLogger("langfuse");

let langfuseInstance: Langfuse | null = null;

export function getLangfuse(): Langfuse | null {
  const config = getConfig();
  if (!config.langfuseEnabled) {
    return null;
  }

  if (langfuseInstance) {
    return langfuseInstance;
  }

  if (!config.langfuseSecretKey || !config.langfusePublicKey) {
    log.warn(
      "Langfuse is enabled but LANGFUSE_SECRET_KEY or LANGFUSE_PUBLIC_KEY is not set; tracing disabled",
    );
    return null;
  }

  try {
    langfuseInstance = new Langfuse({
      secretKey: config.langfuseSecretKey,
      publicKey: config.langfusePublicKey,
      baseUrl: config.langfuseBaseUrl,
    });
    log.info("Langfuse initialized");
    return langfuseInstance;
  } catch (error) {
    log.error({ error }, "Failed to initialize Langfuse");
    return null;
  }
}

export async function safeLangfuseOperation<T>(
  operation: (langfuse: Langfuse) => Promise<T> | T,
  fallback?: T,
): Promise<T | undefined> {
  const langfuse = getLangfuse();
  if (!langfuse) {
    return fallback;
  }

  try {
    return await operation(langfuse);
  } catch (error) {
    log.error({ error }, "Langfuse operation failed");
    return fallback;
  }
}
