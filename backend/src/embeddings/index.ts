import { OpenAIEmbeddings } from "@langchain/openai";
import { Config } from "../config/env.js";
import { logger } from "../logger.js";

export interface EmbeddingService {
  embed(texts: string[]): Promise<number[][]>;
}

export function createOpenAIEmbeddings(config: Config): EmbeddingService {
  if (!config.openaiApiKey) {
    throw new Error("OpenAI API key is required");
  }

  const embeddings = new OpenAIEmbeddings({
    openAIApiKey: config.openaiApiKey,
    modelName: config.embeddingModel,
    // retries are owned by ResilientCaller
    maxRetries: 0,
  });

  logger.debug(
    { provider: "openai", model: config.embeddingModel },
    "OpenAI embeddings instance created",
  );

  return {
    embed: (texts: string[]) => embeddings.embedDocuments(texts),
  };
}
