import { ChatOpenAI } from "@langchain/openai";
import { MessageContent } from "@langchain/core/messages";
import { Config } from "../../config/env.js";
import { logger } from "../../logger.js";
import { GenerativeService } from "../index.js";

export interface LLMOptions {
  temperature?: number;
}

export function messageText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

export function createOpenAILLM(config: Config, options?: LLMOptions): GenerativeService {
  if (!config.openaiApiKey) {
    throw new Error("OpenAI API key is required");
  }

  const llm = new ChatOpenAI({
    openAIApiKey: config.openaiApiKey,
    modelName: config.llmModel,
    temperature: options?.temperature ?? 0,
    // timeouts and retries are owned by ResilientCaller
    maxRetries: 0,
  });

  logger.debug(
    {
      provider: "openai",
      model: config.llmModel,
      temperature: options?.temperature ?? 0,
    },
    "OpenAI LLM instance created",
  );

  return {
    async complete(prompt, completeOptions) {
      const response = await llm.invoke(prompt, { signal: completeOptions?.signal });
      return {
        text: messageText(response.content),
        tokensUsed: response.usage_metadata?.total_tokens,
      };
    },
  };
}
