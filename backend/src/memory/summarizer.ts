import { GenerativeService, completeText } from "../llm/index.js";
import { summaryPrompt } from "../prompts/refund.js";
import { ResilientCaller } from "../resilience/resilient-call.js";
import { Summarizer } from "./conversation-history.js";

export function createLlmSummarizer(
  llm: GenerativeService,
  caller: ResilientCaller,
  timeoutMs: number,
): Summarizer {
  return async (messages, previousSummary) => {
    const prompt = await summaryPrompt.format({
      previous_summary: previousSummary ?? "(none)",
      conversation: messages
        .map((message) => `${message.role === "user" ? "User" : "Assistant"}: ${message.content}`)
        .join("\n"),
    });
    const text = await completeText(caller, llm, prompt, { label: "summarize-history", timeoutMs });
    const summary = text.trim();
    if (!summary) {
      throw new Error("Summarizer returned an empty summary");
    }
    return summary;
  };
}
