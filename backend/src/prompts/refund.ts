import { PromptTemplate } from "@langchain/core/prompts";
import { StructuredOutputParser } from "@langchain/core/output_parsers";
import {
  IntentClassificationSchema,
  ResponseTemplateSchema,
} from "../models/schemas.js";

export const intentParser = StructuredOutputParser.fromZodSchema(IntentClassificationSchema);

export const responseParser = StructuredOutputParser.fromZodSchema(ResponseTemplateSchema);

export const intentPrompt = PromptTemplate.fromTemplate(
  `You classify customer service messages for an online store's refund desk.

Categories:
- refund: the customer wants to return an item, get their money back, or asks about the refund status of a specific order
- policy: the customer asks how refunds or returns work in general, without asking to act on an order
- general: anything else

The customer may write in English or Spanish.

Recent conversation:
{history}

Message: {message}

{format_instructions}`,
);

export const assemblyPrompt = PromptTemplate.fromTemplate(
  `You are a friendly, empathetic refund assistant. Write the final reply to the customer.

Rules:
- Reply in the same language as the customer's message.
- Base every statement on the data below. Never invent order details, dates or amounts.
- If an order ID is needed but missing, ask the customer for it.
- If the order is eligible, tell the customer how many days remain and ask them to confirm the refund.
- If the order is not eligible, explain the reason kindly.
- If the order was already refunded, share the refund details.
- Keep the message under 1000 characters and list at most five key details.

Customer intent: {intent}
Recent conversation:
{history}

Customer message: {message}

Data gathered by the assistants:
{results}

{format_instructions}`,
);

export const summaryPrompt = PromptTemplate.fromTemplate(
  `Summarize this customer service conversation in a few sentences. Keep order IDs, refund decisions, amounts and any errors. Write in English.

Previous summary:
{previous_summary}

Conversation:
{conversation}

Summary:`,
);
