import { z } from "zod";
import { OrderRecordSchema } from "./order.js";

// Structured model outputs

export const IntentSchema = z.enum(["refund", "policy", "general"]);

export const IntentClassificationSchema = z.object({
  intent: IntentSchema.describe("User's intent category"),
  confidence: z.number().min(0).max(1).describe("Confidence score for the classification"),
});

export const ResponseTypeSchema = z.enum([
  "refund_eligible",
  "refund_not_eligible",
  "refund_already_processed",
  "policy_info",
  "general_info",
  "error",
]);

export const ResponseTemplateSchema = z.object({
  responseType: ResponseTypeSchema.describe("Type of response being provided"),
  message: z
    .string()
    .min(1)
    .max(1000)
    .describe("Main response to the user: friendly, empathetic, concise"),
  actionRequired: z
    .string()
    .default("")
    .describe("What the user should do next, or an empty string when nothing is needed"),
  keyDetails: z
    .array(z.string())
    .max(5)
    .default([])
    .describe("Up to five bullet points of important information"),
});

export type Intent = z.infer<typeof IntentSchema>;
export type IntentClassification = z.infer<typeof IntentClassificationSchema>;
export type ResponseType = z.infer<typeof ResponseTypeSchema>;
export type ResponseTemplate = z.infer<typeof ResponseTemplateSchema>;

// Task results exchanged between handlers and the coordinator

export const EligibilityResultSchema = z.object({
  eligible: z.boolean(),
  reason: z.string(),
  alreadyRefunded: z.boolean(),
  invalidStatus: z.boolean(),
  orderStatus: z.string(),
  daysSincePurchase: z.number().int().nonnegative().optional(),
  daysRemaining: z.number().int().nonnegative().optional(),
  refundTransactionId: z.string().optional(),
  refundDate: z.string().optional(),
  refundAmount: z.number().nonnegative().optional(),
});

export type EligibilityResult = z.infer<typeof EligibilityResultSchema>;

export const GetOrderResultSchema = z.object({
  orderId: z.string().nullable(),
  order: OrderRecordSchema.nullable(),
  found: z.boolean(),
  error: z.string().optional(),
  userMessage: z.string().optional(),
});

export type GetOrderResult = z.infer<typeof GetOrderResultSchema>;

export const RefundProcessingResultSchema = z.object({
  orderId: z.string(),
  amount: z.number(),
  success: z.boolean(),
  transactionId: z.string().optional(),
  refundDate: z.string().optional(),
  error: z.string().optional(),
});

export type RefundProcessingResult = z.infer<typeof RefundProcessingResultSchema>;

export const PolicySearchResultSchema = z.object({
  policyText: z.string(),
  query: z.string(),
  source: z.string(),
  chunks: z.array(z.object({ chunkId: z.string(), similarity: z.number() })),
});

export type PolicySearchResult = z.infer<typeof PolicySearchResultSchema>;
