import express from "express";
import cors from "cors";
import { z } from "zod";
import { logger } from "./logger.js";
import { Runtime } from "./runtime.js";
import { toErrorMessage } from "./errors.js";
import { ORDER_ID_PATTERN } from "./models/order.js";
import { SpanParent } from "./utils/tracing.js";
import {
  RequestRateLimiter,
  SESSION_ID_PATTERN,
  rateLimitMiddleware,
  requestSizeLimitMiddleware,
  securityHeadersMiddleware,
  sessionValidationMiddleware,
} from "./security/middleware.js";

export const MAX_MESSAGE_LENGTH = 5000;

const ChatRequestSchema = z.object({
  message: z.string().trim().min(1, "Message is required").max(MAX_MESSAGE_LENGTH),
  sessionId: z.string().regex(SESSION_ID_PATTERN, "Invalid session ID").default("default"),
});

export interface AppDependencies {
  runtime: Runtime;
  chatRateLimiter?: RequestRateLimiter;
  /** Opens a trace per chat turn, e.g. Langfuse. */
  startTrace?: (name: string, metadata: Record<string, unknown>) => SpanParent | undefined;
}

export function createApp({ runtime, chatRateLimiter, startTrace }: AppDependencies): express.Express {
  const app = express();
  const limiter = chatRateLimiter ?? new RequestRateLimiter(60000, 30);

  app.use(securityHeadersMiddleware);
  app.use(requestSizeLimitMiddleware(64 * 1024));
  app.use(cors({ origin: runtime.config.corsOrigin }));
  app.use(express.json({ limit: "64kb" }));

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      embeddingsCache: runtime.embeddingsCache.getMetrics(),
    });
  });

  app.post(
    "/api/chat",
    rateLimitMiddleware(limiter, "chat"),
    sessionValidationMiddleware,
    async (req, res) => {
      const parsed = ChatRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({
          error: "Invalid request",
          message: parsed.error.issues.map((issue) => issue.message).join("; "),
        });
        return;
      }

      const { message, sessionId } = parsed.data;
      const trace = startTrace?.("conversation-turn", { sessionId });

      try {
        const orchestrator = runtime.sessions.get(sessionId);
        const result = await orchestrator.processMessage(message, trace);
        res.json({
          ...result,
          sessionId,
          pendingRefund: orchestrator.getPendingRefund(),
          timestamp: new Date().toISOString(),
        });
      } catch (error) {
        logger.error({ error: toErrorMessage(error), sessionId }, "Error processing chat message");
        res.status(500).json({ error: "Failed to process message" });
      }
    },
  );

  app.get("/api/chat/history/:sessionId", sessionValidationMiddleware, (req, res) => {
    const { sessionId } = req.params;
    if (!runtime.sessions.has(sessionId)) {
      res.json({ history: [], sessionId });
      return;
    }
    res.json({ history: runtime.sessions.get(sessionId).getHistory(), sessionId });
  });

  app.delete("/api/chat/history/:sessionId", sessionValidationMiddleware, (req, res) => {
    const { sessionId } = req.params;
    if (runtime.sessions.has(sessionId)) {
      runtime.sessions.get(sessionId).clearHistory();
    }
    res.json({ success: true, sessionId });
  });

  app.get("/api/orders/:orderId", async (req, res) => {
    const orderId = req.params.orderId.toUpperCase();
    if (!ORDER_ID_PATTERN.test(orderId)) {
      res.status(400).json({ error: "Invalid order ID" });
      return;
    }

    try {
      const order = await runtime.orders.getOrder(orderId);
      if (!order) {
        res.status(404).json({ error: "Order not found" });
        return;
      }
      res.json(order);
    } catch (error) {
      logger.error({ error: toErrorMessage(error), orderId }, "Error getting order");
      res.status(500).json({ error: "Failed to get order" });
    }
  });

  return app;
}
