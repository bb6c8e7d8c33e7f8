import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { Server } from "http";
import { z } from "zod";
import { createApp } from "../../src/app.js";
import { Runtime } from "../../src/runtime.js";
import { RequestRateLimiter } from "../../src/security/middleware.js";
import { makeRuntime } from "../helpers/fakes.js";

const ELIGIBLE_REPLY = JSON.stringify({
  responseType: "refund_eligible",
  message: "Order ORD-84315 can be refunded. Shall I proceed?",
  actionRequired: "Reply yes to confirm",
  keyDetails: [],
});

describe("HTTP API", () => {
  let runtime: Runtime;
  let server: Server;
  let baseUrl: string;

  async function start(chatRateLimiter?: RequestRateLimiter): Promise<void> {
    const app = createApp({ runtime, chatRateLimiter });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  async function readJson(response: Response): Promise<Record<string, unknown>> {
    return z.record(z.unknown()).parse(await response.json());
  }

  function chat(body: unknown, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(`${baseUrl}/api/chat`, {
      method: "POST",
      headers: { "content-type": "application/json", ...headers },
      body: JSON.stringify(body),
    });
  }

  beforeEach(async () => {
    runtime = makeRuntime({
      replies: { intent: '{"intent": "refund", "confidence": 0.9}', response: ELIGIBLE_REPLY },
    }).runtime;
    await start();
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    runtime.db.close();
  });

  test("should report health with cache metrics", async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body = await readJson(response);

    expect(response.status).toBe(200);
    expect(body.status).toBe("ok");
    expect(body.embeddingsCache).toEqual({
      cacheHits: 0,
      cacheMisses: 0,
      hitRate: 0,
      estimatedSavingsUsd: 0,
      cacheSize: 0,
      maxSize: 100,
    });
    expect(response.headers.get("x-content-type-options")).toBe("nosniff");
  });

  test("should answer a chat turn and expose the pending refund", async () => {
    const response = await chat({ message: "I want to return order ORD-84315", sessionId: "web-1" });
    const body = await readJson(response);

    expect(response.status).toBe(200);
    expect(body).toMatchObject({
      responseType: "refund_eligible",
      message: "Order ORD-84315 can be refunded. Shall I proceed?",
      sessionId: "web-1",
      pendingRefund: { orderId: "ORD-84315", amount: 129.99 },
      agentsCalled: ["policy_expert", "transaction_agent"],
    });
  });

  test("should reject an empty message", async () => {
    const response = await chat({ message: "   " });

    expect(response.status).toBe(400);
    expect(await readJson(response)).toEqual({ error: "Invalid request", message: "Message is required" });
  });

  test("should reject a malformed session id in the header", async () => {
    const response = await chat({ message: "hello" }, { "x-session-id": "bad id!" });

    expect(response.status).toBe(400);
    expect((await readJson(response)).error).toBe("Invalid session ID");
  });

  test("should rate limit chat requests per session", async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await start(new RequestRateLimiter(60000, 1));

    const first = await chat({ message: "hello", sessionId: "web-2" }, { "x-session-id": "web-2" });
    const second = await chat({ message: "hello again", sessionId: "web-2" }, { "x-session-id": "web-2" });

    expect(first.status).toBe(200);
    expect(second.status).toBe(429);
    expect(second.headers.get("x-ratelimit-remaining")).toBe("0");
  });

  test("should return and clear a session's history", async () => {
    await chat({ message: "I want to return order ORD-84315", sessionId: "web-3" });

    const history = await readJson(await fetch(`${baseUrl}/api/chat/history/web-3`));
    expect(history.history).toHaveLength(2);

    const cleared = await fetch(`${baseUrl}/api/chat/history/web-3`, { method: "DELETE" });
    expect(await readJson(cleared)).toEqual({ success: true, sessionId: "web-3" });
    expect(runtime.sessions.get("web-3").getPendingRefund()).toBeNull();

    const after = await readJson(await fetch(`${baseUrl}/api/chat/history/web-3`));
    expect(after.history).toEqual([]);
  });

  test("should return an empty history for an unknown session", async () => {
    const response = await fetch(`${baseUrl}/api/chat/history/nobody`);

    expect(await readJson(response)).toEqual({ history: [], sessionId: "nobody" });
    expect(runtime.sessions.has("nobody")).toBe(false);
  });

  test("should look up orders by id", async () => {
    const found = await fetch(`${baseUrl}/api/orders/ord-84315`);
    expect(found.status).toBe(200);
    expect((await readJson(found)).orderId).toBe("ORD-84315");

    const missing = await fetch(`${baseUrl}/api/orders/ORD-99999`);
    expect(missing.status).toBe(404);

    const invalid = await fetch(`${baseUrl}/api/orders/12345`);
    expect(invalid.status).toBe(400);
  });
});

describe("RequestRateLimiter", () => {
  test("should allow up to the limit within a window and reset afterwards", () => {
    let now = 1_000;
    const limiter = new RequestRateLimiter(1000, 2, () => now);

    expect(limiter.check("client")).toEqual({ allowed: true, remaining: 1, resetTime: 2000 });
    expect(limiter.check("client")).toEqual({ allowed: true, remaining: 0, resetTime: 2000 });
    expect(limiter.check("client")).toEqual({ allowed: false, remaining: 0, resetTime: 2000 });
    expect(limiter.check("other")).toEqual({ allowed: true, remaining: 1, resetTime: 2000 });

    now = 2_001;
    expect(limiter.check("client")).toEqual({ allowed: true, remaining: 1, resetTime: 3001 });
  });

  test("should forget a client on reset", () => {
    const limiter = new RequestRateLimiter(1000, 1, () => 0);
    limiter.check("client");

    limiter.reset("client");

    expect(limiter.check("client").allowed).toBe(true);
  });
});
