import { Request, Response, NextFunction } from "express";
import { logger } from "../logger.js";

export const SESSION_ID_PATTERN = /^[a-zA-Z0-9_-]{1,100}$/;

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  resetTime: number;
}

/** Fixed-window request counter keyed by client. */
export class RequestRateLimiter {
  private readonly requests = new Map<string, { count: number; resetTime: number }>();

  constructor(
    readonly windowMs: number = 60000,
    readonly maxRequests: number = 30,
    private readonly now: () => number = Date.now,
  ) {}

  check(identifier: string): RateLimitDecision {
    const now = this.now();
    const record = this.requests.get(identifier);

    if (!record || now > record.resetTime) {
      const resetTime = now + this.windowMs;
      this.requests.set(identifier, { count: 1, resetTime });
      return { allowed: true, remaining: this.maxRequests - 1, resetTime };
    }

    if (record.count >= this.maxRequests) {
      return { allowed: false, remaining: 0, resetTime: record.resetTime };
    }

    record.count += 1;
    return {
      allowed: true,
      remaining: this.maxRequests - record.count,
      resetTime: record.resetTime,
    };
  }

  reset(identifier: string): void {
    this.requests.delete(identifier);
  }
}

function getClientId(req: Request): string {
  const sessionId = req.header("x-session-id");
  if (sessionId) {
    return `session:${sessionId}`;
  }
  return `ip:${req.ip || req.socket.remoteAddress || "unknown"}`;
}

export function rateLimitMiddleware(limiter: RequestRateLimiter, endpointName: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const clientId = getClientId(req);
    const result = limiter.check(clientId);

    res.setHeader("X-RateLimit-Limit", limiter.maxRequests);
    res.setHeader("X-RateLimit-Remaining", result.remaining);
    res.setHeader("X-RateLimit-Reset", new Date(result.resetTime).toISOString());

    if (!result.allowed) {
      logger.warn(
        { clientId, endpoint: endpointName, resetTime: new Date(result.resetTime).toISOString() },
        "Rate limit exceeded",
      );
      res.status(429).json({
        error: "Rate limit exceeded",
        message: `Too many requests. Please try again after ${new Date(result.resetTime).toISOString()}`,
        retryAfter: Math.max(0, Math.ceil((result.resetTime - Date.now()) / 1000)),
      });
      return;
    }

    next();
  };
}

export function requestSizeLimitMiddleware(maxSizeBytes: number = 1024 * 1024) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const contentLength = parseInt(req.header("content-length") || "0", 10);

    if (contentLength > maxSizeBytes) {
      logger.warn({ contentLength, maxSizeBytes, endpoint: req.path }, "Request size exceeds limit");
      res.status(413).json({
        error: "Request too large",
        message: `Request body exceeds maximum size of ${maxSizeBytes} bytes`,
        maxSizeBytes,
      });
      return;
    }

    next();
  };
}

/** Checks the session id in the x-session-id header and the :sessionId route param. */
export function sessionValidationMiddleware(req: Request, res: Response, next: NextFunction): void {
  const candidates = [req.header("x-session-id"), req.params.sessionId].filter(
    (value): value is string => typeof value === "string",
  );

  const invalid = candidates.find((sessionId) => !SESSION_ID_PATTERN.test(sessionId));
  if (invalid !== undefined) {
    logger.warn({ sessionId: invalid.substring(0, 20), endpoint: req.path }, "Invalid session ID format");
    res.status(400).json({
      error: "Invalid session ID",
      message: "Session ID must be alphanumeric and at most 100 characters",
    });
    return;
  }

  next();
}

export function securityHeadersMiddleware(_req: Request, res: Response, next: NextFunction): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "strict-origin-when-cross-origin");
  res.setHeader("Content-Security-Policy", "default-src 'none'");
  next();
}
