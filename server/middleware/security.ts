import type { Request, RequestHandler } from "express";
import { appConfig } from "../config";
import { ApiError, sendError } from "../lib/http";
import { FixedWindowLimiter } from "../lib/rateLimit";

/** Every response is JSON and per request, so nothing may frame or cache it. */
export const secureHeaders: RequestHandler = (_req, res, next) => {
  res.setHeader("x-content-type-options", "nosniff");
  res.setHeader("content-security-policy", "default-src 'none'; frame-ancestors 'none'");
  res.setHeader("referrer-policy", "no-referrer");
  res.setHeader("cache-control", "no-store");
  if (appConfig.isProd) {
    res.setHeader("strict-transport-security", "max-age=31536000; includeSubDomains");
  }
  next();
};

// `req.ip` already honors the trust proxy setting.
const clientKey = (req: Request): string => req.ip ?? req.socket.remoteAddress ?? "unknown";

export type RateLimiterOptions = {
  /** Shown in the 429 message so a client can tell which budget it spent. */
  name: string;
  maxRequests: number;
  windowMs?: number;
  enabled?: boolean;
  now?: () => number;
};

/**
 * One budget per client address. Each limiter keeps its own windows, so
 * mounting one on a single route gives that route its own budget.
 */
export const createRateLimiter = (options: RateLimiterOptions): RequestHandler => {
  const limiter = new FixedWindowLimiter({
    maxRequests: options.maxRequests,
    windowMs: options.windowMs ?? appConfig.rateLimit.windowMs,
    now: options.now,
  });
  const now = options.now ?? Date.now;
  const enabled = options.enabled ?? !appConfig.isTest;

  return (req, res, next) => {
    if (!enabled) return next();
    const decision = limiter.hit(clientKey(req));
    res.setHeader("x-ratelimit-limit", String(decision.limit));
    res.setHeader("x-ratelimit-remaining", String(decision.remaining));
    if (!decision.blocked) return next();

    res.setHeader("retry-after", String(Math.max(1, Math.ceil((decision.resetAt - now()) / 1000))));
    sendError(
      res,
      req,
      new ApiError(429, "RATE_LIMITED", `Too many ${options.name} requests. Please try again shortly.`)
    );
  };
};

export const globalRateLimiter = createRateLimiter({
  name: "API",
  maxRequests: appConfig.rateLimit.maxRequests,
});

/** Audio scoring calls a paid provider, so it gets a tighter budget. */
export const scoreRateLimiter = createRateLimiter({
  name: "audio scoring",
  maxRequests: appConfig.rateLimit.expensiveMaxRequests,
});

/** Request bodies are JSON, or multipart when the audio comes as a file part. */
export const contentTypeGuard: RequestHandler = (req, res, next) => {
  if (req.method !== "POST" || !req.is("*/*")) return next();
  if (req.is("application/json") || req.is("multipart/form-data")) return next();

  sendError(
    res,
    req,
    new ApiError(415, "UNSUPPORTED_MEDIA_TYPE", "Send application/json or multipart/form-data")
  );
};
