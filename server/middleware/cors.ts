import type { RequestHandler } from "express";
import { appConfig } from "../config";
import { ApiError, sendError } from "../lib/http";

const localOrigin = /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/i;

const allowedOrigins = new Set(appConfig.corsAllowedOrigins.map((origin) => origin.toLowerCase()));

const isAllowedOrigin = (origin: string): boolean => {
  if (allowedOrigins.has(origin.toLowerCase())) return true;
  return !appConfig.releaseMode && localOrigin.test(origin);
};

/**
 * Browser clients may call the API from the configured origins, plus
 * localhost outside production. Requests without an Origin header are
 * not browser cross-origin calls and pass untouched.
 */
export const corsPolicy: RequestHandler = (req, res, next) => {
  const origin = req.headers.origin;
  if (!origin) return next();
  res.vary("Origin");

  if (!isAllowedOrigin(origin)) {
    sendError(res, req, new ApiError(403, "CORS_ORIGIN_BLOCKED", "Origin is not allowed by CORS policy"));
    return;
  }

  res.setHeader("Access-Control-Allow-Origin", origin);
  res.setHeader("Access-Control-Expose-Headers", "X-Request-Id, Retry-After");

  if (req.method === "OPTIONS") {
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, X-Request-Id");
    res.setHeader("Access-Control-Max-Age", "600");
    res.status(204).end();
    return;
  }

  next();
};
