import type { NextFunction, Request, Response } from "express";
import { ApiError, getRequestId, sendError } from "../lib/http";
import { logEvent } from "../lib/logger";
import { captureSentryException } from "../lib/sentry";

const readNumber = (value: unknown, key: string): number | undefined => {
  if (typeof value !== "object" || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "number" ? field : undefined;
};

const readString = (value: unknown, key: string): string | undefined => {
  if (typeof value !== "object" || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
};

/**
 * Writes any thrown value as an error payload. Known errors keep their
 * status and code; body-parser failures keep their 4xx status; everything
 * else is logged and reported as INTERNAL_ERROR.
 */
export const respondWithError = (res: Response, req: Request, err: unknown) => {
  const requestId = getRequestId(req);

  if (err instanceof ApiError) {
    if (err.status >= 500) {
      logEvent("warn", "request.failed", {
        requestId,
        code: err.code,
        status: err.status,
        message: err.message,
      });
    }
    return sendError(res, req, err);
  }

  const status = readNumber(err, "status") ?? readNumber(err, "statusCode");
  if (status !== undefined && status >= 400 && status < 500) {
    const type = readString(err, "type");
    const code =
      type === "entity.too.large"
        ? "PAYLOAD_TOO_LARGE"
        : type === "entity.parse.failed"
          ? "INVALID_JSON"
          : "BAD_REQUEST";
    const message = err instanceof Error ? err.message : "Bad request";
    return sendError(res, req, new ApiError(status, code, message));
  }

  logEvent("error", "request.unhandled_error", {
    requestId,
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  captureSentryException(err, { requestId });
  return sendError(res, req, new ApiError(500, "INTERNAL_ERROR", "Internal Server Error"));
};

export const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  respondWithError(res, req, err);
};
