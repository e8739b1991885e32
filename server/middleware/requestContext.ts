import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "crypto";

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

const acceptedRequestId = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Tags each request with an id for logs and error payloads. A caller's
 * `x-request-id` is reused when it is a plain token; anything else is
 * replaced.
 */
export function requestContext(req: Request, res: Response, next: NextFunction) {
  const incoming = req.headers["x-request-id"];
  const requestId =
    typeof incoming === "string" && acceptedRequestId.test(incoming.trim())
      ? incoming.trim()
      : randomUUID();
  req.requestId = requestId;
  res.setHeader("x-request-id", requestId);
  next();
}
