import type { Request, Response } from "express";
import type { ErrorBody } from "@shared/routes";

export type ApiErrorDetails = NonNullable<ErrorBody["details"]>;

/**
 * An error that knows its HTTP status and wire code. Everything the
 * service rejects on purpose is thrown as one of these.
 */
export class ApiError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: ApiErrorDetails;

  constructor(status: number, code: string, message: string, details?: ApiErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }

  toBody(requestId: string): ErrorBody {
    return {
      code: this.code,
      message: this.message,
      requestId,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export const getRequestId = (req: Request): string => req.requestId || "unknown";

export const sendError = (res: Response, req: Request, error: ApiError) =>
  res.status(error.status).json(error.toBody(getRequestId(req)));
