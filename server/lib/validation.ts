import type { ZodTypeAny, z } from "zod";
import { ApiError } from "./http";

/**
 * Parses `value` against `schema` or throws a 400 carrying every issue.
 * The first issue becomes the message.
 */
export const parseRequest = <S extends ZodTypeAny>(schema: S, value: unknown): z.infer<S> => {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;

  const issues = parsed.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
  throw new ApiError(400, "VALIDATION_ERROR", issues[0] ?? "Invalid request", {
    issues,
  });
};
