const sensitiveKeyPattern =
  /password|token|secret|authorization|cookie|set-cookie|api[-_]?key/i;

export type LogLevel = "debug" | "info" | "warn" | "error";

const redactValue = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }
  if (value && typeof value === "object") {
    const output: Record<string, unknown> = {};
    for (const [key, nestedValue] of Object.entries(value)) {
      if (sensitiveKeyPattern.test(key)) {
        output[key] = "[REDACTED]";
      } else {
        output[key] = redactValue(nestedValue);
      }
    }
    return output;
  }
  return value;
};

export const redactSensitive = (value: unknown): unknown => redactValue(value);

const quiet = () => process.env.NODE_ENV === "test" && process.env.LOG_IN_TESTS !== "true";

/**
 * One JSON line per event. `undefined` fields are dropped by JSON.stringify.
 */
export function logEvent(
  level: LogLevel,
  event: string,
  fields: Record<string, unknown> = {}
): void {
  if (quiet()) return;
  const line = JSON.stringify(
    redactSensitive({ level, event, time: new Date().toISOString(), ...fields })
  );
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}
