export type RetryOptions = {
  retries: number;
  delayMs?: number;
  isRetryable?: (err: unknown) => boolean;
  signal?: AbortSignal;
};

export class TimeoutError extends Error {
  readonly code = "TIMEOUT";

  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

export class AbortedError extends Error {
  readonly code = "ABORTED";

  constructor(message = "Operation aborted") {
    super(message);
    this.name = "AbortedError";
  }
}

const readField = (err: unknown, key: string): unknown =>
  typeof err === "object" && err !== null && key in err ? Reflect.get(err, key) : undefined;

export const sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const isTransientError = (err: unknown) => {
  const code = readField(err, "code");
  const rawStatus = readField(err, "status") ?? readField(err, "statusCode");
  const status = typeof rawStatus === "number" ? rawStatus : undefined;
  const message = err instanceof Error ? err.message : "";
  if (code === "TIMEOUT" || code === "ABORTED") return false;
  if (status && [500, 502, 503, 504].includes(status)) return true;
  if (/ECONNRESET|ENOTFOUND|EAI_AGAIN|ETIMEDOUT|socket hang up/i.test(message)) return true;
  if (typeof code === "string" && /ECONNRESET|ENOTFOUND|EAI_AGAIN|ETIMEDOUT/i.test(code)) return true;
  return false;
};

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const retries = Math.max(0, options.retries);
  const delayMs = options.delayMs ?? 600;
  const isRetryable = options.isRetryable ?? isTransientError;

  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= retries || !isRetryable(err) || options.signal?.aborted) {
        throw err;
      }
      attempt += 1;
      await sleep(delayMs * attempt, options.signal);
    }
  }
}

/**
 * Runs `task` with its own AbortSignal. On timeout the signal is aborted,
 * so the task can release its in-flight request, and the returned promise
 * rejects with a TimeoutError. An abort of `parent` rejects with
 * AbortedError and drops whatever the task later resolves to.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  message: string,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | null = null;
  let onParentAbort: (() => void) | null = null;

  const guard = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(message));
      controller.abort();
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        reject(new AbortedError());
        controller.abort();
      };
      if (parent.aborted) onParentAbort();
      else parent.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([task(controller.signal), guard]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    if (parent && onParentAbort) parent.removeEventListener("abort", onParentAbort);
  }
}
