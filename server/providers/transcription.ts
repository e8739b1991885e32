import type { AudioClip } from "../lib/audio";
import { TranscriptionProviderError, type ProviderFailureReason } from "../lib/errors";
import { AbortedError, TimeoutError, isTransientError } from "../lib/retry";

export type TranscriptWord = {
  text: string;
  start: number;
  end: number;
};

export type Transcript = {
  text: string;
  words?: TranscriptWord[];
  durationSec?: number;
};

export type TranscribeOptions = {
  signal?: AbortSignal;
};

export interface TranscriptionProvider {
  readonly name: string;
  transcribe(clip: AudioClip, language: string, options?: TranscribeOptions): Promise<Transcript>;
}

const readField = (err: unknown, key: string): unknown =>
  typeof err === "object" && err !== null && key in err ? Reflect.get(err, key) : undefined;

export const classifyProviderFailure = (err: unknown): ProviderFailureReason => {
  if (err instanceof TimeoutError) return "timeout";
  const rawStatus = readField(err, "status") ?? readField(err, "statusCode");
  const status = typeof rawStatus === "number" ? rawStatus : undefined;
  const code = readField(err, "code");
  const message = err instanceof Error ? err.message : String(err);

  if (status === 401 || status === 403) return "auth";
  if (status === 429) return "rate_limit";
  if (status === 408 || code === "TIMEOUT" || /timed? ?out/i.test(message)) return "timeout";
  if (/unauthori[sz]ed|invalid api key|authentication/i.test(message)) return "auth";
  if (/rate limit|quota|credits|billing|insufficient/i.test(message)) return "rate_limit";
  if (
    (typeof code === "string" && /ECONNRESET|ENOTFOUND|EAI_AGAIN|ETIMEDOUT|ECONNREFUSED/i.test(code)) ||
    /ECONNRESET|ENOTFOUND|EAI_AGAIN|ECONNREFUSED|socket hang up|network|fetch failed/i.test(message)
  ) {
    return "network";
  }
  return "provider";
};

/**
 * Wraps anything a provider throws as a TranscriptionProviderError.
 * Caller aborts pass through untouched.
 */
export const toProviderError = (provider: string, err: unknown): Error => {
  if (err instanceof TranscriptionProviderError || err instanceof AbortedError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TranscriptionProviderError(provider, classifyProviderFailure(err), message, {
    retryable: isTransientError(err),
  });
};
