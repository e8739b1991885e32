import { ApiError } from "./http";

export class AudioDecodeError extends ApiError {
  constructor(message: string) {
    super(400, "AUDIO_DECODE_FAILED", message);
  }
}

export class DegenerateInputError extends ApiError {
  constructor(message = "Reference text contains no words") {
    super(400, "EMPTY_REFERENCE", message);
  }
}

export class PhonemizationError extends ApiError {
  readonly language: string;

  constructor(language: string, message = `Language "${language}" is not supported`) {
    super(422, "UNSUPPORTED_LANGUAGE", message, { language });
    this.language = language;
  }
}

export type ProviderFailureReason = "auth" | "rate_limit" | "timeout" | "network" | "provider";

const providerErrorCodes: Record<ProviderFailureReason, string> = {
  auth: "TRANSCRIPTION_AUTH_FAILED",
  rate_limit: "TRANSCRIPTION_RATE_LIMITED",
  timeout: "TRANSCRIPTION_TIMEOUT",
  network: "TRANSCRIPTION_FAILED",
  provider: "TRANSCRIPTION_FAILED",
};

/**
 * The measurement could not be taken. Surfaced as 503 and never turned
 * into an empty transcript.
 */
export class TranscriptionProviderError extends ApiError {
  readonly reason: ProviderFailureReason;
  readonly provider: string;
  readonly retryable: boolean;

  constructor(
    provider: string,
    reason: ProviderFailureReason,
    message: string,
    options: { retryable?: boolean } = {}
  ) {
    super(503, providerErrorCodes[reason], message, { provider, reason });
    this.provider = provider;
    this.reason = reason;
    this.retryable = options.retryable ?? false;
  }
}

export class RequestCancelledError extends ApiError {
  constructor(message = "Request was cancelled before scoring finished") {
    super(499, "REQUEST_CANCELLED", message);
  }
}
