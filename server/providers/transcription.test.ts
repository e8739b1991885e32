import { describe, expect, it } from "vitest";
import { TranscriptionProviderError } from "../lib/errors";
import { AbortedError, TimeoutError } from "../lib/retry";
import { classifyProviderFailure, toProviderError } from "./transcription";

const withStatus = (message: string, status: number) => Object.assign(new Error(message), { status });

const withCode = (message: string, code: string) => Object.assign(new Error(message), { code });

describe("classifyProviderFailure", () => {
  it("reads the HTTP status first", () => {
    expect(classifyProviderFailure(withStatus("Unauthorized", 401))).toBe("auth");
    expect(classifyProviderFailure(withStatus("Forbidden", 403))).toBe("auth");
    expect(classifyProviderFailure(withStatus("Too Many Requests", 429))).toBe("rate_limit");
    expect(classifyProviderFailure(withStatus("Request Timeout", 408))).toBe("timeout");
  });

  it("accepts statusCode as well as status", () => {
    expect(classifyProviderFailure(Object.assign(new Error("nope"), { statusCode: 429 }))).toBe(
      "rate_limit"
    );
  });

  it("falls back to the message", () => {
    expect(classifyProviderFailure(new Error("Invalid API key provided"))).toBe("auth");
    expect(classifyProviderFailure(new Error("You exceeded your current quota"))).toBe("rate_limit");
    expect(classifyProviderFailure(new Error("Request timed out"))).toBe("timeout");
  });

  it("treats our own timeout as a timeout", () => {
    expect(classifyProviderFailure(new TimeoutError("slow"))).toBe("timeout");
  });

  it("recognizes network failures", () => {
    expect(classifyProviderFailure(withCode("read ECONNRESET", "ECONNRESET"))).toBe("network");
    expect(classifyProviderFailure(new Error("fetch failed"))).toBe("network");
  });

  it("files anything else under the provider", () => {
    expect(classifyProviderFailure(new Error("Something odd happened"))).toBe("provider");
    expect(classifyProviderFailure("plain string")).toBe("provider");
  });
});

describe("toProviderError", () => {
  it("wraps a raw failure with its reason and provider", () => {
    const wrapped = toProviderError("whisper", withStatus("Rate limit reached", 429));
    expect(wrapped).toBeInstanceOf(TranscriptionProviderError);
    expect(wrapped).toMatchObject({
      status: 503,
      code: "TRANSCRIPTION_RATE_LIMITED",
      message: "Rate limit reached",
      provider: "whisper",
      reason: "rate_limit",
      retryable: false,
      details: { provider: "whisper", reason: "rate_limit" },
    });
  });

  it("marks server and network failures retryable", () => {
    expect(toProviderError("whisper", withStatus("Bad gateway", 502))).toMatchObject({
      reason: "provider",
      retryable: true,
    });
    expect(toProviderError("whisper", withCode("read ECONNRESET", "ECONNRESET"))).toMatchObject({
      code: "TRANSCRIPTION_FAILED",
      reason: "network",
      retryable: true,
    });
  });

  it("passes provider errors and aborts through", () => {
    const existing = new TranscriptionProviderError("assemblyai", "auth", "ASSEMBLYAI_API_KEY is not set");
    const aborted = new AbortedError();
    expect(toProviderError("whisper", existing)).toBe(existing);
    expect(toProviderError("whisper", aborted)).toBe(aborted);
  });
});
