import { describe, expect, it } from "vitest";
import express from "express";
import supertest from "supertest";
import { createServer } from "http";
import { requestContext } from "../middleware/requestContext";
import { errorHandler } from "../middleware/errorHandler";
import { TranscriptionProviderError } from "../lib/errors";
import { buildWav, createTestCache, FakeTranscriptionProvider } from "./fakes";

process.env.NODE_ENV = "test";

const createRequest = async (transcription?: FakeTranscriptionProvider) => {
  const { registerRoutes } = await import("../routes");
  const app = express();
  app.use(requestContext);
  app.use(express.json({ limit: "5mb" }));
  const server = createServer(app);
  await registerRoutes(server, app, { trainers: await createTestCache(transcription) });
  app.use(errorHandler);
  return supertest(app);
};

const timedHelloWorld = FakeTranscriptionProvider.returning({
  text: "Hello world.",
  words: [
    { text: "Hello", start: 0.12, end: 0.5 },
    { text: "world.", start: 0.61, end: 1.0004 },
  ],
});

describe("POST /api/score/transcript", () => {
  it("returns parallel per-word lists", async () => {
    const request = await createRequest();
    const response = await request.post("/api/score/transcript").send({
      title: "Hello world",
      transcript: "hello word",
      language: "en",
      durationSec: 1.8,
    });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      real_transcript: "hello word",
      ipa_transcript: "həloʊ wɝd",
      pronunciation_accuracy: "88",
      real_transcripts: "Hello world",
      matched_transcripts: "hello word",
      real_transcripts_ipa: "həloʊ wɝld",
      matched_transcripts_ipa: "həloʊ wɝd",
      pair_accuracy_category: "0 0",
      start_time: "0 1",
      end_time: "1 1.8",
      is_letter_correct_all_words: "11111 11101",
    });
  });

  it("marks missed words with dashes", async () => {
    const request = await createRequest();
    const response = await request.post("/api/v1/score/transcript").send({
      title: "hello world today",
      transcript: "hello today",
      language: "en-US",
      words: [
        { text: "hello", start: 0, end: 0.4 },
        { text: "today", start: 0.5, end: 0.9 },
      ],
    });

    expect(response.status).toBe(200);
    expect(response.body.matched_transcripts).toBe("hello - today");
    expect(response.body.matched_transcripts_ipa).toBe("həloʊ - tədeɪ");
    expect(response.body.pair_accuracy_category).toBe("0 2 0");
    expect(response.body.start_time).toBe("0 - 0.5");
    expect(response.body.end_time).toBe("0.4 - 0.9");
    expect(response.body.is_letter_correct_all_words).toBe("11111 00000 11111");
    expect(response.body.pronunciation_accuracy).toBe("67");
  });

  it("rejects word timings that end before they start", async () => {
    const request = await createRequest();
    const response = await request.post("/api/score/transcript").send({
      title: "hello",
      transcript: "hello",
      language: "en",
      words: [{ text: "hello", start: 0.9, end: 0.4 }],
    });
    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({
      code: "VALIDATION_ERROR",
      message: "words.0.end: end must not be before start",
    });
  });

  it("rejects an empty reference", async () => {
    const request = await createRequest();
    const response = await request
      .post("/api/score/transcript")
      .send({ title: "  ", transcript: "hello", language: "en" });
    expect(response.status).toBe(400);
    expect(response.body.code).toBe("EMPTY_REFERENCE");
  });

  it("rejects an unsupported language", async () => {
    const request = await createRequest();
    const response = await request
      .post("/api/score/transcript")
      .send({ title: "bonjour", transcript: "bonjour", language: "fr" });
    expect(response.status).toBe(422);
    expect(response.body).toMatchObject({
      code: "UNSUPPORTED_LANGUAGE",
      details: { language: "fr" },
    });
  });
});

describe("POST /api/score", () => {
  it("scores base64 audio with provider timings", async () => {
    const request = await createRequest(timedHelloWorld);
    const response = await request.post("/api/score").send({
      title: "Hello, world!",
      language: "en",
      audio: buildWav(16_000).toString("base64"),
    });

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      real_transcript: "Hello world.",
      pronunciation_accuracy: "100",
      real_transcripts: "Hello, world!",
      matched_transcripts: "Hello world.",
      pair_accuracy_category: "0 0",
      start_time: "0.12 0.61",
      end_time: "0.5 1",
    });
  });

  it("accepts a multipart audio upload", async () => {
    const request = await createRequest(timedHelloWorld);
    const response = await request
      .post("/api/score")
      .field("title", "hello world")
      .field("language", "en")
      .attach("audio", buildWav(16_000), { filename: "clip.wav", contentType: "audio/wav" });

    expect(response.status).toBe(200);
    expect(response.body.pronunciation_accuracy).toBe("100");
  });

  it("requires a title", async () => {
    const request = await createRequest();
    const response = await request.post("/api/score").send({ language: "en" });
    expect(response.status).toBe(400);
    expect(response.body.code).toBe("VALIDATION_ERROR");
    expect(response.body.message).toBe("title: title is required");
  });

  it("requires audio", async () => {
    const request = await createRequest();
    const response = await request.post("/api/score").send({ title: "hello", language: "en" });
    expect(response.status).toBe(400);
    expect(response.body.code).toBe("AUDIO_DECODE_FAILED");
  });

  it("rejects bytes that are not audio", async () => {
    const request = await createRequest();
    const response = await request.post("/api/score").send({
      title: "hello",
      language: "en",
      audio: Buffer.from("plain text, not audio").toString("base64"),
    });
    expect(response.status).toBe(400);
    expect(response.body.code).toBe("AUDIO_DECODE_FAILED");
  });

  it("reports provider failures as 503", async () => {
    const request = await createRequest(
      new FakeTranscriptionProvider(async () => {
        throw new TranscriptionProviderError("fake", "rate_limit", "Quota exceeded");
      })
    );
    const response = await request.post("/api/score").send({
      title: "hello",
      language: "en",
      audio: buildWav(1_600).toString("base64"),
    });
    expect(response.status).toBe(503);
    expect(response.body).toMatchObject({
      code: "TRANSCRIPTION_RATE_LIMITED",
      message: "Quota exceeded",
      details: { provider: "fake", reason: "rate_limit" },
    });
    expect(typeof response.body.requestId).toBe("string");
  });
});

describe("GET /api/languages", () => {
  it("lists configured and ready languages", async () => {
    const request = await createRequest();
    const before = await request.get("/api/languages");
    expect(before.body).toEqual({ languages: ["en"], ready: [] });

    await request.post("/api/score/transcript").send({ title: "hello", transcript: "hello", language: "en" });
    const after = await request.get("/api/languages");
    expect(after.body).toEqual({ languages: ["en"], ready: ["en"] });
  });
});
