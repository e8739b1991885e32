import { beforeAll, describe, expect, it } from "vitest";
import express from "express";
import supertest from "supertest";
import { createServer } from "http";
import { requestContext } from "../middleware/requestContext";
import { createTestCache } from "./fakes";

let request: ReturnType<typeof supertest>;

beforeAll(async () => {
  process.env.NODE_ENV = "production";
  process.env.RELEASE_MODE = "true";
  process.env.TRANSCRIPTION_PROVIDER = "whisper";
  process.env.WHISPER_API_KEY = "test-secret";
  process.env.TRUST_PROXY = "1";
  process.env.CORS_ALLOWED_ORIGINS = "https://app.example.test";
  delete process.env.METRICS_TOKEN;

  const { corsPolicy } = await import("../middleware/cors");
  const { registerRoutes } = await import("../routes");
  const app = express();
  app.use(requestContext);
  app.use(corsPolicy);
  app.use(express.json());
  const server = createServer(app);
  await registerRoutes(server, app, { trainers: await createTestCache() });
  request = supertest(app);
}, 20000);

describe("cors policy", () => {
  it("denies unknown origins in production mode", async () => {
    const response = await request
      .get("/api/health")
      .set("Origin", "https://evil.example");
    expect(response.status).toBe(403);
    expect(response.body.code).toBe("CORS_ORIGIN_BLOCKED");
  });

  it("allows configured origins", async () => {
    const response = await request
      .get("/api/health")
      .set("Origin", "https://app.example.test");
    expect(response.status).toBe(200);
    expect(response.headers["access-control-allow-origin"]).toBe("https://app.example.test");
    expect(response.headers.vary).toBe("Origin");
  });

  it("does not trust localhost in release mode", async () => {
    const response = await request
      .post("/api/score/transcript")
      .set("Origin", "http://localhost:5173")
      .send({ title: "hello", transcript: "hello", language: "en" });
    expect(response.status).toBe(403);
    expect(response.body.code).toBe("CORS_ORIGIN_BLOCKED");
  });

  it("answers preflight requests", async () => {
    const response = await request
      .options("/api/score")
      .set("Origin", "https://app.example.test");
    expect(response.status).toBe(204);
    expect(response.headers["access-control-allow-methods"]).toBe("GET,POST,OPTIONS");
    expect(response.headers["access-control-allow-headers"]).toBe("Content-Type, X-Request-Id");
    expect(response.headers["access-control-max-age"]).toBe("600");
  });

  it("requires the metrics token in release mode", async () => {
    const response = await request.get("/api/metrics");
    expect(response.status).toBe(403);
    expect(response.body.code).toBe("METRICS_DISABLED");
  });
});
