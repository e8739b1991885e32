import { beforeAll, describe, expect, it } from "vitest";
import express from "express";
import supertest from "supertest";
import { createServer } from "http";
import { requestContext } from "../middleware/requestContext";
import { createTestCache } from "./fakes";

let request: ReturnType<typeof supertest>;

beforeAll(async () => {
  process.env.NODE_ENV = "development";
  process.env.RATE_LIMIT_EXPENSIVE_MAX = "2";

  const { registerRoutes } = await import("../routes");
  const app = express();
  app.use(requestContext);
  app.use(express.json());
  const server = createServer(app);
  await registerRoutes(server, app, { trainers: await createTestCache() });
  request = supertest(app);
}, 20000);

describe("expensive endpoint rate limiting", () => {
  it("limits repeated calls to the audio scoring endpoint", async () => {
    const first = await request.post("/api/score").send({ title: "hello", language: "en" });
    expect(first.status).not.toBe(429);

    const second = await request.post("/api/score").send({ title: "hello", language: "en" });
    expect(second.status).not.toBe(429);

    const third = await request.post("/api/score").send({ title: "hello", language: "en" });
    expect(third.status).toBe(429);
    expect(third.body.code).toBe("RATE_LIMITED");
  });

  it("leaves transcript scoring outside the expensive budget", async () => {
    const response = await request
      .post("/api/score/transcript")
      .send({ title: "hello", transcript: "hello", language: "en" });
    expect(response.status).toBe(200);
  });
});
