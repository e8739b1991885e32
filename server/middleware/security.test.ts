import { describe, expect, it } from "vitest";
import express from "express";
import supertest from "supertest";
import { requestContext } from "./requestContext";
import { contentTypeGuard, createRateLimiter, secureHeaders } from "./security";

const createApp = (now: () => number) => {
  const app = express();
  app.use(requestContext);
  app.use(secureHeaders);
  app.use(
    createRateLimiter({ name: "API", maxRequests: 2, windowMs: 10_000, enabled: true, now })
  );
  app.use(contentTypeGuard);
  app.use(express.json());
  app.get("*", (_req, res) => {
    res.json({ ok: true });
  });
  app.post("*", (_req, res) => {
    res.json({ ok: true });
  });
  return supertest(app);
};

describe("createRateLimiter", () => {
  it("counts a client's calls across paths", async () => {
    const request = createApp(() => 5_000);

    const first = await request.get("/api/a");
    expect(first.status).toBe(200);
    expect(first.headers["x-ratelimit-limit"]).toBe("2");
    expect(first.headers["x-ratelimit-remaining"]).toBe("1");

    expect((await request.get("/api/b")).status).toBe(200);

    const blocked = await request.get("/api/c");
    expect(blocked.status).toBe(429);
    expect(blocked.headers["retry-after"]).toBe("10");
    expect(blocked.body).toMatchObject({
      code: "RATE_LIMITED",
      message: "Too many API requests. Please try again shortly.",
    });
  });

  it("passes everything through when disabled", async () => {
    const app = express();
    app.use(createRateLimiter({ name: "API", maxRequests: 1, enabled: false }));
    app.get("/", (_req, res) => {
      res.json({ ok: true });
    });
    const request = supertest(app);
    await request.get("/");
    const second = await request.get("/");
    expect(second.status).toBe(200);
    expect(second.headers["x-ratelimit-limit"]).toBeUndefined();
  });
});

describe("secureHeaders", () => {
  it("forbids framing and caching", async () => {
    const response = await createApp(() => 0).get("/api/health");
    expect(response.headers["x-content-type-options"]).toBe("nosniff");
    expect(response.headers["content-security-policy"]).toBe(
      "default-src 'none'; frame-ancestors 'none'"
    );
    expect(response.headers["cache-control"]).toBe("no-store");
  });
});

describe("contentTypeGuard", () => {
  it("rejects form-encoded bodies", async () => {
    const response = await createApp(() => 0)
      .post("/api/score")
      .type("form")
      .send("title=hello");
    expect(response.status).toBe(415);
    expect(response.body.code).toBe("UNSUPPORTED_MEDIA_TYPE");
  });

  it("accepts JSON bodies", async () => {
    const response = await createApp(() => 0).post("/api/score").send({ title: "hello" });
    expect(response.status).toBe(200);
  });
});
