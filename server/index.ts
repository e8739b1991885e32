import "dotenv/config";
import express from "express";
import { createServer } from "http";
import { appConfig } from "./config";
import { getRequestId } from "./lib/http";
import { logEvent } from "./lib/logger";
import { initSentry, isSentryEnabled } from "./lib/sentry";
import { corsPolicy } from "./middleware/cors";
import { errorHandler } from "./middleware/errorHandler";
import { requestContext } from "./middleware/requestContext";
import { contentTypeGuard, globalRateLimiter, secureHeaders } from "./middleware/security";
import { requestMetricsMiddleware } from "./observability";
import { registerRoutes } from "./routes";

const app = express();
const httpServer = createServer(app);

app.set("etag", false);
app.set("trust proxy", appConfig.trustProxy);

app.use(requestContext);
app.use(secureHeaders);
app.use(corsPolicy);
app.use(globalRateLimiter);
app.use(requestMetricsMiddleware);
app.use(contentTypeGuard);

// Base64 audio inflates by a third over the raw byte limit.
app.use(express.json({ limit: Math.ceil(appConfig.audio.maxBytes * 1.4) }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  res.on("finish", () => {
    if (!path.startsWith("/api")) return;
    logEvent("info", "request.completed", {
      requestId: getRequestId(req),
      method: req.method,
      path,
      status: res.statusCode,
      durationMs: Date.now() - start,
    });
  });
  next();
});

const start = async () => {
  await initSentry();
  await registerRoutes(httpServer, app);
  app.use(errorHandler);

  logEvent("info", "startup.runtime", {
    sentryEnabled: isSentryEnabled(),
    env: appConfig.env,
    releaseMode: appConfig.releaseMode,
    version: appConfig.version,
    commitSha: appConfig.commitSha,
    transcriptionProvider: appConfig.transcription.provider,
    phoneticBackend: appConfig.phonetic.backend,
    languages: appConfig.languages,
  });

  const host = appConfig.host || (appConfig.isDev ? "127.0.0.1" : "0.0.0.0");
  httpServer.listen({ port: appConfig.port, host }, () => {
    logEvent("info", "startup.listening", { url: `http://${host}:${appConfig.port}` });
  });
};

start().catch((err: unknown) => {
  logEvent("error", "startup.failed", {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
