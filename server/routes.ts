import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { api } from "@shared/routes";
import { appConfig } from "./config";
import { decodeAudio } from "./lib/audio";
import { AudioDecodeError } from "./lib/errors";
import { ApiError, getRequestId, sendError } from "./lib/http";
import { logEvent } from "./lib/logger";
import { toScoreResponse } from "./lib/scoreResponse";
import { parseRequest } from "./lib/validation";
import { respondWithError } from "./middleware/errorHandler";
import { scoreRateLimiter } from "./middleware/security";
import { healthResponse, metricsResponse } from "./observability";
import { createTrainerCache, type TrainerCache } from "./trainerCache";
import { audioUpload } from "./audioUpload";

export type RouteDependencies = {
  trainers?: TrainerCache;
};

/**
 * Aborts when the client goes away before the response is written, so a
 * dropped request stops waiting on the provider.
 */
const abortOnClose = (res: Response): AbortController => {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller;
};

const readAudio = (req: Request, encoded: string | undefined) => {
  if (req.file?.buffer && req.file.buffer.length > 0) {
    return decodeAudio(req.file.buffer);
  }
  if (encoded && encoded.trim().length > 0) {
    return decodeAudio(encoded);
  }
  throw new AudioDecodeError("No audio provided: send an audio file part or a base64 audio field");
};

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  dependencies: RouteDependencies = {}
): Promise<Server> {
  const trainers = dependencies.trainers ?? createTrainerCache(appConfig);

  app.use((req, _res, next) => {
    if (req.url.startsWith("/api/v1/")) {
      req.url = req.url.replace("/api/v1/", "/api/");
    }
    next();
  });

  app.post(
    api.score.create.path,
    scoreRateLimiter,
    audioUpload(),
    async (req, res) => {
      const controller = abortOnClose(res);
      try {
        const input = parseRequest(api.score.create.input, req.body);
        const clip = readAudio(req, input.audio);
        const trainer = await trainers.getOrCreate(input.language);
        const result = await trainer.processAudio(
          { referenceText: input.title, clip },
          { signal: controller.signal }
        );
        res.json(toScoreResponse(result));
      } catch (err) {
        if (controller.signal.aborted) {
          logEvent("info", "request.cancelled", {
            requestId: getRequestId(req),
            method: req.method,
            path: req.path,
          });
          return;
        }
        if (res.writableEnded) return;
        respondWithError(res, req, err);
      }
    }
  );

  app.post(api.score.fromTranscript.path, async (req, res) => {
    try {
      const input = parseRequest(api.score.fromTranscript.input, req.body);
      const trainer = await trainers.getOrCreate(input.language);
      const result = await trainer.scoreTranscript(input.title, {
        text: input.transcript,
        words: input.words,
        durationSec: input.durationSec,
      });
      res.json(toScoreResponse(result));
    } catch (err) {
      respondWithError(res, req, err);
    }
  });

  app.get(api.languages.list.path, (_req, res) => {
    res.json({
      languages: trainers.supportedLanguages(),
      ready: trainers.readyLanguages(),
    });
  });

  app.get("/api/health", (_req, res) => {
    res.json(
      healthResponse({
        trainers,
        transcriptionProvider: appConfig.transcription.provider,
        phoneticBackend: appConfig.phonetic.backend,
      })
    );
  });

  app.get("/api/metrics", (req, res) => {
    const configuredToken = appConfig.metricsToken;
    if (appConfig.releaseMode) {
      if (!configuredToken) {
        sendError(
          res,
          req,
          new ApiError(403, "METRICS_DISABLED", "Metrics are disabled until METRICS_TOKEN is configured")
        );
        return;
      }
      const provided = (req.headers["x-metrics-token"] || "").toString().trim();
      if (!provided || provided !== configuredToken) {
        sendError(res, req, new ApiError(401, "METRICS_UNAUTHORIZED", "Invalid metrics token"));
        return;
      }
    }
    res.json(metricsResponse());
  });

  return httpServer;
}
