import path from "path";
import type { RequestHandler } from "express";
import multer from "multer";
import { appConfig } from "./config";
import { ApiError } from "./lib/http";

const allowedExtensions = new Set([
  ".wav",
  ".webm",
  ".ogg",
  ".oga",
  ".opus",
  ".mp3",
  ".flac",
  ".m4a",
  ".mp4",
]);

const allowedExactMimeTypes = new Set([
  "video/webm",
  "video/mp4",
  "application/ogg",
  "application/octet-stream",
]);

const isAllowedMime = (mime: string): boolean =>
  mime.startsWith("audio/") || allowedExactMimeTypes.has(mime);

const fileFilter: multer.Options["fileFilter"] = (_req, file, cb) => {
  const ext = path.extname(file.originalname || "").toLowerCase();
  const mime = (file.mimetype || "").toLowerCase();

  if (ext && !allowedExtensions.has(ext)) {
    cb(new ApiError(400, "AUDIO_UNSUPPORTED_TYPE", `Unsupported audio file extension ${ext}`));
    return;
  }
  if (!isAllowedMime(mime)) {
    cb(new ApiError(400, "AUDIO_UNSUPPORTED_TYPE", "Only audio files are allowed"));
    return;
  }
  cb(null, true);
};

/**
 * Audio is kept in memory: a recording is scored once and never stored.
 */
export const createAudioUpload = (maxBytes: number = appConfig.audio.maxBytes) =>
  multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxBytes, files: 1 },
    fileFilter,
  });

/**
 * Accepts one optional `audio` file part. Multer's own errors become API
 * errors so the route's error handling sees a status and a code.
 */
export const audioUpload = (maxBytes?: number): RequestHandler => {
  const single = createAudioUpload(maxBytes).single("audio");
  return (req, res, next) => {
    single(req, res, (err?: unknown) => {
      if (!err) return next();
      if (err instanceof multer.MulterError) {
        if (err.code === "LIMIT_FILE_SIZE") {
          return next(new ApiError(413, "PAYLOAD_TOO_LARGE", "Audio file is too large"));
        }
        return next(new ApiError(400, "UPLOAD_INVALID", err.message));
      }
      next(err);
    });
  };
};
