import { z } from "zod";

const boolLike = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value !== "string") return false;
    return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
  });

type TrustProxyValue = boolean | number | string;

const configSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.string().optional(),
  HOST: z.string().optional(),
  RELEASE_MODE: boolLike,
  TRUST_PROXY: z.string().optional(),
  CORS_ALLOWED_ORIGINS: z.string().optional(),
  APP_VERSION: z.string().optional(),
  APP_COMMIT_SHA: z.string().optional(),
  SENTRY_DSN: z.string().optional(),
  METRICS_TOKEN: z.string().optional(),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(120),
  RATE_LIMIT_EXPENSIVE_MAX: z.coerce.number().int().positive().default(12),
  TRANSCRIPTION_PROVIDER: z.enum(["whisper", "assemblyai"]).default("whisper"),
  WHISPER_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_API_BASE: z.string().optional(),
  WHISPER_MODEL: z.string().min(1).default("whisper-1"),
  ASSEMBLYAI_API_KEY: z.string().optional(),
  TRANSCRIPTION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  TRANSCRIPTION_RETRIES: z.coerce.number().int().min(0).max(3).default(1),
  PHONETIC_BACKEND: z.enum(["espeak", "orthographic"]).default("espeak"),
  SUPPORTED_LANGUAGES: z.string().default("en,de,fr"),
  SCORE_GOOD_THRESHOLD: z.coerce.number().min(0).max(100).default(70),
  SCORE_OK_THRESHOLD: z.coerce.number().gt(0).max(100).default(60),
  // A substitution costs at most 1, so two gaps must cost more.
  ALIGNMENT_GAP_COST: z.coerce.number().gt(0.5).default(0.8),
  AUDIO_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
});

const parseTrustProxy = (
  rawValue: string | undefined,
  releaseMode: boolean,
): TrustProxyValue => {
  if (!rawValue || rawValue.trim().length === 0) {
    return releaseMode ? 1 : false;
  }
  const normalized = rawValue.trim().toLowerCase();
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  if (["true", "yes", "on"].includes(normalized)) return 1;
  const asNumber = Number(rawValue);
  if (Number.isInteger(asNumber) && asNumber >= 0) return asNumber;
  return rawValue.trim();
};

const splitCsv = (value: string | undefined): string[] =>
  typeof value === "string" && value.trim().length > 0
    ? value
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean)
    : [];

const blankToUndefined = (value: string | undefined): string | undefined =>
  value && value.trim().length > 0 ? value.trim() : undefined;

export function parseConfig(source: NodeJS.ProcessEnv) {
  const parsed = configSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join(", ")}`);
  }

  const env = parsed.data;
  const releaseMode = env.NODE_ENV === "production" || env.RELEASE_MODE;
  const whisperApiKey = blankToUndefined(env.WHISPER_API_KEY) ?? blankToUndefined(env.OPENAI_API_KEY);
  const assemblyApiKey = blankToUndefined(env.ASSEMBLYAI_API_KEY);
  const languages = splitCsv(env.SUPPORTED_LANGUAGES).map((language) => language.toLowerCase());

  const configErrors: string[] = [];
  if (languages.length === 0) {
    configErrors.push("SUPPORTED_LANGUAGES must list at least one language code.");
  }
  if (env.SCORE_OK_THRESHOLD >= env.SCORE_GOOD_THRESHOLD) {
    configErrors.push("SCORE_OK_THRESHOLD must be lower than SCORE_GOOD_THRESHOLD.");
  }
  if (releaseMode) {
    if (env.TRANSCRIPTION_PROVIDER === "whisper" && !whisperApiKey) {
      configErrors.push(
        "WHISPER_API_KEY (or OPENAI_API_KEY) must be set when TRANSCRIPTION_PROVIDER=whisper in production/release mode.",
      );
    }
    if (env.TRANSCRIPTION_PROVIDER === "assemblyai" && !assemblyApiKey) {
      configErrors.push(
        "ASSEMBLYAI_API_KEY must be set when TRANSCRIPTION_PROVIDER=assemblyai in production/release mode.",
      );
    }
  }

  if (configErrors.length > 0) {
    throw new Error(
      `Invalid launch configuration:\n- ${configErrors.join("\n- ")}`,
    );
  }

  return {
    env: env.NODE_ENV,
    isProd: env.NODE_ENV === "production",
    isDev: env.NODE_ENV === "development",
    isTest: env.NODE_ENV === "test",
    releaseMode,
    host: env.HOST,
    port: env.PORT ? Number(env.PORT) : 5000,
    trustProxy: parseTrustProxy(env.TRUST_PROXY, releaseMode),
    version: env.APP_VERSION || source.npm_package_version || "0.0.0",
    commitSha: env.APP_COMMIT_SHA || source.GIT_COMMIT_SHA || "unknown",
    corsAllowedOrigins: splitCsv(env.CORS_ALLOWED_ORIGINS),
    metricsToken: blankToUndefined(env.METRICS_TOKEN),
    rateLimit: {
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
      expensiveMaxRequests: env.RATE_LIMIT_EXPENSIVE_MAX,
    },
    transcription: {
      provider: env.TRANSCRIPTION_PROVIDER,
      timeoutMs: env.TRANSCRIPTION_TIMEOUT_MS,
      retries: env.TRANSCRIPTION_RETRIES,
      whisper: {
        apiKey: whisperApiKey,
        baseURL: blankToUndefined(env.OPENAI_API_BASE),
        model: env.WHISPER_MODEL,
      },
      assemblyai: {
        apiKey: assemblyApiKey,
      },
    },
    phonetic: {
      backend: env.PHONETIC_BACKEND,
    },
    languages,
    scoring: {
      thresholds: {
        good: env.SCORE_GOOD_THRESHOLD,
        ok: env.SCORE_OK_THRESHOLD,
      },
      gapCost: env.ALIGNMENT_GAP_COST,
    },
    audio: {
      maxBytes: env.AUDIO_MAX_BYTES,
    },
    sentry: {
      dsn: env.SENTRY_DSN,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof parseConfig>;

export const appConfig: AppConfig = parseConfig(process.env);
