import { appConfig } from "../config";
import { logEvent } from "./logger";

type SentryModule = typeof import("@sentry/node");

let sentry: SentryModule | null = null;
let initialized = false;

export const initSentry = async () => {
  if (initialized) return;
  initialized = true;

  const dsn = appConfig.sentry.dsn?.trim();
  if (!dsn) return;

  try {
    const imported = await import("@sentry/node");
    imported.init({
      dsn,
      environment: appConfig.env,
      release: `${appConfig.version}+${appConfig.commitSha}`,
    });
    sentry = imported;
    logEvent("info", "sentry.init", { enabled: true });
  } catch (error) {
    logEvent("warn", "sentry.init_failed", {
      message: error instanceof Error ? error.message : "Failed to initialize Sentry",
    });
  }
};

export const captureSentryException = (
  error: unknown,
  context?: Record<string, unknown>,
) => {
  if (!sentry) return;
  try {
    sentry.captureException(error, { extra: context });
  } catch (reportError) {
    logEvent("warn", "sentry.capture_failed", {
      message: reportError instanceof Error ? reportError.message : String(reportError),
    });
  }
};

export const isSentryEnabled = () => !!sentry;
