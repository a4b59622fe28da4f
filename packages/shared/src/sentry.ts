import * as Sentry from "@sentry/node";

import { getEnv } from "./env";
import { logger } from "./logging/logger";

let initialized = false;

export function initSentry(service?: string): void {
  if (initialized) return;

  const env = getEnv();
  const dsn = env.SENTRY_DSN;
  if (!dsn) {
    logger.info("sentry_disabled", { service: service ?? "shared", reason: "dsn_not_configured" });
    return;
  }

  Sentry.init({
    dsn,
    environment: env.NODE_ENV,
    tracesSampleRate: 0,
    initialScope: service ? { tags: { service } } : undefined,
  });

  logger.info("sentry_initialized", { service: service ?? "shared", environment: env.NODE_ENV });
  initialized = true;
}

export function isSentryEnabled(): boolean {
  return initialized;
}

export function captureError(error: unknown, context?: Record<string, unknown>): void {
  if (!initialized) {
    return;
  }

  const err = error instanceof Error ? error : new Error(String(error));

  if (context) {
    Sentry.withScope((scope) => {
      Object.entries(context).forEach(([key, value]) => {
        scope.setContext(key, { value });
      });
      Sentry.captureException(err);
    });
  } else {
    Sentry.captureException(err);
  }
}

export async function flushSentry(timeoutMs = 2000): Promise<boolean> {
  if (!initialized) return true;
  return Sentry.flush(timeoutMs);
}
