// ─────────────────────────────────────────────
// Core module exports
// ─────────────────────────────────────────────
export * from "./env";
export * from "./errors";
export * from "./types/tracking";

// ─────────────────────────────────────────────
// Engine: lifecycle, ordering, quota, segments
// ─────────────────────────────────────────────
export * from "./engine/lifecycle";
export * from "./engine/priority";
export * from "./engine/quotaLedger";
export * from "./engine/segmentPlan";

// ─────────────────────────────────────────────
// Persisted form
// ─────────────────────────────────────────────
export * from "./schemas/tracking";

// ─────────────────────────────────────────────
// Logging & observability
// ─────────────────────────────────────────────
export * from "./logging/logger";
export * from "./observability/logging";
export { withRetry } from "./resilience/externalServiceResilience";
export type { WithRetryOptions } from "./resilience/externalServiceResilience";

// ─────────────────────────────────────────────
// Sentry
// ─────────────────────────────────────────────
export { captureError, flushSentry, initSentry, isSentryEnabled } from "./sentry";
