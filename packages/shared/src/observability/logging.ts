/**
 * Structured stage/run logging with Sentry breadcrumbs.
 *
 * Never logs secrets (tokens, keys) - only item ids, stage names and counts.
 */

import * as Sentry from "@sentry/node";

import { logger } from "../logging/logger";

function addBreadcrumb(
  category: string,
  message: string,
  level: "info" | "warning" | "error",
  data?: Record<string, unknown>,
): void {
  Sentry.addBreadcrumb({
    category,
    message,
    level,
    data: data ?? {},
    timestamp: Date.now() / 1000,
  });
}

// ============================================================================
// Stage Observability
// ============================================================================

export type StageLogContext = {
  itemId: string;
  runId: string;
  stage: "fetch" | "transform" | "publish";
  segmentIndex?: number;
};

export type StageLogStatus = "started" | "succeeded" | "retry" | "failed";

/**
 * Logs a stage transition with structured fields and a Sentry breadcrumb.
 */
export function logStageStatus(
  ctx: StageLogContext,
  status: StageLogStatus,
  extra?: Record<string, unknown>,
): void {
  const payload: Record<string, unknown> = {
    service: "worker",
    itemId: ctx.itemId,
    runId: ctx.runId,
    stage: ctx.stage,
    ...(ctx.segmentIndex !== undefined && { segmentIndex: ctx.segmentIndex }),
    status,
    ...extra,
  };

  const event = `stage_${status}`;

  if (status === "failed") {
    logger.error(event, payload);
    addBreadcrumb("stage", event, "error", payload);
  } else if (status === "retry") {
    logger.warn(event, payload);
    addBreadcrumb("stage", event, "warning", payload);
  } else {
    logger.info(event, payload);
    addBreadcrumb("stage", event, "info", payload);
  }
}

// ============================================================================
// Run Observability
// ============================================================================

export type RunLogContext = {
  runId: string;
};

/**
 * Logs the start or end of one scheduler invocation.
 */
export function logRunEvent(
  ctx: RunLogContext,
  phase: "started" | "finished" | "aborted",
  extra?: Record<string, unknown>,
): void {
  const payload = { service: "worker", runId: ctx.runId, ...extra };
  const event = `run_${phase}`;

  if (phase === "aborted") {
    logger.error(event, payload);
    addBreadcrumb("run", event, "error", payload);
  } else {
    logger.info(event, payload);
    addBreadcrumb("run", event, "info", payload);
  }
}
