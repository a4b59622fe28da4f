import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  serializeLedger,
  serializeWorkItem,
  TRACKING_SCHEMA_VERSION,
  type QuotaLedgerState,
  type WorkItem,
} from "@shortloop/shared";
import { vi } from "vitest";

import { makeSegments } from "../../../packages/shared/test/fixtures";
import type { SchedulerConfig } from "../src/config";
import type { FetchInput, PublishInput, StageExecutors, TransformInput } from "../src/stages/types";

export { makeItem, makeSegments, T0 } from "../../../packages/shared/test/fixtures";

/** 2026-03-02 in America/Los_Angeles */
export const NOW = new Date("2026-03-02T20:00:00.000Z");
export const NEXT_DAY = new Date("2026-03-03T20:00:00.000Z");

export const schedulerConfig: SchedulerConfig = {
  dailyBudget: 10_000,
  publishCost: 1600,
  maxItemsPerRun: 10,
  retryCeiling: 2,
  quotaTimeZone: "America/Los_Angeles",
  claimTtlSeconds: 3600,
};

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "shortloop-test-"));
}

export async function removeTempDir(dir: string | undefined): Promise<void> {
  if (dir) {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Writes a tracking document the way the file store lays it out. */
export async function seedTrackingFile(
  path: string,
  items: WorkItem[],
  ledger: QuotaLedgerState = { current: null, history: [] },
): Promise<void> {
  const document = {
    schemaVersion: TRACKING_SCHEMA_VERSION,
    items: Object.fromEntries(items.map((item) => [item.id, serializeWorkItem(item)])),
    quotaLedger: serializeLedger(ledger),
  };
  await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, "utf8");
}

export function silenceLogs(): void {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
}

/**
 * Executors backed by vi.fn. By default fetch succeeds, transform yields
 * three parts and publish returns `yt-<id>-<index>`.
 */
export function stubExecutors(
  overrides: {
    fetch?: (input: FetchInput) => Promise<{ artifactRef: string }>;
    transform?: (input: TransformInput) => Promise<ReturnType<typeof makeSegments>>;
    publish?: (input: PublishInput) => Promise<{ remoteId: string }>;
  } = {},
) {
  const fetch = vi.fn(
    overrides.fetch ?? (async (input: FetchInput) => ({ artifactRef: `/work/downloads/${input.id}.mp4` })),
  );
  const transform = vi.fn(
    overrides.transform ?? (async (input: TransformInput) => makeSegments(3, `/work/segments/${input.item.id}`)),
  );
  const publish = vi.fn(
    overrides.publish ??
      (async (input: PublishInput) => ({ remoteId: `yt-${input.item.id}-${input.segment.index}` })),
  );

  const executors: StageExecutors = {
    fetch: { stage: "fetch", execute: fetch },
    transform: { stage: "transform", execute: transform },
    publish: { stage: "publish", execute: publish },
  };

  return { executors, fetch, transform, publish };
}
