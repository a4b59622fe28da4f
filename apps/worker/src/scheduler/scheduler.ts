import { randomUUID } from "node:crypto";
import { hostname } from "node:os";

import {
  captureError,
  errorMessage,
  isFullyPublished,
  isStaleWriteError,
  isStoreCorruptError,
  logger,
  logRunEvent,
  logStageStatus,
  pendingSegmentIndices,
  QuotaLedger,
  SegmentSchema,
  transition,
  type CorruptRecord,
  type QuotaUsage,
  type Segment,
  type StageFailureKind,
  type WorkItem,
} from "@shortloop/shared";
import { z } from "zod";

import type { SchedulerConfig } from "../config";
import { classifyStageError, type StageExecutors, type StageName } from "../stages/types";
import type { TrackingStore } from "../tracking/types";
import { hasExpiredLease, selectWork } from "./selection";

export type RunOutcome = "advanced" | "idle" | "fatal";

export interface RunItemRef {
  itemId: string;
  title: string;
}

export interface PublishedPart extends RunItemRef {
  segmentIndex: number;
  totalSegments: number;
  remoteId: string;
}

export interface FailedItem extends RunItemRef {
  stage: StageName;
  error: string;
}

export interface RunSummary {
  runId: string;
  outcome: RunOutcome;
  /** Executor invocations made */
  attempted: number;
  /** Successful stage advancements, one per fetch, transform or published segment */
  advanced: number;
  /** Items moved to Failed */
  failed: number;
  /** Transient failures left for a later run */
  retried: number;
  /** Items skipped after a stale write, an unreadable record or a live lease */
  skipped: number;
  published: number;
  completed: number;
  quotaExhausted: boolean;
  usage: QuotaUsage | null;
  corrupt: CorruptRecord[];
  publishedParts: PublishedPart[];
  completedItems: RunItemRef[];
  /** Items this run moved to Failed */
  failedItems: FailedItem[];
  error?: string;
}

export interface SchedulerDeps {
  store: TrackingStore;
  executors: StageExecutors;
  config: SchedulerConfig;
  now?: () => Date;
  /** Lease owner id; unique per invocation by default */
  owner?: string;
}

/** Raised inside a run when the item being worked on must be skipped. */
class SkipItem extends Error {}

const SegmentListSchema = z.array(SegmentSchema).min(1);

/**
 * Checks transform output: at least one segment, indices 1..n without gaps,
 * non-negative ranges with a positive duration, and an artifact ref each.
 * Returns the segments in index order, or the reason they are unusable.
 */
export function validateSegments(output: unknown): { ok: true; segments: Segment[] } | { ok: false; reason: string } {
  const parsed = SegmentListSchema.safeParse(output);
  if (!parsed.success) {
    return { ok: false, reason: "transform returned no usable segment list" };
  }

  const segments = [...parsed.data].sort((a, b) => a.index - b.index);
  for (const [position, segment] of segments.entries()) {
    if (segment.index !== position + 1) {
      return { ok: false, reason: `segment indices must be 1..${segments.length} without gaps` };
    }
    if (!(segment.sourceRange.duration > 0)) {
      return { ok: false, reason: `segment ${segment.index} has an empty source range` };
    }
    if (segment.localArtifactRef.trim() === "") {
      return { ok: false, reason: `segment ${segment.index} has no artifact ref` };
    }
  }
  return { ok: true, segments };
}

function defaultOwner(): string {
  return `${hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`;
}

/**
 * Advances tracked items through fetch, transform and publish. Each call to
 * `runOnce` is a complete, stateless invocation: everything it needs is read
 * from the store and every change is committed before the next step.
 */
export class Scheduler {
  private readonly deps: Required<SchedulerDeps>;

  constructor(deps: SchedulerDeps) {
    this.deps = {
      ...deps,
      now: deps.now ?? (() => new Date()),
      owner: deps.owner ?? defaultOwner(),
    };
  }

  async runOnce(maxItems: number = this.deps.config.maxItemsPerRun): Promise<RunSummary> {
    return new SchedulerRun(this.deps, randomUUID(), maxItems).execute();
  }
}

class SchedulerRun {
  private readonly store: TrackingStore;
  private readonly executors: StageExecutors;
  private readonly config: SchedulerConfig;
  private readonly now: () => Date;
  private readonly owner: string;

  private ledger: QuotaLedger | null = null;
  private remaining: number;
  private readonly summary: RunSummary;

  constructor(deps: Required<SchedulerDeps>, runId: string, maxItems: number) {
    this.store = deps.store;
    this.executors = deps.executors;
    this.config = deps.config;
    this.now = deps.now;
    this.owner = deps.owner;
    this.remaining = Math.max(0, Math.floor(maxItems));
    this.summary = {
      runId,
      outcome: "idle",
      attempted: 0,
      advanced: 0,
      failed: 0,
      retried: 0,
      skipped: 0,
      published: 0,
      completed: 0,
      quotaExhausted: false,
      usage: null,
      corrupt: [],
      publishedParts: [],
      completedItems: [],
      failedItems: [],
    };
  }

  private get runId(): string {
    return this.summary.runId;
  }

  async execute(): Promise<RunSummary> {
    logRunEvent({ runId: this.runId }, "started", { owner: this.owner, maxItems: this.remaining });

    try {
      const snapshot = await this.store.load();
      this.ledger = new QuotaLedger(
        { dailyBudget: this.config.dailyBudget, timeZone: this.config.quotaTimeZone, now: this.now },
        snapshot.ledger,
      );

      this.summary.corrupt = snapshot.corrupt;
      for (const record of snapshot.corrupt) {
        logger.error("tracking_record_corrupt", { service: "worker", runId: this.runId, itemId: record.id, error: record.error });
      }

      const selection = selectWork(snapshot.items.values(), { owner: this.owner, now: this.now() });
      for (const item of selection.leased) {
        this.summary.skipped += 1;
        logger.info("item_leased_elsewhere", {
          service: "worker",
          runId: this.runId,
          itemId: item.id,
          owner: item.claim?.owner,
          expiresAt: item.claim?.expiresAt,
        });
      }

      for (const item of selection.prepare) {
        if (this.remaining <= 0) break;
        await this.prepare(item);
      }

      await this.publishAll(selection.publish);

      // Flush reservations whose item commit was rejected as stale.
      this.store.stageLedger(this.requireLedger().snapshot());
      await this.store.commit();
    } catch (error) {
      return this.abort(error);
    }

    const usage = this.requireLedger().currentUsage();
    this.summary.usage = usage;
    this.summary.outcome = this.summary.attempted > 0 || this.summary.completed > 0 ? "advanced" : "idle";

    logRunEvent({ runId: this.runId }, "finished", {
      outcome: this.summary.outcome,
      attempted: this.summary.attempted,
      advanced: this.summary.advanced,
      failed: this.summary.failed,
      retried: this.summary.retried,
      skipped: this.summary.skipped,
      published: this.summary.published,
      completed: this.summary.completed,
      quotaExhausted: this.summary.quotaExhausted,
      quotaUsed: usage.consumedUnits,
      quotaBudget: usage.dailyBudget,
      quotaDate: usage.date,
    });

    return this.summary;
  }

  private abort(error: unknown): RunSummary {
    const message = errorMessage(error);
    captureError(error, { runId: this.runId, owner: this.owner });
    logRunEvent({ runId: this.runId }, "aborted", { error: message });

    this.summary.outcome = "fatal";
    this.summary.error = message;
    this.summary.usage = this.ledger?.currentUsage() ?? null;
    return this.summary;
  }

  private requireLedger(): QuotaLedger {
    if (!this.ledger) {
      throw new Error("Quota ledger used before the store was loaded");
    }
    return this.ledger;
  }

  // ─── Preparation phase ─────────────────────────────────────

  /** Drives one item through fetch and transform while the cap allows. */
  private async prepare(item: WorkItem): Promise<void> {
    let current: WorkItem | null = item;

    try {
      while (current && this.remaining > 0) {
        if (current.status === "Discovered") {
          current = await this.runFetch(current);
        } else if (current.status === "Fetched") {
          current = await this.runTransform(current);
        } else {
          break;
        }
      }
    } catch (error) {
      if (error instanceof SkipItem) return;
      throw error;
    }
  }

  private async runFetch(item: WorkItem): Promise<WorkItem | null> {
    const claimed = await this.claim(item, "fetch");
    this.consumeCap();
    logStageStatus({ itemId: item.id, runId: this.runId, stage: "fetch" }, "started");

    let artifactRef: string;
    try {
      const output = await this.executors.fetch.execute({
        id: claimed.id,
        title: claimed.title,
        sourceUrl: claimed.sourceUrl,
      });
      artifactRef = output.artifactRef;
    } catch (error) {
      await this.recordFailure(claimed, "fetch", error, this.prepareKind(error));
      return null;
    }

    if (typeof artifactRef !== "string" || artifactRef.trim() === "") {
      await this.recordFailure(claimed, "fetch", new Error("fetch returned an empty artifact ref"), "permanent");
      return null;
    }

    const next = this.settle(transition(claimed, "Fetched", this.now()), { sourceArtifactRef: artifactRef });
    const persisted = await this.persist(next);
    this.summary.advanced += 1;
    logStageStatus({ itemId: item.id, runId: this.runId, stage: "fetch" }, "succeeded", { artifactRef });
    return persisted;
  }

  private async runTransform(item: WorkItem): Promise<WorkItem | null> {
    const sourceArtifactRef = item.sourceArtifactRef;
    if (sourceArtifactRef === null || sourceArtifactRef.trim() === "") {
      await this.recordFailure(item, "transform", new Error("item has no source artifact"), "permanent");
      return null;
    }

    const claimed = await this.claim(item, "transform");
    this.consumeCap();
    logStageStatus({ itemId: item.id, runId: this.runId, stage: "transform" }, "started");

    let output: unknown;
    try {
      output = await this.executors.transform.execute({
        item: { id: claimed.id, title: claimed.title },
        sourceArtifactRef,
      });
    } catch (error) {
      await this.recordFailure(claimed, "transform", error, this.prepareKind(error));
      return null;
    }

    const validated = validateSegments(output);
    if (!validated.ok) {
      await this.recordFailure(claimed, "transform", new Error(validated.reason), "permanent");
      return null;
    }

    const next = this.settle(transition(claimed, "Transformed", this.now()), { segments: validated.segments });
    const persisted = await this.persist(next);
    this.summary.advanced += 1;
    logStageStatus({ itemId: item.id, runId: this.runId, stage: "transform" }, "succeeded", {
      segments: validated.segments.length,
    });
    return persisted;
  }

  /** Quota refusals only mean something to publish; elsewhere they are transient. */
  private prepareKind(error: unknown): StageFailureKind {
    const kind = classifyStageError(error);
    return kind === "quota" ? "transient" : kind;
  }

  // ─── Publish phase ─────────────────────────────────────────

  private async publishAll(items: WorkItem[]): Promise<void> {
    for (const item of items) {
      try {
        const stop = await this.publishItem(item);
        if (stop) return;
      } catch (error) {
        if (error instanceof SkipItem) continue;
        throw error;
      }
    }
  }

  /**
   * Publishes the item's pending segments in index order.
   * Returns true when publish work must stop for the rest of the run.
   */
  private async publishItem(item: WorkItem): Promise<boolean> {
    const ledger = this.requireLedger();
    const cost = this.config.publishCost;

    if (item.segments.length === 0) {
      await this.recordFailure(item, "publish", new Error("item has no segments to publish"), "permanent");
      return false;
    }

    if (isFullyPublished(item)) {
      await this.persist(this.settle(transition(item, "Completed", this.now())));
      this.summary.completed += 1;
      this.summary.completedItems.push({ itemId: item.id, title: item.title });
      logger.info("item_completed", { service: "worker", runId: this.runId, itemId: item.id, quotaSpent: false });
      return false;
    }

    let current = item;
    for (const index of pendingSegmentIndices(item)) {
      const segment = current.segments.find((candidate) => candidate.index === index);
      if (!segment) continue;

      if (this.remaining <= 0) {
        return true;
      }

      if (ledger.currentUsage().remainingUnits < cost) {
        this.markQuotaExhausted(item.id, index);
        return true;
      }

      const claimed = await this.claim(current, "publish", index);

      if (!ledger.tryReserve(cost)) {
        await this.persist(this.unclaim(claimed));
        this.markQuotaExhausted(item.id, index);
        return true;
      }
      const reservedOn = ledger.currentUsage().date;

      this.consumeCap();
      const stageCtx = { itemId: item.id, runId: this.runId, stage: "publish" as const, segmentIndex: index };
      logStageStatus(stageCtx, "started", { cost });

      let remoteId: string;
      try {
        const output = await this.executors.publish.execute({ item: claimed, segment });
        remoteId = output.remoteId;
      } catch (error) {
        ledger.release(cost, reservedOn);
        const kind = classifyStageError(error);

        if (kind === "quota") {
          ledger.exhaust();
          await this.persist(this.unclaim(claimed));
          logStageStatus(stageCtx, "retry", { reason: "platform_quota", error: errorMessage(error) });
          this.markQuotaExhausted(item.id, index);
          return true;
        }

        await this.recordFailure(claimed, "publish", error, kind, index);
        return false;
      }

      if (typeof remoteId !== "string" || remoteId.trim() === "") {
        // The call went out, so the reservation stands.
        await this.recordFailure(claimed, "publish", new Error("publish returned an empty remote id"), "permanent", index);
        return false;
      }

      let next = this.settle(claimed, { publishedRefs: { ...claimed.publishedRefs, [index]: remoteId } });
      const done = isFullyPublished(next);
      if (done) {
        next = transition(next, "Completed", this.now());
      }

      current = await this.persist(next);
      this.summary.advanced += 1;
      this.summary.published += 1;
      this.summary.publishedParts.push({
        itemId: item.id,
        title: item.title,
        segmentIndex: index,
        totalSegments: item.segments.length,
        remoteId,
      });
      logStageStatus(stageCtx, "succeeded", { remoteId });

      if (done) {
        this.summary.completed += 1;
        this.summary.completedItems.push({ itemId: item.id, title: item.title });
        logger.info("item_completed", { service: "worker", runId: this.runId, itemId: item.id, quotaSpent: true });
      }
    }

    return false;
  }

  private markQuotaExhausted(itemId: string, segmentIndex: number): void {
    this.summary.quotaExhausted = true;
    const usage = this.requireLedger().currentUsage();
    logger.info("quota_exhausted", {
      service: "worker",
      runId: this.runId,
      itemId,
      segmentIndex,
      consumedUnits: usage.consumedUnits,
      dailyBudget: usage.dailyBudget,
      date: usage.date,
    });
  }

  // ─── Shared helpers ────────────────────────────────────────

  private consumeCap(): void {
    this.remaining -= 1;
    this.summary.attempted += 1;
  }

  /**
   * Applies a successful outcome: clears the lease and the failure state.
   */
  private settle(item: WorkItem, changes: Partial<WorkItem> = {}): WorkItem {
    return {
      ...item,
      ...changes,
      retryCount: changes.retryCount ?? 0,
      lastError: null,
      claim: null,
      updatedAt: this.now().toISOString(),
    };
  }

  /** Drops the lease without touching progress or failure state. */
  private unclaim(item: WorkItem): WorkItem {
    return { ...item, claim: null, updatedAt: this.now().toISOString() };
  }

  /** Commits a lease on the item so an overlapping invocation leaves it alone. */
  private async claim(item: WorkItem, stage: StageName, segmentIndex?: number): Promise<WorkItem> {
    if (hasExpiredLease(item, this.now())) {
      logger.warn("claim_expired_reclaimed", {
        service: "worker",
        runId: this.runId,
        itemId: item.id,
        previousOwner: item.claim?.owner,
        stage,
        segmentIndex,
      });
    }

    const expiresAt = new Date(this.now().getTime() + this.config.claimTtlSeconds * 1000).toISOString();
    return this.persist({
      ...item,
      claim: { owner: this.owner, expiresAt },
      updatedAt: this.now().toISOString(),
    });
  }

  /**
   * Records a failed stage. Permanent failures, and transient ones past the
   * retry ceiling, move the item to Failed; otherwise it stays where it is.
   */
  private async recordFailure(
    item: WorkItem,
    stage: StageName,
    error: unknown,
    kind: StageFailureKind,
    segmentIndex?: number,
  ): Promise<void> {
    const message = errorMessage(error);
    const retryCount = item.retryCount + 1;
    const giveUp = kind === "permanent" || retryCount > this.config.retryCeiling;

    const updated: WorkItem = {
      ...item,
      retryCount,
      lastError: `${stage}: ${message}`,
      claim: null,
      updatedAt: this.now().toISOString(),
    };
    const next = giveUp ? transition(updated, "Failed", this.now()) : updated;

    await this.persist(next);

    const ctx = { itemId: item.id, runId: this.runId, stage, segmentIndex };
    if (giveUp) {
      this.summary.failed += 1;
      this.summary.failedItems.push({ itemId: item.id, title: item.title, stage, error: message });
      logStageStatus(ctx, "failed", { kind, retryCount, error: message });
    } else {
      this.summary.retried += 1;
      logStageStatus(ctx, "retry", { kind, retryCount, retryCeiling: this.config.retryCeiling, error: message });
    }
  }

  /**
   * Stages the item with the current ledger and commits both. A stale or
   * unreadable record skips the item for the rest of the run; anything else
   * aborts the run.
   */
  private async persist(item: WorkItem): Promise<WorkItem> {
    try {
      const staged = await this.store.upsert(item);
      this.store.stageLedger(this.requireLedger().snapshot());
      await this.store.commit();
      return staged;
    } catch (error) {
      if (isStaleWriteError(error) || (isStoreCorruptError(error) && error.itemId !== undefined)) {
        this.summary.skipped += 1;
        logger.warn(isStaleWriteError(error) ? "item_stale_write" : "item_record_corrupt", {
          service: "worker",
          runId: this.runId,
          itemId: item.id,
          error: errorMessage(error),
        });
        throw new SkipItem(item.id);
      }
      throw error;
    }
  }
}
