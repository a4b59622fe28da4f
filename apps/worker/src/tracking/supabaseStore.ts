import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";

import {
  DEFAULT_HISTORY_LIMIT,
  describeZodIssues,
  diffLedger,
  FatalStoreError,
  parseWorkItem,
  serializeWorkItem,
  StaleWriteError,
  StoreCorruptError,
  type CorruptRecord,
  type QuotaLedgerEntry,
  type QuotaLedgerState,
  type TrackingSnapshot,
  type WorkItem,
} from "@shortloop/shared";

import type { TrackingStore } from "./types";

export const ITEMS_TABLE = "tracked_items";
export const LEDGER_TABLE = "quota_ledger_days";
export const COMMIT_FUNCTION = "commit_tracking_changes";

const TrackedItemRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  source_url: z.string(),
  priority: z.coerce.number(),
  status: z.string(),
  source_artifact_ref: z.string().nullable(),
  segments: z.unknown(),
  published_refs: z.unknown(),
  retry_count: z.number(),
  last_error: z.string().nullable(),
  claim_owner: z.string().nullable(),
  claim_expires_at: z.string().nullable(),
  version: z.number(),
  created_at: z.string(),
  updated_at: z.string(),
});

type TrackedItemRow = z.infer<typeof TrackedItemRowSchema>;

const LedgerRowSchema = z.object({
  day: z.string(),
  consumed_units: z.coerce.number(),
  daily_budget: z.coerce.number(),
});

const VersionRowSchema = z.object({ id: z.string(), version: z.number() });

/** Reported by the commit function when an item version no longer matches. */
const CommitConflictSchema = z
  .object({
    item_id: z.string(),
    expected_version: z.number(),
    actual_version: z.number().nullable(),
  })
  .nullable();

function rowId(row: unknown): string {
  if (typeof row === "object" && row !== null && "id" in row && typeof row.id === "string") {
    return row.id;
  }
  return "(unknown)";
}

/** Postgres returns timestamptz as `+00:00`; records keep the `Z` form they were written with. */
function isoTimestamp(value: string): string {
  const time = Date.parse(value);
  return Number.isNaN(time) ? value : new Date(time).toISOString();
}

function rowToRecord(row: TrackedItemRow): Record<string, unknown> {
  return {
    id: row.id,
    title: row.title,
    sourceUrl: row.source_url,
    priority: row.priority,
    status: row.status,
    sourceArtifactRef: row.source_artifact_ref,
    segments: row.segments,
    publishedRefs: row.published_refs,
    retryCount: row.retry_count,
    lastError: row.last_error,
    claim:
      row.claim_owner !== null && row.claim_expires_at !== null
        ? { owner: row.claim_owner, expiresAt: isoTimestamp(row.claim_expires_at) }
        : null,
    version: row.version,
    createdAt: isoTimestamp(row.created_at),
    updatedAt: isoTimestamp(row.updated_at),
  };
}

function itemToRow(item: WorkItem): Record<string, unknown> {
  const record = serializeWorkItem(item);
  return {
    id: item.id,
    title: item.title,
    source_url: item.sourceUrl,
    priority: item.priority,
    status: item.status,
    source_artifact_ref: item.sourceArtifactRef,
    segments: record.segments,
    published_refs: record.publishedRefs,
    retry_count: item.retryCount,
    last_error: item.lastError,
    claim_owner: item.claim?.owner ?? null,
    claim_expires_at: item.claim?.expiresAt ?? null,
    version: item.version,
    expected_version: item.version - 1,
    created_at: item.createdAt,
    updated_at: item.updatedAt,
  };
}

export interface SupabaseTrackingStoreOptions {
  historyLimit?: number;
}

/**
 * Tracking store on two Supabase tables. Commits go through a single
 * database function so item versions are checked and the ledger deltas
 * applied in one transaction (see supabase/migrations).
 */
export class SupabaseTrackingStore implements TrackingStore {
  private readonly supabase: SupabaseClient;
  private readonly historyLimit: number;

  private readonly staged = new Map<string, WorkItem>();
  private baseLedger: QuotaLedgerState = { current: null, history: [] };
  private stagedLedger: QuotaLedgerState | null = null;

  constructor(supabase: SupabaseClient, options: SupabaseTrackingStoreOptions = {}) {
    this.supabase = supabase;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  async load(): Promise<TrackingSnapshot> {
    const { data: itemRows, error: itemsError } = await this.supabase.from(ITEMS_TABLE).select("*");
    if (itemsError) {
      throw new FatalStoreError(`Failed to load ${ITEMS_TABLE}: ${itemsError.message}`, { cause: itemsError });
    }

    const items = new Map<string, WorkItem>();
    const corrupt: CorruptRecord[] = [];
    for (const raw of itemRows ?? []) {
      const row = TrackedItemRowSchema.safeParse(raw);
      if (!row.success) {
        corrupt.push({ id: rowId(raw), error: describeZodIssues(row.error) });
        continue;
      }
      const parsed = parseWorkItem(row.data.id, rowToRecord(row.data));
      if (parsed.ok) {
        items.set(parsed.item.id, parsed.item);
      } else {
        corrupt.push(parsed.corrupt);
      }
    }

    const ledger = await this.loadLedger();
    this.baseLedger = { current: ledger.current ? { ...ledger.current } : null, history: [...ledger.history] };
    this.staged.clear();
    this.stagedLedger = null;

    return { items, ledger, corrupt };
  }

  async upsert(item: WorkItem): Promise<WorkItem> {
    let current: number | null;
    const pending = this.staged.get(item.id);

    if (pending) {
      current = pending.version;
    } else {
      const { data, error } = await this.supabase.from(ITEMS_TABLE).select("id, version").eq("id", item.id);
      if (error) {
        throw new FatalStoreError(`Failed to read version of ${item.id}: ${error.message}`, { cause: error });
      }
      const rows = z.array(VersionRowSchema).safeParse(data ?? []);
      if (!rows.success) {
        throw new StoreCorruptError(`Record ${item.id} has no readable version`, { itemId: item.id });
      }
      current = rows.data[0]?.version ?? null;
    }

    if (item.version !== (current ?? 0)) {
      throw new StaleWriteError(item.id, item.version, current);
    }

    const next: WorkItem = { ...item, version: item.version + 1 };
    this.staged.set(item.id, next);
    return next;
  }

  stageLedger(state: QuotaLedgerState): void {
    this.stagedLedger = {
      current: state.current ? { ...state.current } : null,
      history: state.history.map((entry) => ({ ...entry })),
    };
  }

  async commit(): Promise<void> {
    if (this.staged.size === 0 && this.stagedLedger === null) {
      return;
    }

    const staged = [...this.staged.values()];
    const stagedLedger = this.stagedLedger;
    this.staged.clear();
    this.stagedLedger = null;

    const quota = (stagedLedger ? diffLedger(this.baseLedger, stagedLedger) : []).map((delta) => ({
      day: delta.date,
      daily_budget: delta.dailyBudget,
      consumed_delta: delta.consumedDelta,
    }));

    if (staged.length === 0 && quota.length === 0) {
      return;
    }

    const { data, error } = await this.supabase.rpc(COMMIT_FUNCTION, {
      p_items: staged.map(itemToRow),
      p_quota: quota,
    });

    if (error) {
      throw new FatalStoreError(`${COMMIT_FUNCTION} failed: ${error.message}`, { cause: error });
    }

    // The function applies ledger deltas even when it rejects the items.
    if (stagedLedger) {
      this.baseLedger = stagedLedger;
    }

    const conflict = CommitConflictSchema.safeParse(data ?? null);
    if (!conflict.success) {
      throw new FatalStoreError(`${COMMIT_FUNCTION} returned an unexpected result`);
    }
    if (conflict.data) {
      throw new StaleWriteError(
        conflict.data.item_id,
        conflict.data.expected_version,
        conflict.data.actual_version,
      );
    }
  }

  private async loadLedger(): Promise<QuotaLedgerState> {
    const { data, error } = await this.supabase
      .from(LEDGER_TABLE)
      .select("day, consumed_units, daily_budget")
      .order("day", { ascending: false })
      .limit(this.historyLimit + 1);

    if (error) {
      throw new FatalStoreError(`Failed to load ${LEDGER_TABLE}: ${error.message}`, { cause: error });
    }

    const rows = z.array(LedgerRowSchema).safeParse(data ?? []);
    if (!rows.success) {
      throw new StoreCorruptError(`${LEDGER_TABLE} has unexpected rows: ${describeZodIssues(rows.error)}`);
    }

    const entries: QuotaLedgerEntry[] = rows.data
      .map((row) => ({ date: row.day, consumedUnits: row.consumed_units, dailyBudget: row.daily_budget }))
      .reverse();
    const current = entries.pop() ?? null;
    return { current, history: entries };
  }
}
