import { z } from "zod";

import { WORK_ITEM_STATUSES } from "../engine/lifecycle";
import type {
  CorruptRecord,
  QuotaLedgerEntry,
  QuotaLedgerState,
  WorkItem,
  WorkItemStatus,
} from "../types/tracking";

export const TRACKING_SCHEMA_VERSION = 1;

const isoTimestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: "must be an ISO-8601 timestamp",
});

export const WorkItemStatusSchema = z.custom<WorkItemStatus>(
  (value) => typeof value === "string" && WORK_ITEM_STATUSES.some((status) => status === value),
  { message: `status must be one of ${WORK_ITEM_STATUSES.join(", ")}` },
);

export const SegmentSchema = z.object({
  index: z.number().int().positive(),
  sourceRange: z.object({
    start: z.number().nonnegative(),
    duration: z.number().nonnegative(),
  }),
  localArtifactRef: z.string(),
});

export const PublishedRefsSchema = z.record(
  z.string().regex(/^[1-9]\d*$/, "publishedRefs keys must be positive segment indices"),
  z.string().min(1),
);

export const ItemClaimSchema = z.object({
  owner: z.string().min(1),
  expiresAt: isoTimestamp,
});

export const WorkItemSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  sourceUrl: z.string(),
  priority: z.number().finite(),
  status: WorkItemStatusSchema,
  sourceArtifactRef: z.string().nullable(),
  segments: z.array(SegmentSchema),
  publishedRefs: PublishedRefsSchema,
  retryCount: z.number().int().nonnegative(),
  lastError: z.string().nullable(),
  claim: ItemClaimSchema.nullable(),
  version: z.number().int().nonnegative(),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp,
});

export const QuotaLedgerEntrySchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD"),
  consumedUnits: z.number().nonnegative(),
  dailyBudget: z.number().nonnegative(),
});

export const PersistedLedgerSchema = QuotaLedgerEntrySchema.extend({
  history: z.array(QuotaLedgerEntrySchema).default([]),
});

/**
 * Document layout of the file-backed store. Items are kept as unknown here
 * and validated one by one so a single bad record never hides the others.
 */
export const TrackingDocumentSchema = z.object({
  schemaVersion: z.literal(TRACKING_SCHEMA_VERSION),
  items: z.record(z.string(), z.unknown()),
  quotaLedger: PersistedLedgerSchema.nullable().default(null),
});

export type TrackingDocument = z.infer<typeof TrackingDocumentSchema>;
export type PersistedLedger = z.infer<typeof PersistedLedgerSchema>;

export type ParsedItem = { ok: true; item: WorkItem } | { ok: false; corrupt: CorruptRecord };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseWorkItem(id: string, raw: unknown): ParsedItem {
  const result = WorkItemSchema.safeParse(raw);
  if (!result.success) {
    return { ok: false, corrupt: { id, error: describeIssues(result.error) } };
  }
  if (result.data.id !== id) {
    return { ok: false, corrupt: { id, error: `record id ${result.data.id} does not match key ${id}` } };
  }
  return { ok: true, item: result.data };
}

/**
 * Plain JSON form of a work item. Field order is fixed so diffs of the
 * tracking file stay readable.
 */
export function serializeWorkItem(item: WorkItem): Record<string, unknown> {
  const publishedRefs: Record<string, string> = {};
  for (const index of Object.keys(item.publishedRefs).map(Number).sort((a, b) => a - b)) {
    const ref = item.publishedRefs[index];
    if (ref !== undefined) publishedRefs[String(index)] = ref;
  }

  return {
    id: item.id,
    title: item.title,
    sourceUrl: item.sourceUrl,
    priority: item.priority,
    status: item.status,
    sourceArtifactRef: item.sourceArtifactRef,
    segments: item.segments.map((segment) => ({
      index: segment.index,
      sourceRange: { start: segment.sourceRange.start, duration: segment.sourceRange.duration },
      localArtifactRef: segment.localArtifactRef,
    })),
    publishedRefs,
    retryCount: item.retryCount,
    lastError: item.lastError,
    claim: item.claim ? { owner: item.claim.owner, expiresAt: item.claim.expiresAt } : null,
    version: item.version,
    createdAt: item.createdAt,
    updatedAt: item.updatedAt,
  };
}

export function serializeLedger(state: QuotaLedgerState): PersistedLedger | null {
  if (!state.current) return null;
  return {
    date: state.current.date,
    consumedUnits: state.current.consumedUnits,
    dailyBudget: state.current.dailyBudget,
    history: state.history.map((entry: QuotaLedgerEntry) => ({ ...entry })),
  };
}

export function deserializeLedger(persisted: PersistedLedger | null): QuotaLedgerState {
  if (!persisted) return { current: null, history: [] };
  const { history, ...current } = persisted;
  return { current, history };
}

export { describeIssues as describeZodIssues };
