import {
  isTerminalStatus,
  pendingSegmentIndices,
  sortByPriority,
  type CorruptRecord,
  type QuotaUsage,
  type WorkItem,
  type WorkItemStatus,
} from "@shortloop/shared";

export interface PendingItemSummary {
  id: string;
  title: string;
  priority: number;
  status: WorkItemStatus;
  retryCount: number;
  lastError: string | null;
}

export interface InProgressSummary {
  id: string;
  title: string;
  published: number;
  total: number;
}

export interface CompletedSummary {
  id: string;
  title: string;
  parts: number;
  completedAt: string;
}

export interface TrackingReport {
  total: number;
  byStatus: Record<WorkItemStatus, number>;
  /** Highest-priority items still to be worked on, in scheduling order */
  topPending: PendingItemSummary[];
  /** Transformed items with at least one segment published */
  inProgress: InProgressSummary[];
  recentlyCompleted: CompletedSummary[];
  failed: PendingItemSummary[];
  corrupt: CorruptRecord[];
  quota?: QuotaUsage;
}

function pendingSummary(item: WorkItem): PendingItemSummary {
  return {
    id: item.id,
    title: item.title,
    priority: item.priority,
    status: item.status,
    retryCount: item.retryCount,
    lastError: item.lastError,
  };
}

export function summarizeTracking(
  items: Iterable<WorkItem>,
  options: { top?: number; corrupt?: CorruptRecord[]; quota?: QuotaUsage } = {},
): TrackingReport {
  const top = options.top ?? 5;
  const all = [...items];

  const byStatus: Record<WorkItemStatus, number> = {
    Discovered: 0,
    Fetched: 0,
    Transformed: 0,
    Completed: 0,
    Failed: 0,
  };
  for (const item of all) {
    byStatus[item.status] += 1;
  }

  const active = sortByPriority(all.filter((item) => !isTerminalStatus(item.status)));

  const inProgress = active
    .filter((item) => item.status === "Transformed" && pendingSegmentIndices(item).length < item.segments.length)
    .map((item) => ({
      id: item.id,
      title: item.title,
      published: item.segments.length - pendingSegmentIndices(item).length,
      total: item.segments.length,
    }));

  const recentlyCompleted = all
    .filter((item) => item.status === "Completed")
    .sort((a, b) => Date.parse(b.updatedAt) - Date.parse(a.updatedAt))
    .slice(0, top)
    .map((item) => ({ id: item.id, title: item.title, parts: item.segments.length, completedAt: item.updatedAt }));

  return {
    total: all.length,
    byStatus,
    topPending: active.slice(0, top).map(pendingSummary),
    inProgress,
    recentlyCompleted,
    failed: sortByPriority(all.filter((item) => item.status === "Failed")).map(pendingSummary),
    corrupt: options.corrupt ?? [],
    ...(options.quota && { quota: options.quota }),
  };
}
