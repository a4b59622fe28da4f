/**
 * Work item lifecycle.
 *
 * Statuses are monotonic - they only advance forward and never regress:
 * Discovered → Fetched → Transformed → Completed, or Failed from any
 * non-terminal status.
 */

import type { WorkItem, WorkItemStatus } from "../types/tracking";

/**
 * Forward order. Failed is not part of it; it is reachable from any
 * non-terminal status.
 */
const STATUS_ORDER: readonly WorkItemStatus[] = ["Discovered", "Fetched", "Transformed", "Completed"];

export const WORK_ITEM_STATUSES: readonly WorkItemStatus[] = [...STATUS_ORDER, "Failed"];

export class InvalidTransitionError extends Error {
  readonly code = "INVALID_TRANSITION";
  readonly from: WorkItemStatus;
  readonly to: WorkItemStatus;

  constructor(from: WorkItemStatus, to: WorkItemStatus) {
    super(`Invalid status transition ${from} → ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

/**
 * Ordinal used to check that a status never decreases.
 * Failed ranks after every other status.
 */
export function statusOrdinal(status: WorkItemStatus): number {
  if (status === "Failed") return STATUS_ORDER.length;
  return STATUS_ORDER.indexOf(status);
}

export function isTerminalStatus(status: WorkItemStatus): boolean {
  return status === "Completed" || status === "Failed";
}

export function isValidStatus(value: unknown): value is WorkItemStatus {
  return typeof value === "string" && WORK_ITEM_STATUSES.some((status) => status === value);
}

/**
 * Next status in the forward sequence, or null for terminal statuses.
 *
 * @example
 * nextStatusAfter('Discovered') // 'Fetched'
 * nextStatusAfter('Transformed') // 'Completed'
 * nextStatusAfter('Failed') // null
 */
export function nextStatusAfter(current: WorkItemStatus): WorkItemStatus | null {
  if (isTerminalStatus(current)) return null;
  return STATUS_ORDER[STATUS_ORDER.indexOf(current) + 1] ?? null;
}

export function canTransition(from: WorkItemStatus, to: WorkItemStatus): boolean {
  if (from === to) return false;
  if (to === "Failed") return !isTerminalStatus(from);
  return nextStatusAfter(from) === to;
}

export function assertTransition(from: WorkItemStatus, to: WorkItemStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

/**
 * Returns a copy of the item moved to `to`. Throws InvalidTransitionError for
 * skips, regressions and moves out of terminal statuses.
 */
export function transition(item: WorkItem, to: WorkItemStatus, now: Date): WorkItem {
  assertTransition(item.status, to);
  return { ...item, status: to, updatedAt: now.toISOString() };
}

/**
 * Segment indices that have no remote id yet, in index order.
 */
export function pendingSegmentIndices(item: WorkItem): number[] {
  return item.segments
    .map((segment) => segment.index)
    .filter((index) => item.publishedRefs[index] === undefined)
    .sort((a, b) => a - b);
}

export function isFullyPublished(item: WorkItem): boolean {
  return item.segments.length > 0 && pendingSegmentIndices(item).length === 0;
}
