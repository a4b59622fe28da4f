import type { WorkItem } from "../types/tracking";

type Orderable = Pick<WorkItem, "id" | "priority" | "createdAt">;

/**
 * Scheduling order: priority descending, then oldest discovered first,
 * then id so the order never depends on storage iteration.
 */
export function compareByPriority(a: Orderable, b: Orderable): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }

  const aCreated = Date.parse(a.createdAt);
  const bCreated = Date.parse(b.createdAt);
  if (aCreated !== bCreated) {
    return aCreated - bCreated;
  }

  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export function sortByPriority<T extends Orderable>(items: Iterable<T>): T[] {
  return [...items].sort(compareByPriority);
}
