import { sortByPriority, type WorkItem } from "@shortloop/shared";

export interface WorkSelection {
  /** Discovered and Fetched items, merged in scheduling order */
  prepare: WorkItem[];
  /** Transformed items in scheduling order */
  publish: WorkItem[];
  /** Items skipped because another invocation holds a live lease */
  leased: WorkItem[];
}

export function hasLiveLease(item: WorkItem, now: Date): boolean {
  return item.claim !== null && Date.parse(item.claim.expiresAt) > now.getTime();
}

export function isLeasedByOther(item: WorkItem, owner: string, now: Date): boolean {
  if (!item.claim || item.claim.owner === owner) return false;
  return hasLiveLease(item, now);
}

export function hasExpiredLease(item: WorkItem, now: Date): boolean {
  return item.claim !== null && Date.parse(item.claim.expiresAt) <= now.getTime();
}

/**
 * Splits loaded items into the two scheduler phases. Terminal items and
 * items leased by another live invocation are left out.
 */
export function selectWork(items: Iterable<WorkItem>, options: { owner: string; now: Date }): WorkSelection {
  const prepare: WorkItem[] = [];
  const publish: WorkItem[] = [];
  const leased: WorkItem[] = [];

  for (const item of items) {
    if (item.status === "Completed" || item.status === "Failed") continue;

    if (isLeasedByOther(item, options.owner, options.now)) {
      leased.push(item);
      continue;
    }

    if (item.status === "Transformed") {
      publish.push(item);
    } else {
      prepare.push(item);
    }
  }

  return {
    prepare: sortByPriority(prepare),
    publish: sortByPriority(publish),
    leased: sortByPriority(leased),
  };
}
