import {
  errorMessage,
  isStaleWriteError,
  isStoreCorruptError,
  isTerminalStatus,
  logger,
  type DiscoveryCandidate,
  type WorkItem,
} from "@shortloop/shared";

import { hasLiveLease } from "../scheduler/selection";
import type { TrackingStore } from "../tracking/types";

export interface IngestSummary {
  created: number;
  refreshed: number;
  unchanged: number;
  skipped: number;
}

/** A fresh Discovered record for a candidate never seen before. */
export function createWorkItem(candidate: DiscoveryCandidate, now: Date): WorkItem {
  const timestamp = now.toISOString();
  return {
    id: candidate.id,
    title: candidate.title,
    sourceUrl: candidate.sourceUrl,
    priority: candidate.priority,
    status: "Discovered",
    sourceArtifactRef: null,
    segments: [],
    publishedRefs: {},
    retryCount: 0,
    lastError: null,
    claim: null,
    version: 0,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * Records discovery results. Unknown ids become Discovered items; known
 * items that are still in flight get the candidate's priority and title.
 * Terminal items and ids repeated within the batch are left alone. A
 * refresh never touches an item under a live lease: bumping its version
 * would reject the lease holder's commit after its stage already ran.
 */
export async function ingestCandidates(
  store: TrackingStore,
  candidates: readonly DiscoveryCandidate[],
  options: { now?: () => Date } = {},
): Promise<IngestSummary> {
  const now = options.now ?? (() => new Date());
  const summary: IngestSummary = { created: 0, refreshed: 0, unchanged: 0, skipped: 0 };

  const snapshot = await store.load();
  const seen = new Set<string>();

  for (const candidate of candidates) {
    if (seen.has(candidate.id)) continue;
    seen.add(candidate.id);

    if (snapshot.corrupt.some((record) => record.id === candidate.id)) {
      summary.skipped += 1;
      logger.warn("discovery_candidate_corrupt_record", { service: "worker", itemId: candidate.id });
      continue;
    }

    const existing = snapshot.items.get(candidate.id);
    let next: WorkItem;

    if (!existing) {
      next = createWorkItem(candidate, now());
    } else if (
      isTerminalStatus(existing.status) ||
      (existing.priority === candidate.priority && existing.title === candidate.title)
    ) {
      summary.unchanged += 1;
      continue;
    } else if (hasLiveLease(existing, now())) {
      summary.skipped += 1;
      logger.info("discovery_candidate_leased", {
        service: "worker",
        itemId: candidate.id,
        owner: existing.claim?.owner,
      });
      continue;
    } else {
      next = {
        ...existing,
        priority: candidate.priority,
        title: candidate.title,
        updatedAt: now().toISOString(),
      };
    }

    try {
      await store.upsert(next);
      await store.commit();
    } catch (error) {
      if (isStaleWriteError(error) || (isStoreCorruptError(error) && error.itemId !== undefined)) {
        summary.skipped += 1;
        logger.warn("discovery_candidate_skipped", {
          service: "worker",
          itemId: candidate.id,
          error: errorMessage(error),
        });
        continue;
      }
      throw error;
    }

    if (existing) {
      summary.refreshed += 1;
    } else {
      summary.created += 1;
    }
  }

  logger.info("discovery_ingested", { service: "worker", candidates: candidates.length, ...summary });
  return summary;
}
