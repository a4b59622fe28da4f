/**
 * Lifecycle records persisted by the tracking store.
 */

export type WorkItemStatus = "Discovered" | "Fetched" | "Transformed" | "Completed" | "Failed";

export interface SourceRange {
  /** Offset into the source, in seconds */
  start: number;
  /** Length of the segment, in seconds */
  duration: number;
}

export interface Segment {
  /** 1-based, contiguous */
  index: number;
  sourceRange: SourceRange;
  /** Opaque handle produced by the transform collaborator */
  localArtifactRef: string;
}

/** Segment index → remote id. Append-only. */
export type PublishedRefs = Record<number, string>;

/** Lease held by one invocation while a stage runs for the item. */
export interface ItemClaim {
  owner: string;
  expiresAt: string;
}

export interface WorkItem {
  id: string;
  title: string;
  sourceUrl: string;
  priority: number;
  status: WorkItemStatus;
  sourceArtifactRef: string | null;
  segments: Segment[];
  publishedRefs: PublishedRefs;
  retryCount: number;
  lastError: string | null;
  claim: ItemClaim | null;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface QuotaLedgerEntry {
  /** YYYY-MM-DD in the ledger's reference timezone */
  date: string;
  consumedUnits: number;
  dailyBudget: number;
}

export interface QuotaLedgerState {
  current: QuotaLedgerEntry | null;
  /** Closed days, oldest first */
  history: QuotaLedgerEntry[];
}

export interface CorruptRecord {
  id: string;
  error: string;
}

export interface TrackingSnapshot {
  items: Map<string, WorkItem>;
  ledger: QuotaLedgerState;
  corrupt: CorruptRecord[];
}

/** Candidate produced by the discovery collaborator. */
export interface DiscoveryCandidate {
  id: string;
  priority: number;
  title: string;
  sourceUrl: string;
}
