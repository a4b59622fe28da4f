import type { QuotaLedgerState, TrackingSnapshot, WorkItem } from "@shortloop/shared";

/**
 * Durable record of every work item plus the quota ledger.
 *
 * Writes are staged with `upsert` / `stageLedger` and become visible to
 * other processes only on `commit`, which applies them together.
 */
export interface TrackingStore {
  /**
   * Reads every record. Unreadable records are reported in `corrupt`
   * rather than failing the load.
   *
   * @throws StoreCorruptError when the store as a whole cannot be parsed
   * @throws FatalStoreError when the store cannot be reached
   */
  load(): Promise<TrackingSnapshot>;

  /**
   * Stages a new version of `item`. `item.version` must equal the version
   * last read (0 for a new item); the staged copy carries version + 1.
   *
   * @throws StaleWriteError when the record changed since it was read
   */
  upsert(item: WorkItem): Promise<WorkItem>;

  /** Stages the ledger state to persist with the next commit. */
  stageLedger(state: QuotaLedgerState): void;

  /** Persists everything staged since the previous commit. */
  commit(): Promise<void>;
}
