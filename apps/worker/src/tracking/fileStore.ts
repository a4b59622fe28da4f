import { mkdir, open, readFile, rename, stat, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";

import {
  applyLedgerDeltas,
  DEFAULT_HISTORY_LIMIT,
  describeZodIssues,
  deserializeLedger,
  diffLedger,
  FatalStoreError,
  logger,
  parseWorkItem,
  serializeLedger,
  serializeWorkItem,
  StaleWriteError,
  StoreCorruptError,
  TRACKING_SCHEMA_VERSION,
  TrackingDocumentSchema,
  type CorruptRecord,
  type QuotaLedgerState,
  type TrackingDocument,
  type TrackingSnapshot,
  type WorkItem,
} from "@shortloop/shared";

import type { TrackingStore } from "./types";

export interface JsonFileTrackingStoreOptions {
  path: string;
  historyLimit?: number;
  /** How long commit waits for another process to release the lock */
  lockTimeoutMs?: number;
  /** A lock file older than this is assumed to belong to a crashed process */
  staleLockMs?: number;
}

const LOCK_POLL_MS = 50;

function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function emptyDocument(): TrackingDocument {
  return { schemaVersion: TRACKING_SCHEMA_VERSION, items: {}, quotaLedger: null };
}

function cloneLedger(state: QuotaLedgerState): QuotaLedgerState {
  return {
    current: state.current ? { ...state.current } : null,
    history: state.history.map((entry) => ({ ...entry })),
  };
}

function versionOf(id: string, raw: unknown): number | null {
  const parsed = parseWorkItem(id, raw);
  return parsed.ok ? parsed.item.version : null;
}

/**
 * Tracking store backed by a single JSON document.
 *
 * Commits take an exclusive lock file beside the document, re-check every
 * staged version against disk and replace the document with a rename, so a
 * crash leaves either the old or the new document and never a partial one.
 */
export class JsonFileTrackingStore implements TrackingStore {
  private readonly path: string;
  private readonly lockPath: string;
  private readonly historyLimit: number;
  private readonly lockTimeoutMs: number;
  private readonly staleLockMs: number;

  private readonly staged = new Map<string, WorkItem>();
  private baseLedger: QuotaLedgerState = { current: null, history: [] };
  private stagedLedger: QuotaLedgerState | null = null;

  constructor(options: JsonFileTrackingStoreOptions) {
    this.path = options.path;
    this.lockPath = `${options.path}.lock`;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.lockTimeoutMs = options.lockTimeoutMs ?? 10_000;
    this.staleLockMs = options.staleLockMs ?? 60_000;
  }

  async load(): Promise<TrackingSnapshot> {
    const document = await this.readDocument();

    const items = new Map<string, WorkItem>();
    const corrupt: CorruptRecord[] = [];
    for (const [id, raw] of Object.entries(document.items)) {
      const parsed = parseWorkItem(id, raw);
      if (parsed.ok) {
        items.set(id, parsed.item);
      } else {
        corrupt.push(parsed.corrupt);
      }
    }

    const ledger = deserializeLedger(document.quotaLedger);
    this.baseLedger = cloneLedger(ledger);
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
      const document = await this.readDocument();
      const raw = document.items[item.id];
      if (raw === undefined) {
        current = null;
      } else {
        current = versionOf(item.id, raw);
        if (current === null) {
          throw new StoreCorruptError(`Record ${item.id} cannot be parsed`, { itemId: item.id });
        }
      }
    }

    if (item.version !== (current ?? 0)) {
      throw new StaleWriteError(item.id, item.version, current);
    }

    const next: WorkItem = { ...item, version: item.version + 1 };
    this.staged.set(item.id, next);
    return next;
  }

  stageLedger(state: QuotaLedgerState): void {
    this.stagedLedger = cloneLedger(state);
  }

  async commit(): Promise<void> {
    if (this.staged.size === 0 && this.stagedLedger === null) {
      return;
    }

    const staged = [...this.staged.values()];
    const stagedLedger = this.stagedLedger;
    const deltas = stagedLedger ? diffLedger(this.baseLedger, stagedLedger) : [];
    this.staged.clear();
    this.stagedLedger = null;

    if (staged.length === 0 && deltas.length === 0) {
      return;
    }

    await this.withLock(async () => {
      const document = await this.readDocument();

      let conflict: StaleWriteError | null = null;
      for (const item of staged) {
        const raw = document.items[item.id];
        const onDisk = raw === undefined ? 0 : versionOf(item.id, raw);
        if (onDisk !== item.version - 1) {
          conflict = new StaleWriteError(item.id, item.version - 1, onDisk);
          break;
        }
      }

      // Items go in all together or not at all; ledger consumption is kept either way.
      if (!conflict) {
        for (const item of staged) {
          document.items[item.id] = serializeWorkItem(item);
        }
      }

      if (deltas.length > 0) {
        const merged = applyLedgerDeltas(deserializeLedger(document.quotaLedger), deltas, this.historyLimit);
        document.quotaLedger = serializeLedger(merged);
      }

      await this.writeDocument(document);

      if (stagedLedger) {
        this.baseLedger = stagedLedger;
      }

      if (conflict) {
        throw conflict;
      }
    });
  }

  private async readDocument(): Promise<TrackingDocument> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return emptyDocument();
      }
      throw new FatalStoreError(`Cannot read tracking file ${this.path}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new StoreCorruptError(`Tracking file ${this.path} is not valid JSON`, { cause: error });
    }

    const result = TrackingDocumentSchema.safeParse(json);
    if (!result.success) {
      throw new StoreCorruptError(
        `Tracking file ${this.path} has an unexpected layout: ${describeZodIssues(result.error)}`,
      );
    }
    return result.data;
  }

  private async writeDocument(document: TrackingDocument): Promise<void> {
    const tempPath = `${this.path}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      const handle = await open(tempPath, "w");
      try {
        await handle.writeFile(`${JSON.stringify(document, null, 2)}\n`, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, this.path);
    } catch (error) {
      throw new FatalStoreError(`Cannot write tracking file ${this.path}`, { cause: error });
    }
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquireLock();
    try {
      return await fn();
    } finally {
      await this.releaseLock();
    }
  }

  private async acquireLock(): Promise<void> {
    const deadline = Date.now() + this.lockTimeoutMs;
    await mkdir(dirname(this.lockPath), { recursive: true }).catch((error: unknown) => {
      throw new FatalStoreError(`Cannot create directory for ${this.lockPath}`, { cause: error });
    });

    for (;;) {
      try {
        const handle = await open(this.lockPath, "wx");
        await handle.writeFile(`${process.pid}\n`, "utf8");
        await handle.close();
        return;
      } catch (error) {
        if (errnoCode(error) !== "EEXIST") {
          throw new FatalStoreError(`Cannot create lock file ${this.lockPath}`, { cause: error });
        }
      }

      if (await this.lockIsStale()) {
        logger.warn("tracking_lock_stale", { service: "worker", lockPath: this.lockPath });
        await this.removeLock();
        continue;
      }

      if (Date.now() >= deadline) {
        throw new FatalStoreError(`Timed out waiting for lock ${this.lockPath}`);
      }
      await sleep(LOCK_POLL_MS);
    }
  }

  private async lockIsStale(): Promise<boolean> {
    try {
      const info = await stat(this.lockPath);
      return Date.now() - info.mtimeMs > this.staleLockMs;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return false;
      }
      throw new FatalStoreError(`Cannot inspect lock file ${this.lockPath}`, { cause: error });
    }
  }

  private async releaseLock(): Promise<void> {
    try {
      await this.removeLock();
    } catch (error) {
      logger.warn("tracking_lock_release_failed", {
        service: "worker",
        lockPath: this.lockPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async removeLock(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        throw error;
      }
    }
  }
}
