/** Error taxonomy shared by the tracking store, scheduler and stage executors */

export type StageFailureKind = "transient" | "permanent" | "quota";

/**
 * Raised by a stage executor. The scheduler only looks at `kind`:
 * transient failures are retried up to the retry ceiling, permanent ones
 * fail the item immediately, and quota means the platform refused for
 * budget reasons (handled like a ledger denial, not counted as a failure).
 */
export class StageFailure extends Error {
  readonly code = "STAGE_FAILURE";
  readonly kind: StageFailureKind;
  readonly details?: unknown;

  constructor(kind: StageFailureKind, message: string, options?: { cause?: unknown; details?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "StageFailure";
    this.kind = kind;
    this.details = options?.details;
  }
}

export const transientFailure = (message: string, cause?: unknown) =>
  new StageFailure("transient", message, { cause });
export const permanentFailure = (message: string, cause?: unknown) =>
  new StageFailure("permanent", message, { cause });
export const quotaFailure = (message: string, cause?: unknown) =>
  new StageFailure("quota", message, { cause });

export function isStageFailure(error: unknown): error is StageFailure {
  return error instanceof StageFailure;
}

/**
 * The persisted tracking state (or one record of it) cannot be parsed.
 * `itemId` is set when only a single record is affected.
 */
export class StoreCorruptError extends Error {
  readonly code = "STORE_CORRUPT";
  readonly itemId?: string;

  constructor(message: string, options?: { itemId?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "StoreCorruptError";
    this.itemId = options?.itemId;
  }
}

/**
 * A record was changed by someone else since it was loaded.
 */
export class StaleWriteError extends Error {
  readonly code = "STALE_WRITE";
  readonly itemId: string;
  readonly expectedVersion: number;
  readonly actualVersion: number | null;

  constructor(itemId: string, expectedVersion: number, actualVersion: number | null) {
    super(
      `Stale write for item ${itemId}: expected version ${expectedVersion}, found ${actualVersion ?? "none"}`,
    );
    this.name = "StaleWriteError";
    this.itemId = itemId;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

/**
 * The store as a whole is unreachable or unwritable. Aborts the run.
 */
export class FatalStoreError extends Error {
  readonly code = "FATAL_STORE";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "FatalStoreError";
  }
}

export function isStaleWriteError(error: unknown): error is StaleWriteError {
  return error instanceof StaleWriteError;
}

export function isStoreCorruptError(error: unknown): error is StoreCorruptError {
  return error instanceof StoreCorruptError;
}

export function isFatalStoreError(error: unknown): error is FatalStoreError {
  return error instanceof FatalStoreError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
