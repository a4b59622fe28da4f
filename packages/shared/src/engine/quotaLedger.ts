/**
 * Daily quota ledger for the publish stage.
 *
 * The ledger counts abstract cost units against a daily budget. Days are
 * calendar days in a fixed reference timezone and roll over lazily on the
 * first access after midnight; a closed day moves into history and is never
 * rewritten.
 *
 * Usage:
 * ```typescript
 * const ledger = new QuotaLedger({ dailyBudget: 10_000, timeZone: 'America/Los_Angeles' }, snapshot.ledger);
 * if (!ledger.tryReserve(1600)) {
 *   // backpressure: stop publishing for this invocation
 * }
 * ```
 */

import type { QuotaLedgerEntry, QuotaLedgerState } from "../types/tracking";

export const DEFAULT_HISTORY_LIMIT = 90;

export interface QuotaLedgerOptions {
  dailyBudget: number;
  /** IANA timezone whose midnight starts a new quota day */
  timeZone: string;
  now?: () => Date;
  historyLimit?: number;
}

export interface QuotaUsage {
  date: string;
  consumedUnits: number;
  dailyBudget: number;
  remainingUnits: number;
}

/**
 * Per-day change between two ledger states. Stores apply these on top of
 * whatever is persisted so consumption recorded by an overlapping run is kept.
 */
export interface QuotaDelta {
  date: string;
  dailyBudget: number;
  consumedDelta: number;
}

/**
 * Calendar day (YYYY-MM-DD) of `at` in `timeZone`.
 */
export function referenceDay(at: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(at);

  const part = (type: Intl.DateTimeFormatPartTypes): string => {
    const value = parts.find((p) => p.type === type)?.value;
    if (!value) {
      throw new RangeError(`Cannot resolve ${type} of ${at.toISOString()} in ${timeZone}`);
    }
    return value;
  };

  return `${part("year")}-${part("month")}-${part("day")}`;
}

function assertCost(cost: number): void {
  if (!Number.isFinite(cost) || cost < 0) {
    throw new RangeError(`Quota cost must be a non-negative finite number, got ${cost}`);
  }
}

export class QuotaLedger {
  private readonly dailyBudget: number;
  private readonly timeZone: string;
  private readonly now: () => Date;
  private readonly historyLimit: number;
  private current: QuotaLedgerEntry | null;
  private history: QuotaLedgerEntry[];

  constructor(options: QuotaLedgerOptions, state?: QuotaLedgerState) {
    if (!Number.isFinite(options.dailyBudget) || options.dailyBudget < 0) {
      throw new RangeError(`dailyBudget must be a non-negative finite number, got ${options.dailyBudget}`);
    }
    this.dailyBudget = options.dailyBudget;
    this.timeZone = options.timeZone;
    this.now = options.now ?? (() => new Date());
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.current = state?.current ? { ...state.current } : null;
    this.history = (state?.history ?? []).map((entry) => ({ ...entry }));

    // Fails fast on an unknown timezone.
    referenceDay(this.now(), this.timeZone);
  }

  /**
   * Grants and records `cost` units if they fit in today's budget.
   * A denial leaves the ledger untouched.
   */
  tryReserve(cost: number): boolean {
    assertCost(cost);
    const entry = this.rollover();
    if (entry.consumedUnits + cost > entry.dailyBudget) {
      return false;
    }
    entry.consumedUnits += cost;
    return true;
  }

  /**
   * Compensates a reservation whose operation failed. A reservation made on
   * a day that has since closed is left as recorded.
   */
  release(cost: number, date?: string): void {
    assertCost(cost);
    const entry = this.rollover();
    if (date !== undefined && date !== entry.date) {
      return;
    }
    entry.consumedUnits = Math.max(0, entry.consumedUnits - cost);
  }

  /**
   * Marks today's budget as spent, e.g. when the platform itself reports its
   * quota exhausted before the ledger does.
   */
  exhaust(): void {
    const entry = this.rollover();
    entry.consumedUnits = Math.max(entry.consumedUnits, entry.dailyBudget);
  }

  currentUsage(): QuotaUsage {
    const entry = this.rollover();
    return {
      date: entry.date,
      consumedUnits: entry.consumedUnits,
      dailyBudget: entry.dailyBudget,
      remainingUnits: Math.max(0, entry.dailyBudget - entry.consumedUnits),
    };
  }

  snapshot(): QuotaLedgerState {
    return {
      current: this.current ? { ...this.current } : null,
      history: this.history.map((entry) => ({ ...entry })),
    };
  }

  private rollover(): QuotaLedgerEntry {
    const today = referenceDay(this.now(), this.timeZone);
    const current = this.current;

    // A persisted day ahead of the local clock stays current; days never go backwards.
    if (current && current.date >= today) {
      current.dailyBudget = this.dailyBudget;
      return current;
    }

    if (current) {
      this.history.push(current);
      if (this.history.length > this.historyLimit) {
        this.history = this.history.slice(-this.historyLimit);
      }
    }

    const fresh: QuotaLedgerEntry = { date: today, consumedUnits: 0, dailyBudget: this.dailyBudget };
    this.current = fresh;
    return fresh;
  }
}

function entriesByDate(state: QuotaLedgerState): Map<string, QuotaLedgerEntry> {
  const map = new Map<string, QuotaLedgerEntry>();
  for (const entry of state.history) map.set(entry.date, entry);
  if (state.current) map.set(state.current.date, state.current);
  return map;
}

export function diffLedger(base: QuotaLedgerState, staged: QuotaLedgerState): QuotaDelta[] {
  const before = entriesByDate(base);
  const deltas: QuotaDelta[] = [];

  for (const [date, entry] of entriesByDate(staged)) {
    const previous = before.get(date);
    const consumedDelta = entry.consumedUnits - (previous?.consumedUnits ?? 0);
    if (consumedDelta === 0 && (!previous || previous.dailyBudget === entry.dailyBudget)) {
      continue;
    }
    deltas.push({ date, dailyBudget: entry.dailyBudget, consumedDelta });
  }

  return deltas.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

export function applyLedgerDeltas(
  persisted: QuotaLedgerState,
  deltas: readonly QuotaDelta[],
  historyLimit = DEFAULT_HISTORY_LIMIT,
): QuotaLedgerState {
  const entries = entriesByDate(persisted);

  for (const delta of deltas) {
    const existing = entries.get(delta.date);
    entries.set(delta.date, {
      date: delta.date,
      consumedUnits: Math.max(0, (existing?.consumedUnits ?? 0) + delta.consumedDelta),
      dailyBudget: delta.dailyBudget,
    });
  }

  const ordered = [...entries.values()]
    .map((entry) => ({ ...entry }))
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  const current = ordered.pop() ?? null;

  return { current, history: ordered.slice(-historyLimit) };
}
