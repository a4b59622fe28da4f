import util from "util";

import { getEnv } from "../env";

const SECRET_KEY_PATTERNS = [/key/i, /token/i, /secret/i, /password/i, /authorization/i, /bearer/i];
const SECRET_VALUE_PATTERNS = [/\bbearer\s+\S+/i, /\b(token|secret|password|api_key)=\S+/i];

type LogLevel = "info" | "warn" | "error";

type Primitive = string | number | boolean | null | undefined;
type Redactable = Primitive | Redactable[] | { [key: string]: Redactable };

type NormalisedEntry = {
  ts: string;
  service: string;
  event: string;
  itemId?: string;
  runId?: string;
  message?: string;
  error?: string;
  meta: Record<string, unknown>;
  level: LogLevel;
  force: boolean;
};

type LogObserverPayload = {
  level: LogLevel;
  entry: Omit<NormalisedEntry, "level" | "force">;
};

type LogObserver = (payload: LogObserverPayload) => void;

const observers = new Set<LogObserver>();

let sampleRate: number | null = null;

function getSampleRate(): number {
  if (sampleRate !== null) return sampleRate;
  const rate = Number(getEnv().LOG_SAMPLE_RATE);
  sampleRate = !Number.isFinite(rate) || rate <= 0 ? 0 : Math.min(rate, 1);
  return sampleRate;
}

function toRedactable(value: unknown): Redactable {
  if (value === null || value === undefined) return value;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) return value.message;
  if (Array.isArray(value)) return value.map((item) => toRedactable(item));
  if (value instanceof Map) return toRedactable(Object.fromEntries(value));
  if (typeof value === "object") {
    const out: Record<string, Redactable> = {};
    for (const [key, child] of Object.entries(value)) {
      out[key] = toRedactable(child);
    }
    return out;
  }
  return String(value);
}

function redact(value: Redactable, keyHint?: string): Redactable {
  if (Array.isArray(value)) {
    return value.map((item) => redact(item));
  }

  if (typeof value === "string") {
    if (keyHint === "event" || keyHint === "service") {
      return value;
    }
    if (SECRET_VALUE_PATTERNS.some((pattern) => pattern.test(value))) {
      return "[REDACTED]";
    }
    return value;
  }

  if (value && typeof value === "object") {
    const out: Record<string, Redactable> = {};
    for (const [key, child] of Object.entries(value)) {
      if (SECRET_KEY_PATTERNS.some((pattern) => pattern.test(key))) {
        out[key] = "[REDACTED]";
      } else {
        out[key] = redact(child, key);
      }
    }
    return out;
  }

  return value;
}

export interface LogEntry {
  service?: "worker" | "cli" | "shared" | string;
  event: string;
  ts?: string;
  itemId?: string;
  runId?: string;
  message?: string;
  error?: string;
  meta?: Record<string, unknown>;
  level?: LogLevel;
  force?: boolean;
}

function normaliseEntry(entry: LogEntry): NormalisedEntry {
  const event = entry.event;
  const lowered = event.toLowerCase();
  const level = entry.level ?? (lowered.includes("error") || lowered.includes("fail") ? "error" : "info");

  return {
    ts: entry.ts ?? new Date().toISOString(),
    service: entry.service ?? "shared",
    event,
    itemId: entry.itemId,
    runId: entry.runId,
    message: entry.message,
    error: entry.error,
    meta: entry.meta ?? {},
    level,
    force: Boolean(entry.force),
  };
}

function shouldSample(level: LogLevel, force: boolean): boolean {
  if (force) return true;
  if (level !== "info") return true;
  const rate = getSampleRate();
  if (rate >= 1) return true;
  if (rate <= 0) return false;
  return Math.random() < rate;
}

function sanitise(entry: Omit<NormalisedEntry, "level" | "force">): Omit<NormalisedEntry, "level" | "force"> {
  const meta = redact(toRedactable(entry.meta));
  return {
    ts: entry.ts,
    service: entry.service,
    event: entry.event,
    itemId: entry.itemId,
    runId: entry.runId,
    message: entry.message === undefined ? undefined : String(redact(entry.message)),
    error: entry.error === undefined ? undefined : String(redact(entry.error)),
    meta: meta && typeof meta === "object" && !Array.isArray(meta) ? meta : {},
  };
}

export function log(entry: LogEntry): void {
  const { level, force, ...rest } = normaliseEntry(entry);

  if (!shouldSample(level, force)) {
    return;
  }

  const safe = sanitise(rest);

  const output: Record<string, unknown> = {
    ts: safe.ts,
    level,
    service: safe.service,
    event: safe.event,
    itemId: safe.itemId,
    runId: safe.runId,
    message: safe.message,
    error: safe.error,
    meta: Object.keys(safe.meta).length > 0 ? safe.meta : undefined,
  };

  const line = JSON.stringify(output);

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }

  for (const observer of observers) {
    try {
      observer({ level, entry: safe });
    } catch (observerError) {
      console.error(`log observer failed: ${observerError instanceof Error ? observerError.message : String(observerError)}`);
    }
  }
}

function readString(context: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = context[key];
    if (typeof value === "string") return value;
  }
  return undefined;
}

const KNOWN_KEYS = new Set(["service", "itemId", "item_id", "runId", "run_id", "message", "error"]);

function legacyLog(level: LogLevel, event: string, context?: Record<string, unknown>, meta?: unknown) {
  const ctx = context ?? {};
  const mergedMeta: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(ctx)) {
    if (!KNOWN_KEYS.has(key)) mergedMeta[key] = value;
  }

  if (meta && typeof meta === "object" && !Array.isArray(meta)) {
    Object.assign(mergedMeta, meta);
  } else if (meta !== undefined) {
    mergedMeta.payload = meta;
  }

  const rawError = ctx.error;

  log({
    service: readString(ctx, "service") ?? "shared",
    event,
    itemId: readString(ctx, "itemId", "item_id"),
    runId: readString(ctx, "runId", "run_id"),
    message: readString(ctx, "message"),
    error: rawError instanceof Error ? rawError.message : readString(ctx, "error"),
    meta: Object.keys(mergedMeta).length > 0 ? mergedMeta : undefined,
    level,
    force: level !== "info",
  });
}

export const logger = {
  info: (event: string, context?: Record<string, unknown>, meta?: unknown) =>
    legacyLog("info", event, context, meta),
  warn: (event: string, context?: Record<string, unknown>, meta?: unknown) =>
    legacyLog("warn", event, context, meta),
  error: (event: string, context?: Record<string, unknown>, meta?: unknown) =>
    legacyLog("error", event, context, meta),
};

export type Logger = typeof logger;

export function pretty(value: unknown): string {
  return util.inspect(value, { depth: 6, colors: true });
}

export function onLog(observer: LogObserver): () => void {
  observers.add(observer);
  return () => {
    observers.delete(observer);
  };
}

// For testing: re-read LOG_SAMPLE_RATE on the next log call
export function resetLogSampling(): void {
  sampleRate = null;
}

export type { LogObserverPayload, LogLevel };
