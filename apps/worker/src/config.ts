/**
 * Worker configuration derived from the shared environment schema.
 *
 * Worker code should take a WorkerConfig instead of reading env directly.
 */
import { getEnv, type Env } from "@shortloop/shared/env";
import type { SegmentPlanOptions } from "@shortloop/shared/engine/segmentPlan";

export interface SchedulerConfig {
  /** Cost units available per reference day */
  dailyBudget: number;
  /** Cost units one publish consumes */
  publishCost: number;
  /** Stage executor invocations allowed per run */
  maxItemsPerRun: number;
  /** Transient failures tolerated before an item is failed */
  retryCeiling: number;
  /** IANA timezone whose midnight resets the quota */
  quotaTimeZone: string;
  /** Lease length for a stage in progress */
  claimTtlSeconds: number;
}

export interface TrackingConfig {
  backend: "file" | "supabase";
  file: string;
  supabaseUrl?: string;
  supabaseServiceRoleKey?: string;
}

export interface DiscoveryConfig {
  channelUrl?: string;
  limit: number;
}

export interface MediaConfig {
  workDir: string;
  segments: SegmentPlanOptions;
}

export interface PublishConfig {
  accessToken?: string;
  visibility: "public" | "unlisted" | "private";
  tags: string[];
}

export interface NotifyConfig {
  /** Set only when both the bot token and the chat id are configured */
  telegram?: { botToken: string; chatId: string };
}

export interface WorkerConfig {
  scheduler: SchedulerConfig;
  tracking: TrackingConfig;
  discovery: DiscoveryConfig;
  media: MediaConfig;
  publish: PublishConfig;
  notify: NotifyConfig;
}

function parseNumber(name: string, raw: string, { min, integer }: { min: number; integer: boolean }): number {
  const parsed = Number(raw.trim());
  if (raw.trim() === "" || !Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  if (integer && !Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  if (parsed < min) {
    throw new Error(`${name} must be >= ${min}, got ${parsed}`);
  }
  return parsed;
}

export function buildWorkerConfig(env: Env): WorkerConfig {
  return {
    scheduler: {
      dailyBudget: parseNumber("DAILY_QUOTA_UNITS", env.DAILY_QUOTA_UNITS, { min: 0, integer: false }),
      publishCost: parseNumber("PUBLISH_COST_UNITS", env.PUBLISH_COST_UNITS, { min: 0, integer: false }),
      maxItemsPerRun: parseNumber("MAX_ITEMS_PER_RUN", env.MAX_ITEMS_PER_RUN, { min: 1, integer: true }),
      retryCeiling: parseNumber("RETRY_CEILING", env.RETRY_CEILING, { min: 0, integer: true }),
      quotaTimeZone: env.QUOTA_TIMEZONE,
      claimTtlSeconds: parseNumber("CLAIM_TTL_SECONDS", env.CLAIM_TTL_SECONDS, { min: 1, integer: true }),
    },
    tracking: {
      backend: env.TRACKING_BACKEND,
      file: env.TRACKING_FILE,
      supabaseUrl: env.SUPABASE_URL,
      supabaseServiceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
    },
    discovery: {
      channelUrl: env.SOURCE_CHANNEL_URL,
      limit: parseNumber("DISCOVERY_LIMIT", env.DISCOVERY_LIMIT, { min: 1, integer: true }),
    },
    media: {
      workDir: env.WORK_DIR,
      segments: {
        segmentDurationSeconds: parseNumber("SEGMENT_DURATION_SECONDS", env.SEGMENT_DURATION_SECONDS, {
          min: 1,
          integer: false,
        }),
        maxSegments: parseNumber("MAX_SEGMENTS_PER_ITEM", env.MAX_SEGMENTS_PER_ITEM, { min: 1, integer: true }),
        minTailSeconds: parseNumber("MIN_TAIL_SECONDS", env.MIN_TAIL_SECONDS, { min: 0, integer: false }),
      },
    },
    publish: {
      accessToken: env.YOUTUBE_ACCESS_TOKEN,
      visibility: env.PUBLISH_VISIBILITY,
      tags: env.PUBLISH_TAGS.split(",")
        .map((tag) => tag.trim())
        .filter((tag) => tag.length > 0),
    },
    notify: {
      telegram:
        env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID
          ? { botToken: env.TELEGRAM_BOT_TOKEN, chatId: env.TELEGRAM_CHAT_ID }
          : undefined,
    },
  };
}

export function loadWorkerConfig(): WorkerConfig {
  return buildWorkerConfig(getEnv());
}
