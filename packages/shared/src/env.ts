import { z } from "zod";

/**
 * Centralized, type-safe environment variable schema for Shortloop.
 * This is the single source of truth for all environment variables.
 *
 * Code should import from this module instead of accessing process.env directly.
 */
const EnvSchema = z.object({
  // ─── Core ────────────────────────────────────────────────
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),

  // ─── Tracking store ──────────────────────────────────────
  TRACKING_BACKEND: z.enum(["file", "supabase"]).default("file"),
  TRACKING_FILE: z.string().min(1).default("./data/tracking.json"),
  SUPABASE_URL: z.string().url({ message: "SUPABASE_URL must be a valid URL" }).optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(20, "SUPABASE_SERVICE_ROLE_KEY missing or too short").optional(),

  // ─── Scheduling & quota ──────────────────────────────────
  DAILY_QUOTA_UNITS: z.string().default("10000"),
  PUBLISH_COST_UNITS: z.string().default("1600"),
  MAX_ITEMS_PER_RUN: z.string().default("5"),
  RETRY_CEILING: z.string().default("3"),
  QUOTA_TIMEZONE: z.string().min(1).default("America/Los_Angeles"),
  CLAIM_TTL_SECONDS: z.string().default("3600"),

  // ─── Collaborators ───────────────────────────────────────
  SOURCE_CHANNEL_URL: z.string().url().optional(),
  DISCOVERY_LIMIT: z.string().default("50"),
  WORK_DIR: z.string().min(1).default("./work"),
  SEGMENT_DURATION_SECONDS: z.string().default("60"),
  MAX_SEGMENTS_PER_ITEM: z.string().default("10"),
  MIN_TAIL_SECONDS: z.string().default("10"),
  YOUTUBE_ACCESS_TOKEN: z.string().optional(),
  PUBLISH_VISIBILITY: z.enum(["public", "unlisted", "private"]).default("public"),
  PUBLISH_TAGS: z.string().default("shorts"),

  // ─── Notifications (optional) ────────────────────────────
  TELEGRAM_BOT_TOKEN: z.string().min(1).optional(),
  TELEGRAM_CHAT_ID: z.string().min(1).optional(),

  // ─── Observability ───────────────────────────────────────
  LOG_SAMPLE_RATE: z.string().default("1"),
  SENTRY_DSN: z.string().default(""),
});

export type Env = z.infer<typeof EnvSchema>;

// Export the schema for testing purposes
export { EnvSchema };

let cached: Env | null = null;

/**
 * Empty strings in a .env file mean "unset" for optional values.
 */
function preprocessEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const processed: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === "" && key !== "SENTRY_DSN") continue;
    processed[key] = value;
  }
  return processed;
}

function loadEnvFromProcess(): Env {
  try {
    return EnvSchema.parse(preprocessEnv(process.env));
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues
        .map((issue) => {
          const path = issue.path.join(".");
          return `${path}: ${issue.message}`;
        })
        .join("\n  ");
      throw new Error(
        `Environment variable validation failed:\n  ${issues}\n\n` +
          "Please check your .env file or environment configuration.",
      );
    }
    throw error;
  }
}

/**
 * Get the parsed environment variables.
 * In test mode (NODE_ENV === "test") this always reads fresh from process.env
 * so tests can set variables dynamically; elsewhere the first parse is cached.
 *
 * @throws {Error} If required env vars are missing or invalid
 */
export function getEnv(): Env {
  if (process.env.NODE_ENV === "test") {
    return loadEnvFromProcess();
  }

  if (cached) return cached;

  cached = loadEnvFromProcess();
  return cached;
}

// For testing: clear cache to allow env changes
export function clearEnvCache(): void {
  cached = null;
}
