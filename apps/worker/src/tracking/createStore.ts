import { createClient } from "@supabase/supabase-js";

import type { TrackingConfig } from "../config";
import { JsonFileTrackingStore } from "./fileStore";
import { SupabaseTrackingStore } from "./supabaseStore";
import type { TrackingStore } from "./types";

export function createTrackingStore(config: TrackingConfig): TrackingStore {
  if (config.backend === "file") {
    return new JsonFileTrackingStore({ path: config.file });
  }

  if (!config.supabaseUrl || !config.supabaseServiceRoleKey) {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required when TRACKING_BACKEND=supabase");
  }

  const supabase = createClient(config.supabaseUrl, config.supabaseServiceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return new SupabaseTrackingStore(supabase);
}
