/**
 * Supabase Client
 * Shared by the run, task-handle and event tables
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { ConfigError, getBaseConfig } from "@sibyl/core";

let client: SupabaseClient | null = null;

/**
 * True when both SUPABASE_URL and SUPABASE_KEY are set
 */
export function isSupabaseConfigured(): boolean {
  return getBaseConfig().supabase !== undefined;
}

export function getSupabase(): SupabaseClient {
  if (client) {
    return client;
  }

  const settings = getBaseConfig().supabase;
  if (!settings) {
    throw new ConfigError("SUPABASE_URL and SUPABASE_KEY must both be set to use the database", {
      variables: ["SUPABASE_URL", "SUPABASE_KEY"],
    });
  }

  // Service key on a server: nothing to persist or refresh
  client = createClient(settings.url, settings.key, {
    auth: { autoRefreshToken: false, persistSession: false },
  });
  return client;
}
