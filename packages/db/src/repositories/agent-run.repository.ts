/**
 * Agent Run Repository
 * Mirror of completed runs in agent_runs; failures are logged, never thrown
 */

import { logger } from "@sibyl/core";
import { getSupabase, isSupabaseConfigured } from "../supabase.js";
import type { AgentRunInsert, AgentRunRow } from "../types.js";

const log = logger.child({ component: "AgentRunRepo" });

export async function create(data: AgentRunInsert): Promise<AgentRunRow | null> {
  if (!isSupabaseConfigured()) return null;

  const { data: run, error } = await getSupabase()
    .from("agent_runs")
    .insert(data)
    .select()
    .single();

  if (error) {
    log.warn("Insert failed", { error: error.message, runId: data.id });
    return null;
  }

  return run;
}

export const agentRunRepo = {
  create,
};
