/**
 * Task Handle Repository
 * Durable records of in-flight deep research tasks (deep_task_handles table)
 *
 * Unlike the run repository, every failure here throws: a handle that was not
 * persisted must never be treated as persisted.
 */

import { SibylError } from "@sibyl/core";
import { getSupabase } from "../supabase.js";
import type { DeepTaskHandleRow, DeepTaskHandleUpsert } from "../types.js";

const TABLE = "deep_task_handles";

function dbError(operation: string, message: string): SibylError {
  return new SibylError(`${TABLE} ${operation} failed: ${message}`, "DB_ERROR", {
    retryable: true,
    context: { table: TABLE, operation },
  });
}

export async function upsert(data: DeepTaskHandleUpsert): Promise<void> {
  const supabase = getSupabase();
  const { error } = await supabase
    .from(TABLE)
    .upsert({ ...data, updated_at: data.updated_at ?? new Date().toISOString() }, { onConflict: "key" });

  if (error) {
    throw dbError("upsert", error.message);
  }
}

export async function get(key: string): Promise<DeepTaskHandleRow | null> {
  const supabase = getSupabase();
  const { data, error } = await supabase
    .from(TABLE)
    .select()
    .eq("key", key)
    .maybeSingle();

  if (error) {
    throw dbError("get", error.message);
  }

  return data;
}

export async function list(keyPrefix?: string): Promise<DeepTaskHandleRow[]> {
  const supabase = getSupabase();
  const base = supabase.from(TABLE).select();
  const filtered = keyPrefix ? base.like("key", `${keyPrefix}%`) : base;
  const { data, error } = await filtered.order("created_at", { ascending: true });

  if (error) {
    throw dbError("list", error.message);
  }

  return data ?? [];
}

export async function remove(key: string): Promise<boolean> {
  const supabase = getSupabase();
  const { data, error } = await supabase
    .from(TABLE)
    .delete()
    .eq("key", key)
    .select("key");

  if (error) {
    throw dbError("delete", error.message);
  }

  return (data ?? []).length > 0;
}

export const taskHandleRepo = {
  upsert,
  get,
  list,
  remove,
};
