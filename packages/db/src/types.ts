/**
 * Database Types
 * Rows for the durable task-handle table, run records and the event log
 */

// ============================================================
// STATUS TYPES
// ============================================================

export type TaskHandleStatus = "pending" | "running" | "completed" | "failed" | "canceled";

export type AgentRunStatus = "completed" | "failed";

export type EventLevel = "debug" | "info" | "warn" | "error";

// ============================================================
// ROW TYPES (what you get from database)
// ============================================================

export interface DeepTaskHandleRow {
  key: string;
  run_id: string;
  step_id: string;
  subject_id: string;
  external_task_id: string;
  fingerprint: string;
  status: TaskHandleStatus;
  created_at: string;
  updated_at: string;
}

export interface AgentRunRow {
  id: string;
  subject_id: string;
  mode: string;
  status: AgentRunStatus;
  escalated: boolean;
  verification_passed: boolean;
  predicted_probability: number | null;
  market_probability: number | null;
  confidence: string | null;
  total_cost_usd: number;
  budget_ceiling_usd: number;
  budget_exhausted: boolean;
  result: Record<string, unknown>;
  content_hash: string;
  error_kind: string | null;
  error_message: string | null;
  created_at: string;
}

// ============================================================
// INSERT TYPES
// ============================================================

export interface DeepTaskHandleUpsert {
  key: string;
  run_id: string;
  step_id: string;
  subject_id: string;
  external_task_id: string;
  fingerprint: string;
  status: TaskHandleStatus;
  created_at: string;
  updated_at?: string;
}

export interface AgentRunInsert {
  id: string;
  subject_id: string;
  mode: string;
  status: AgentRunStatus;
  escalated: boolean;
  verification_passed: boolean;
  predicted_probability?: number | null;
  market_probability?: number | null;
  confidence?: string | null;
  total_cost_usd: number;
  budget_ceiling_usd: number;
  budget_exhausted: boolean;
  result: Record<string, unknown>;
  content_hash: string;
  error_kind?: string | null;
  error_message?: string | null;
}

export interface EventInsert {
  trace_id?: string;
  run_id?: string;
  session_id?: string;
  step_id?: string;
  event_type: string;
  event_source?: string;
  level?: EventLevel;
  message?: string;
  payload?: Record<string, unknown>;
}

// ============================================================
// CONTEXT TYPES
// ============================================================

export interface TraceContext {
  traceId: string;
  runId?: string;
  sessionId?: string;
  stepId?: string;
}

// ============================================================
// HELPER FUNCTIONS
// ============================================================

/**
 * "run.started" -> "run"
 */
export function getEventCategory(eventType: string): string {
  const [category] = eventType.split(".");
  return category || "unknown";
}
