/**
 * @sibyl/db
 * Supabase tables behind the research agent: run records, deep-task handles and the event log
 */

export { getSupabase, isSupabaseConfigured } from "./supabase.js";

export * from "./types.js";

export { taskHandleRepo, agentRunRepo } from "./repositories/index.js";

export {
  EventLog,
  emitEvent,
  flushEvents,
  shutdownEventStore,
  type EventLogOptions,
  type EventRow,
  type EventSink,
} from "./event-store.js";
