/**
 * Event Log
 * Buffers observability events and inserts them into the events table in batches
 */

import { logger } from "@sibyl/core";
import { getSupabase, isSupabaseConfigured } from "./supabase.js";
import { getEventCategory, type EventInsert, type EventLevel, type TraceContext } from "./types.js";

const log = logger.child({ component: "EventLog" });

export interface EventRow extends EventInsert {
  timestamp: string;
}

/** Resolves with the insert error, if any; may also throw */
export type EventSink = (rows: EventRow[]) => Promise<{ error: { message: string } | null }>;

export interface EventLogOptions {
  sink: EventSink;
  batchIntervalMs?: number;
  maxBatchSize?: number;
  maxAttempts?: number;
  /** First retry delay; doubles per attempt */
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class EventLog {
  private pending: EventRow[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;

  private readonly sink: EventSink;
  private readonly batchIntervalMs: number;
  private readonly maxBatchSize: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: EventLogOptions) {
    this.sink = options.sink;
    this.batchIntervalMs = options.batchIntervalMs ?? 100;
    this.maxBatchSize = options.maxBatchSize ?? 100;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 100;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  append(row: EventRow): void {
    this.pending.push(row);

    if (this.pending.length >= this.maxBatchSize) {
      this.flushInBackground();
      return;
    }

    if (!this.timer) {
      this.timer = setTimeout(() => {
        this.timer = null;
        this.flushInBackground();
      }, this.batchIntervalMs);
      this.timer.unref();
    }
  }

  /**
   * Write everything buffered so far. Waits for a write already in flight first.
   */
  async flush(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    while (this.inFlight) {
      await this.inFlight;
    }
    if (this.pending.length === 0) {
      return;
    }

    const batch = this.pending;
    this.pending = [];
    this.inFlight = this.write(batch);
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private flushInBackground(): void {
    this.flush().catch((error: unknown) => log.error("Event flush failed", error));
  }

  private async write(batch: EventRow[]): Promise<void> {
    for (let attempt = 1; ; attempt++) {
      let failure: string;
      try {
        const { error } = await this.sink(batch);
        if (!error) return;
        failure = error.message;
      } catch (error) {
        failure = error instanceof Error ? error.message : String(error);
      }

      if (attempt >= this.maxAttempts) {
        log.warn("Dropping events after failed inserts", { error: failure, dropped: batch.length, attempts: attempt });
        return;
      }
      await this.sleep(this.retryDelayMs * 2 ** (attempt - 1));
    }
  }
}

// ============================================================
// Process-wide log over the events table
// ============================================================

let eventLog: EventLog | null = null;

const supabaseSink: EventSink = async (rows) => {
  const { error } = await getSupabase().from("events").insert(rows);
  return { error };
};

/**
 * No-op unless Supabase is configured
 */
export function emitEvent(
  eventType: string,
  context: TraceContext,
  options: { message?: string; data?: Record<string, unknown>; level?: EventLevel } = {}
): void {
  if (!isSupabaseConfigured()) return;

  if (!eventLog) {
    eventLog = new EventLog({ sink: supabaseSink });
  }
  eventLog.append({
    trace_id: context.traceId,
    run_id: context.runId,
    session_id: context.sessionId,
    step_id: context.stepId,
    event_type: eventType,
    event_source: getEventCategory(eventType),
    level: options.level ?? "info",
    message: options.message,
    payload: options.data ?? {},
    timestamp: new Date().toISOString(),
  });
}

export async function flushEvents(): Promise<void> {
  await eventLog?.flush();
}

/**
 * Flush and drop the process-wide log; call before exit
 */
export async function shutdownEventStore(): Promise<void> {
  await flushEvents();
  eventLog = null;
}
