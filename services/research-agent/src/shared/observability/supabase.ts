/**
 * Supabase Observability
 * Console output plus the batched events table
 */

import { randomUUID } from "crypto";
import { toRedactedError } from "@sibyl/core";
import { emitEvent, flushEvents, isSupabaseConfigured, type TraceContext } from "@sibyl/db";
import { ConsoleObservability } from "./console.js";
import type {
  IObservability,
  ObservabilityEvent,
  ObservabilityOptions,
  SessionResult,
  StartSessionParams,
} from "./types.js";

export interface SupabaseObservabilityOptions extends ObservabilityOptions {
  /** Recorded with every session */
  systemName?: string;
}

export class SupabaseObservability extends ConsoleObservability {
  private readonly enabled: boolean;
  private readonly systemName?: string;
  private readonly traces = new Map<string, TraceContext>();

  constructor(options: SupabaseObservabilityOptions = {}) {
    super(options);
    this.systemName = options.systemName;
    this.enabled = isSupabaseConfigured();

    if (!this.enabled) {
      this.log("warn", "[Observability] Supabase not configured; events stay on the console");
    }
  }

  override async startSession(params: StartSessionParams): Promise<string> {
    const sessionId = await super.startSession(params);
    const trace: TraceContext = { traceId: params.correlationId, runId: params.correlationId, sessionId };
    this.traces.set(sessionId, trace);

    if (this.enabled) {
      emitEvent("run.started", trace, {
        message: `${params.agentName} started`,
        data: {
          agent_name: params.agentName,
          agent_version: params.agentVersion,
          system: this.systemName ?? params.agentName,
          subject_id: params.targetId,
          ...params.metadata,
        },
      });
    }

    return sessionId;
  }

  override async endSession(sessionId: string, result: SessionResult): Promise<void> {
    await super.endSession(sessionId, result);
    const trace = this.traces.get(sessionId) ?? { traceId: sessionId, sessionId };
    this.traces.delete(sessionId);

    if (!this.enabled) {
      return;
    }

    if (result.success) {
      emitEvent("run.completed", trace, {
        message: "Run completed",
        data: { duration_ms: result.metadata?.durationMs ?? 0, cost_usd: result.metadata?.costUsd ?? 0 },
      });
    } else {
      const error = toRedactedError(result.error);
      emitEvent("run.failed", trace, {
        message: `Run failed: ${error.message}`,
        data: { error_kind: error.kind, error_message: error.message },
        level: "error",
      });
    }

    await flushEvents();
  }

  override async recordEvent(event: ObservabilityEvent): Promise<void> {
    await super.recordEvent(event);

    if (!this.enabled) {
      return;
    }

    emitEvent(
      event.type,
      {
        traceId: event.correlationId ?? randomUUID(),
        runId: event.correlationId,
        sessionId: event.sessionId,
        stepId: event.stepId,
      },
      {
        message: event.type,
        data: { subject_id: event.targetId, system: event.systemName, ...event.data },
        level: event.level ?? "info",
      }
    );
  }
}

export function createSupabaseObservability(options?: SupabaseObservabilityOptions): IObservability {
  return new SupabaseObservability(options);
}
