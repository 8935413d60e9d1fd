/**
 * Console Observability
 * Sessions, events and metrics through the shared logger (stderr, secrets redacted)
 */

import { randomUUID } from "crypto";
import { logger, toRedactedError, type LogLevel } from "@sibyl/core";
import type {
  IObservability,
  ObservabilityEvent,
  ObservabilityOptions,
  SessionResult,
  StartSessionParams,
} from "./types.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class ConsoleObservability implements IObservability {
  private readonly minRank: number;
  private readonly enabled: boolean;
  private readonly onEvent?: (event: ObservabilityEvent) => void;

  constructor(options: ObservabilityOptions = {}) {
    this.minRank = LEVEL_RANK[options.logLevel ?? "info"];
    this.enabled = options.console ?? true;
    this.onEvent = options.onEvent;
  }

  async startSession(params: StartSessionParams): Promise<string> {
    const sessionId = randomUUID();

    this.log("info", `[${params.agentName}] Session started`, {
      sessionId,
      runId: params.correlationId,
      subjectId: params.targetId,
      version: params.agentVersion,
    });

    return sessionId;
  }

  async endSession(sessionId: string, result: SessionResult): Promise<void> {
    if (result.success) {
      this.log("info", "Session completed", {
        sessionId,
        durationMs: result.metadata?.durationMs,
        costUsd: result.metadata?.costUsd,
      });
      return;
    }

    const error = toRedactedError(result.error);
    this.log("error", "Session failed", { sessionId, kind: error.kind, error: error.message });
  }

  async recordEvent(event: ObservabilityEvent): Promise<void> {
    this.log(event.level ?? "debug", `[Event] ${event.type}`, {
      runId: event.correlationId,
      stepId: event.stepId,
      subjectId: event.targetId,
      ...event.data,
    });

    this.onEvent?.(event);
  }

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled || LEVEL_RANK[level] < this.minRank) {
      return;
    }

    if (level === "error") {
      logger.error(message, undefined, data);
    } else {
      logger[level](message, data);
    }
  }

  metric(name: string, value: number, tags?: Record<string, string>): void {
    if (this.enabled) {
      logger.metric(name, value, tags);
    }
  }
}

/**
 * Drops everything (tests)
 */
export class NoOpObservability implements IObservability {
  async startSession(): Promise<string> {
    return randomUUID();
  }

  async endSession(): Promise<void> {
    // No-op
  }

  async recordEvent(): Promise<void> {
    // No-op
  }

  log(): void {
    // No-op
  }

  metric(): void {
    // No-op
  }
}
