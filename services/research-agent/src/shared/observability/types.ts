/**
 * Observability Types
 * Sessions, events and metrics for orchestrator runs and agent calls
 */

import type { LogLevel } from "@sibyl/core";

export type { LogLevel };

export interface IObservability {
  /** One orchestrator run or one agent call; resolves to the session id */
  startSession(params: StartSessionParams): Promise<string>;
  endSession(sessionId: string, result: SessionResult): Promise<void>;
  recordEvent(event: ObservabilityEvent): Promise<void>;
  log(level: LogLevel, message: string, data?: Record<string, unknown>): void;
  metric(name: string, value: number, tags?: Record<string, string>): void;
}

export interface StartSessionParams {
  agentName: string;
  agentVersion: string;
  /** The run id */
  correlationId: string;
  /** Subject being researched */
  targetId?: string;
  metadata?: Record<string, unknown>;
}

export interface SessionResult {
  success: boolean;
  /** Redacted before it is written anywhere */
  error?: unknown;
  metadata?: {
    durationMs?: number;
    costUsd?: number;
    [key: string]: unknown;
  };
}

/**
 * Dotted, category first: run.state_changed, step.completed, step.failed,
 * step.skipped, task.created, task.adopted, task.recovered, task.lost,
 * escalation.decided, critic.completed
 */
export type EventType = string;

export interface ObservabilityEvent {
  type: EventType;
  /** The run id */
  correlationId?: string;
  sessionId?: string;
  stepId?: string;
  systemName?: string;
  /** Subject being researched */
  targetId?: string;
  /** debug when omitted */
  level?: LogLevel;
  data?: Record<string, unknown>;
}

export interface ObservabilityOptions {
  /** Minimum level written to the console */
  logLevel?: LogLevel;
  console?: boolean;
  /** Called with every recorded event */
  onEvent?: (event: ObservabilityEvent) => void;
}
