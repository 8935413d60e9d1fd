/**
 * Executor Types
 * The model call behind every agent; swapped for a fake in tests
 */

import type { AgentProfile, TokenUsage } from "../agent/types.js";

export interface IExecutor {
  execute(request: ExecutorRequest): Promise<ExecutorResponse>;
  /** False while credentials are missing */
  isReady(): boolean;
}

export interface ExecutorRequest {
  prompt: string;
  systemPrompt?: string;
  profile: AgentProfile;
}

/**
 * Outcome of one call after retries. Cost is reported on failure too.
 */
export interface ExecutorResponse {
  success: boolean;
  /** Model text; empty on failure */
  output: string;
  sessionId?: string;
  costUsd: number;
  durationMs: number;
  tokens?: TokenUsage;
  toolsUsed: string[];
  turns: number;
  /** Set when success is false; message already redacted */
  error?: {
    code: string;
    message: string;
  };
}

export interface ExecutorOptions {
  /** Working directory handed to the SDK */
  cwd?: string;
  permissionMode?: "bypassPermissions" | "default";
  /** Backoff between attempts */
  sleep?: (ms: number) => Promise<void>;
}
