/**
 * Agent Types
 * An agent is one validated model call: typed input, typed output, cost always reported
 */

export type ModelTier = "haiku" | "sonnet" | "opus";

export type AgentRole = "synthesis" | "critique";

export interface AgentProfile {
  model: ModelTier;
  maxTurns: number;
  /** Reserved against the run's ledger before each call */
  budgetUsd: number;
  /** Empty for tool-free agents */
  tools: string[];
  /** Extra attempts after a retryable failure */
  retries: number;
  /** Delay before the first retry; doubles after each */
  backoffMs: number;
}

export interface IAgent<TInput, TOutput> {
  readonly name: string;
  readonly version: string;
  validateInput(input: unknown): TInput;
  run(input: TInput, context?: AgentContext): Promise<AgentResult<TOutput>>;
}

export interface AgentContext {
  /** The run id */
  correlationId?: string;
  /** Subject the call is about */
  targetId?: string;
  /** Calling system, recorded on the session */
  systemName?: string;
}

export interface TokenUsage {
  input: number;
  output: number;
  cached?: number;
}

export interface ExecutionMetadata {
  agentName: string;
  agentVersion: string;
  model: ModelTier;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  /** Billed even when the output was rejected */
  costUsd: number;
  tokens?: TokenUsage;
  toolsUsed: string[];
  turns: number;
}

export type AgentErrorType =
  | "validation"   // input or model output failed its schema
  | "execution"    // the model call failed
  | "infra";       // missing credentials or configuration

export interface AgentError {
  type: AgentErrorType;
  code: string;
  /** Already redacted */
  message: string;
  retryable: boolean;
}

/**
 * A failed run still carries its metadata, cost included
 */
export type AgentResult<T> =
  | { success: true; output: T; metadata: ExecutionMetadata }
  | { success: false; error: AgentError; metadata: ExecutionMetadata };
