/**
 * System Types
 */

import type { AgentRole } from "../agent/types.js";

/**
 * Runs one unit of work end to end, calling agents along the way
 */
export interface ISystem<TInput, TOutput> {
  readonly name: string;
  readonly version: string;
  run(input: TInput, context?: SystemContext): Promise<TOutput>;
  getInfo(): SystemInfo;
}

export interface SystemContext {
  /** Becomes the run id when set */
  correlationId?: string;
  /** Aborting cancels in-flight steps and skips the rest */
  signal?: AbortSignal;
  /** Recorded on the session, e.g. "cli" */
  initiatedBy?: string;
}

export interface SystemInfo {
  name: string;
  version: string;
  description?: string;
  agents: Array<{
    name: string;
    version: string;
    role: AgentRole;
    /** False while the agent's executor cannot authenticate */
    enabled: boolean;
  }>;
}
