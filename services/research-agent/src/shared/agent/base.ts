/**
 * Base Agent
 * Session tracking, the executor call and error classification; subclasses own prompt and parsing
 */

import { randomUUID } from "crypto";
import { isRetryableError, toRedactedError, ValidationError } from "@sibyl/core";
import type { IExecutor, ExecutorResponse } from "../executor/types.js";
import type { IObservability } from "../observability/types.js";
import type {
  AgentContext,
  AgentError,
  AgentProfile,
  AgentResult,
  AgentRole,
  ExecutionMetadata,
  IAgent,
} from "./types.js";

export interface AgentDependencies {
  executor: IExecutor;
  observability: IObservability;
}

export interface BaseAgentConfig {
  name: string;
  version: string;
  role: AgentRole;
  profile: AgentProfile;
  systemPrompt?: string;
}

export abstract class BaseAgent<TInput, TOutput> implements IAgent<TInput, TOutput> {
  readonly name: string;
  readonly version: string;

  protected readonly config: BaseAgentConfig;
  protected readonly deps: AgentDependencies;

  constructor(config: BaseAgentConfig, deps: AgentDependencies) {
    this.name = config.name;
    this.version = config.version;
    this.config = config;
    this.deps = deps;
  }

  get profile(): AgentProfile {
    return this.config.profile;
  }

  abstract validateInput(input: unknown): TInput;

  protected abstract buildPrompt(input: TInput, context?: AgentContext): string;

  /**
   * Model text to typed output; throw ValidationError when it does not fit
   */
  protected abstract parseOutput(raw: string, input: TInput): TOutput;

  /**
   * Never throws: failures come back as a classified, redacted error with whatever was spent
   */
  async run(input: TInput, context?: AgentContext): Promise<AgentResult<TOutput>> {
    const startedAt = new Date();
    const sessionId = await this.deps.observability.startSession({
      agentName: this.name,
      agentVersion: this.version,
      correlationId: context?.correlationId ?? randomUUID(),
      targetId: context?.targetId,
      metadata: context?.systemName ? { parent_system: context.systemName } : undefined,
    });

    // Kept once the model has answered so a rejected output still reports its cost
    let response: ExecutorResponse | undefined;

    const metadata = (): ExecutionMetadata => {
      const completedAt = new Date();
      return {
        agentName: this.name,
        agentVersion: this.version,
        model: this.profile.model,
        startedAt: startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
        durationMs: completedAt.getTime() - startedAt.getTime(),
        costUsd: response?.costUsd ?? 0,
        tokens: response?.tokens,
        toolsUsed: response?.toolsUsed ?? [],
        turns: response?.turns ?? 0,
      };
    };

    try {
      const validated = this.validateInput(input);

      response = await this.deps.executor.execute({
        prompt: this.buildPrompt(validated, context),
        systemPrompt: this.config.systemPrompt,
        profile: this.profile,
      });
      if (!response.success) {
        throw new Error(response.error?.message ?? "Execution failed");
      }

      const output = this.parseOutput(response.output, validated);
      const done = metadata();
      await this.deps.observability.endSession(sessionId, {
        success: true,
        metadata: { durationMs: done.durationMs, costUsd: done.costUsd },
      });
      return { success: true, output, metadata: done };
    } catch (error) {
      const done = metadata();
      await this.deps.observability.endSession(sessionId, {
        success: false,
        error,
        metadata: { durationMs: done.durationMs, costUsd: done.costUsd },
      });
      return { success: false, error: this.classify(error), metadata: done };
    }
  }

  protected classify(error: unknown): AgentError {
    const redacted = toRedactedError(error);
    const type = error instanceof ValidationError
      ? "validation"
      : redacted.kind === "config"
        ? "infra"
        : "execution";

    return {
      type,
      code: type === "validation" ? "INVALID_OUTPUT" : "AGENT_ERROR",
      message: redacted.message,
      retryable: isRetryableError(error),
    };
  }
}
