/**
 * Claude Executor
 * IExecutor over the Claude Agent SDK with retry and exponential backoff
 */

import { query, type Options, type SDKMessage } from "@anthropic-ai/claude-agent-sdk";
import { isRetryableError, redactSecrets } from "@sibyl/core";
import type { AgentProfile, ModelTier } from "../agent/types.js";
import type { ExecutorOptions, ExecutorRequest, ExecutorResponse, IExecutor } from "./types.js";

const MODEL_IDS: Record<ModelTier, string> = {
  haiku: "claude-3-5-haiku-20241022",
  sonnet: "claude-sonnet-4-20250514",
  opus: "claude-opus-4-1-20250805",
};

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

type Collected = Omit<ExecutorResponse, "success" | "error">;

/**
 * Fold one SDK message into the running response
 */
function collect(acc: Collected, message: SDKMessage, tools: Set<string>): Collected {
  if (message.type === "assistant") {
    let output = acc.output;
    for (const block of message.message.content) {
      if (block.type === "text") {
        output += block.text;
      } else if (block.type === "tool_use") {
        tools.add(block.name);
      }
    }
    return { ...acc, output, turns: acc.turns + 1 };
  }

  if (message.type === "result") {
    if (message.subtype !== "success") {
      throw new Error(`Claude run ended with ${message.subtype} after ${message.num_turns} turns`);
    }
    return {
      ...acc,
      output: acc.output || message.result,
      sessionId: message.session_id,
      costUsd: message.total_cost_usd,
      durationMs: message.duration_ms,
      tokens: {
        input: message.usage.input_tokens,
        output: message.usage.output_tokens,
        cached: message.usage.cache_read_input_tokens,
      },
    };
  }

  return acc;
}

export class ClaudeExecutor implements IExecutor {
  private readonly cwd: string;
  private readonly permissionMode: "bypassPermissions" | "default";
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ExecutorOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.permissionMode = options.permissionMode ?? "default";
    this.sleep = options.sleep ?? defaultSleep;
  }

  isReady(): boolean {
    return Boolean(process.env.ANTHROPIC_API_KEY);
  }

  async execute(request: ExecutorRequest): Promise<ExecutorResponse> {
    const startTime = Date.now();
    const attempts = Math.max(1, request.profile.retries + 1);
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const collected = await this.executeOnce(request.prompt, request.systemPrompt, request.profile);
        return {
          ...collected,
          success: true,
          durationMs: collected.durationMs || Date.now() - startTime,
        };
      } catch (error) {
        lastError = error;
        if (!isRetryableError(error) || attempt === attempts) {
          break;
        }
        await this.sleep(request.profile.backoffMs * 2 ** (attempt - 1));
      }
    }

    return {
      success: false,
      output: "",
      costUsd: 0,
      durationMs: Date.now() - startTime,
      toolsUsed: [],
      turns: 0,
      error: {
        code: "EXECUTOR_ERROR",
        message: redactSecrets(lastError instanceof Error ? lastError.message : String(lastError)),
      },
    };
  }

  private async executeOnce(
    prompt: string,
    systemPrompt: string | undefined,
    profile: AgentProfile
  ): Promise<Collected> {
    const options: Options = {
      systemPrompt,
      model: MODEL_IDS[profile.model],
      allowedTools: profile.tools,
      maxTurns: profile.maxTurns,
      permissionMode: this.permissionMode,
      cwd: this.cwd,
    };

    const tools = new Set<string>();
    let acc: Collected = { output: "", costUsd: 0, durationMs: 0, toolsUsed: [], turns: 0 };

    for await (const message of query({ prompt, options })) {
      acc = collect(acc, message, tools);
    }

    return { ...acc, toolsUsed: [...tools] };
  }
}
