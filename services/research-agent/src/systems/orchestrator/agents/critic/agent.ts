/**
 * Critic Agent
 * One tool-free model call that re-estimates the probability from the gathered evidence
 */

import { ValidationError } from "@sibyl/core";
import { BaseAgent, type AgentDependencies } from "../../../../shared/agent/base.js";
import type { AgentContext, AgentProfile } from "../../../../shared/agent/types.js";
import {
  CritiqueFailedError,
  type CritiqueBundle,
  type Priced,
  type SynthesisCapability,
} from "../../capabilities.js";
import type { CritiqueOutput } from "../../types.js";
import { CRITIC_SYSTEM_PROMPT, getCriticPrompt } from "./prompt.js";
import { CritiqueBundleSchema, parseCritiqueOutput } from "./schema.js";

// ============================================
// AGENT CONFIGURATION
// ============================================

export const CRITIC_PROFILE: AgentProfile = {
  model: "sonnet",
  maxTurns: 1,
  budgetUsd: 0.05,
  tools: [],
  retries: 1,
  backoffMs: 1000,
};

// ============================================
// CRITIC AGENT
// ============================================

export class CriticAgent extends BaseAgent<CritiqueBundle, CritiqueOutput> {
  constructor(deps: AgentDependencies, profile?: Partial<AgentProfile>) {
    super(
      {
        name: "critic",
        version: "1.0.0",
        role: "critique",
        profile: { ...CRITIC_PROFILE, ...profile },
        systemPrompt: CRITIC_SYSTEM_PROMPT,
      },
      deps
    );
  }

  validateInput(input: unknown): CritiqueBundle {
    const result = CritiqueBundleSchema.safeParse(input);
    if (!result.success) {
      throw new ValidationError(`invalid critique bundle: ${result.error.issues[0]?.message ?? "unknown"}`, {
        field: result.error.issues[0]?.path.join("."),
      });
    }
    return result.data;
  }

  protected buildPrompt(input: CritiqueBundle, _context?: AgentContext): string {
    return getCriticPrompt(input);
  }

  protected parseOutput(raw: string): CritiqueOutput {
    return parseCritiqueOutput(raw);
  }
}

// ============================================
// SYNTHESIS CAPABILITY
// ============================================

/**
 * Exposes the critic agent to the supervisor
 */
export class AgentSynthesisCritic implements SynthesisCapability {
  constructor(
    private readonly agent: CriticAgent,
    private readonly isReady: () => boolean,
    private readonly context?: AgentContext
  ) {}

  get estimatedCost(): number {
    return this.agent.profile.budgetUsd;
  }

  isAvailable(): boolean {
    return this.isReady();
  }

  async critique(bundle: CritiqueBundle): Promise<Priced<CritiqueOutput>> {
    const result = await this.agent.run(bundle, {
      ...this.context,
      targetId: bundle.subjectId,
    });

    if (!result.success) {
      throw new CritiqueFailedError(result.error.message, result.error.type, result.metadata.costUsd);
    }
    return { value: result.output, cost: result.metadata.costUsd };
  }
}
