import type { IExecutor } from "../../../../shared/executor/types.js";
import type { IObservability } from "../../../../shared/observability/types.js";
import type { AgentProfile } from "../../../../shared/agent/types.js";
import type { SynthesisCapability } from "../../capabilities.js";
import { AgentSynthesisCritic, CriticAgent } from "./agent.js";

export { CriticAgent, AgentSynthesisCritic, CRITIC_PROFILE } from "./agent.js";
export { CritiqueBundleSchema, extractJsonObject, parseCritiqueOutput } from "./schema.js";
export { CRITIC_SYSTEM_PROMPT, getCriticPrompt } from "./prompt.js";

/**
 * Synthesis critic backed by a model executor; unavailable while the executor is not ready
 */
export function createSynthesisCritic(
  executor: IExecutor,
  observability: IObservability,
  profile?: Partial<AgentProfile>
): SynthesisCapability {
  const agent = new CriticAgent({ executor, observability }, profile);
  return new AgentSynthesisCritic(agent, () => executor.isReady(), { systemName: "research-orchestrator" });
}
