/**
 * Research Orchestrator
 *
 * One run: plan -> execute -> synthesize -> verify, and when the gate allows,
 * escalate -> supervise -> re-verify. Every paid call goes through a single
 * BudgetLedger; deep research tasks are tracked durably so a crash never
 * loses one.
 */

import { randomUUID } from "crypto";
import { toRedactedError } from "@sibyl/core";
import type { ISystem, SystemContext, SystemInfo } from "../../shared/system/types.js";
import type { IObservability } from "../../shared/observability/types.js";
import type {
  MarketDataProvider,
  ResearchProvider,
  SynthesisCapability,
} from "./capabilities.js";
import { Supervisor } from "./escalation/supervisor.js";
import { decideEscalation } from "./escalation/gate.js";
import { runPlan } from "./executor/plan-runner.js";
import type { ExecutionContext } from "./executor/step-executor.js";
import { BudgetLedger } from "./ledger.js";
import { buildPlan } from "./plan/builder.js";
import type { CostOverrides } from "./plan/policy.js";
import type { RunStore } from "./run-store.js";
import { RunStateMachine } from "./state.js";
import { stepOutcome, synthesize as defaultSynthesize, type SynthesizeFn } from "./synthesis/synthesizer.js";
import type { AsyncTaskTracker } from "./tracker/tracker.js";
import {
  DEFAULT_POLICY,
  type AgentRunResult,
  type CriticOutcome,
  type OrchestratorPolicy,
  type ResearchMode,
  type RunState,
  type Step,
} from "./types.js";
import { verify } from "./verifier.js";

// ============================================
// INPUT / DEPENDENCIES
// ============================================

export interface RunInput {
  subjectId: string;
  mode: ResearchMode;
  /** Defaults to the policy's budget for the mode */
  budgetCeiling?: number;
  /** Overrides the policy switch for this run */
  escalationEnabled?: boolean;
  costOverrides?: CostOverrides;
}

export interface OrchestratorDependencies {
  marketData: MarketDataProvider;
  provider: ResearchProvider;
  tracker: AsyncTaskTracker;
  observability: IObservability;
  /** Replaceable for tests; the keyword synthesizer by default */
  synthesize?: SynthesizeFn;
  synthesisCritic?: SynthesisCapability;
  runStore?: RunStore;
  policy?: Partial<OrchestratorPolicy>;
  now?: () => Date;
}

// ============================================
// ORCHESTRATOR
// ============================================

export class ResearchOrchestrator implements ISystem<RunInput, AgentRunResult> {
  readonly name = "research-orchestrator";
  readonly version = "1.0.0";

  private readonly policy: OrchestratorPolicy;
  private readonly synthesize: SynthesizeFn;
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.policy = {
      ...DEFAULT_POLICY,
      ...deps.policy,
      defaultBudgets: { ...DEFAULT_POLICY.defaultBudgets, ...deps.policy?.defaultBudgets },
    };
    this.synthesize = deps.synthesize ?? defaultSynthesize;
    this.now = deps.now ?? (() => new Date());
  }

  getInfo(): SystemInfo {
    return {
      name: this.name,
      version: this.version,
      description: "Cost-bounded research and probability estimation for one prediction market",
      agents: [
        {
          name: "critic",
          version: "1.0.0",
          role: "critique",
          enabled: this.deps.synthesisCritic?.isAvailable() ?? false,
        },
      ],
    };
  }

  async run(input: RunInput, context?: SystemContext): Promise<AgentRunResult> {
    const runId = context?.correlationId ?? randomUUID();
    const startedAt = this.now();
    const { observability } = this.deps;

    const sessionId = await observability.startSession({
      agentName: this.name,
      agentVersion: this.version,
      correlationId: runId,
      targetId: input.subjectId,
      metadata: { mode: input.mode, initiated_by: context?.initiatedBy },
    });

    try {
      const result = await this.execute(runId, input, startedAt, context?.signal);

      await observability.endSession(sessionId, {
        success: true,
        metadata: {
          durationMs: Date.parse(result.completedAt) - startedAt.getTime(),
          costUsd: result.totalCost,
          escalated: result.escalated,
          verificationPassed: result.verification.passed,
        },
      });

      return result;
    } catch (error) {
      await observability.endSession(sessionId, { success: false, error });
      throw error;
    }
  }

  private async execute(
    runId: string,
    input: RunInput,
    startedAt: Date,
    signal: AbortSignal | undefined
  ): Promise<AgentRunResult> {
    const { observability } = this.deps;
    const policy = this.policy;
    const machine = new RunStateMachine((next, previous) =>
      observability.log("debug", `[Orchestrator] ${previous} -> ${next}`, { runId })
    );
    const enter = async (state: RunState): Promise<void> => {
      const previous = machine.state;
      machine.transition(state);
      await observability.recordEvent({
        type: "run.state_changed",
        correlationId: runId,
        systemName: this.name,
        targetId: input.subjectId,
        data: { state, previous },
      });
    };

    // Market data first: without a subject there is nothing to research
    const market = await this.deps.marketData.getSubject(input.subjectId);

    const budgetCeiling = input.budgetCeiling ?? policy.defaultBudgets[input.mode];
    const plan = buildPlan(market.subject, input.mode, budgetCeiling, {
      recencyDays: policy.recencyDays,
      deepTaskTimeoutSeconds: policy.deepTaskTimeoutSeconds,
      deepTaskPollSeconds: policy.deepTaskPollSeconds,
      costOverrides: input.costOverrides,
      now: startedAt,
    });
    const ledger = new BudgetLedger(plan.budgetCeiling);

    observability.log("info", `[Orchestrator] Plan ${plan.planId} built`, {
      runId,
      subjectId: input.subjectId,
      mode: plan.mode,
      steps: plan.steps.length,
      estimatedCost: plan.totalEstimatedCost,
      budgetCeiling: plan.budgetCeiling,
    });

    const context: ExecutionContext = {
      runId,
      subject: market.subject,
      ledger,
      provider: this.deps.provider,
      tracker: this.deps.tracker,
      priorSteps: [],
      signal,
      observability,
      now: this.now,
    };

    await enter("executing");
    const execution = await runPlan(plan, context, { maxConcurrency: policy.maxConcurrency });
    let steps: Step[] = execution.steps;
    let budgetExhausted = execution.budgetExhausted;

    await enter("synthesizing");
    const synthesis = this.synthesize({
      plan,
      steps,
      market,
      ledger,
      budgetExhausted,
      now: this.now(),
    });
    let analysis = synthesis.analysis;
    let summary = synthesis.summary;

    await enter("verifying");
    const verifierPolicy = { minCitationDomains: policy.minCitationDomains };
    const initialVerification = verify(analysis, summary, verifierPolicy);
    let verification = initialVerification;

    const escalation = decideEscalation({
      report: initialVerification,
      analysis,
      volume24h: market.price.volume24h,
      ledger,
      cancelled: signal?.aborted ?? false,
      policy: {
        enabled: input.escalationEnabled ?? policy.escalationEnabled,
        evDeltaThreshold: policy.evDeltaThreshold,
        minVolume24h: policy.minVolume24h,
      },
    });

    await observability.recordEvent({
      type: "escalation.decided",
      correlationId: runId,
      systemName: this.name,
      targetId: input.subjectId,
      data: { ...escalation, issues: initialVerification.issues },
    });

    let critiques: CriticOutcome[] = [];

    if (escalation.escalate) {
      await enter("escalating");
      const supervisor = new Supervisor({
        synthesize: this.synthesize,
        synthesisCritic: this.deps.synthesisCritic,
        now: this.now,
      });

      await enter("supervising");
      const supervised = await supervisor.supervise({
        plan,
        market,
        steps,
        analysis,
        summary,
        report: initialVerification,
        ledger,
        context,
        maxConcurrency: policy.maxConcurrency,
      });

      steps = [...steps, ...supervised.criticSteps];
      budgetExhausted = budgetExhausted || supervised.budgetExhausted;
      analysis = supervised.analysis;
      critiques = supervised.critiques;
      summary = {
        ...supervised.summary,
        steps: steps.map(stepOutcome),
        budgetExhausted,
        totalCost: ledger.actual,
      };

      for (const critique of critiques) {
        await observability.recordEvent({
          type: "critic.completed",
          correlationId: runId,
          systemName: this.name,
          targetId: input.subjectId,
          data: { ...critique },
        });
      }

      await enter("re_verifying");
      verification = verify(analysis, summary, verifierPolicy);
    }

    await enter("done");

    const result: AgentRunResult = {
      runId,
      subjectId: input.subjectId,
      mode: plan.mode,
      planId: plan.planId,
      analysis,
      initialVerification,
      verification,
      researchSummary: summary,
      escalated: escalation.escalate,
      escalation,
      critiques,
      totalCost: ledger.actual,
      budgetCeiling: ledger.ceiling,
      budgetSpent: ledger.spent,
      budgetExhausted,
      states: [...machine.history],
      startedAt: startedAt.toISOString(),
      completedAt: this.now().toISOString(),
    };

    observability.metric("run.cost_usd", result.totalCost, { mode: result.mode });
    observability.log("info", `[Orchestrator] Run complete`, {
      runId,
      subjectId: input.subjectId,
      predicted: analysis.predictedProbability,
      confidence: analysis.confidence,
      passed: verification.passed,
      escalated: result.escalated,
      totalCost: result.totalCost,
      budgetExhausted,
    });

    await this.persist(result);
    return result;
  }

  /**
   * A failed save is logged; the caller still gets the result
   */
  private async persist(result: AgentRunResult): Promise<void> {
    if (!this.deps.runStore) return;
    try {
      await this.deps.runStore.save(result);
    } catch (error) {
      this.deps.observability.log("error", "[Orchestrator] Failed to save run", {
        runId: result.runId,
        error: toRedactedError(error).message,
      });
    }
  }
}

export function createResearchOrchestrator(deps: OrchestratorDependencies): ResearchOrchestrator {
  return new ResearchOrchestrator(deps);
}
