import { describe, it, expect, vi } from "vitest";
import { ProviderError } from "@sibyl/core";
import { NoOpObservability } from "../../../shared/observability/console.js";
import { MemoryStore } from "../../../shared/store/memory.js";
import type { MarketDataProvider, SourceDocument, SynthesisCapability } from "../capabilities.js";
import { RunStore } from "../run-store.js";
import { synthesize, type SynthesizeFn } from "../synthesis/synthesizer.js";
import { ResearchOrchestrator, type OrchestratorDependencies } from "../system.js";
import { StoreHandleStore } from "../tracker/handle-store.js";
import { AsyncTaskTracker } from "../tracker/tracker.js";
import { doc, FakeMarketData, FakeResearchProvider, NOW, testMarket, type FakeProviderOptions } from "./fakes.js";

const BULL = "https://news.example.com/a";
const BEAR = "https://blog.example.org/b";

const RESULTS: Record<string, SourceDocument[]> = {
  "the test event happen": [doc(BULL, "Strong rally expected after approval", "Outlook")],
  "the test event happen news": [doc(BEAR, "Officials warn of risk and concern over delays")],
};

function harness(overrides: Partial<OrchestratorDependencies> = {}, providerOptions: FakeProviderOptions = {}) {
  const provider = new FakeResearchProvider({
    search: (query) => ({ value: RESULTS[query.query] ?? [], cost: 0.01 }),
    ...providerOptions,
  });
  const observability = new NoOpObservability();
  const tracker = new AsyncTaskTracker({
    store: new StoreHandleStore(new MemoryStore()),
    provider,
    observability,
    sleep: async () => undefined,
  });
  const runStore = new RunStore(new MemoryStore(), { now: () => NOW });
  const orchestrator = new ResearchOrchestrator({
    marketData: new FakeMarketData(),
    provider,
    tracker,
    observability,
    runStore,
    now: () => NOW,
    ...overrides,
  });
  return { orchestrator, provider, observability, runStore };
}

describe("ResearchOrchestrator", () => {
  it("runs a fast plan within budget without escalating", async () => {
    const { orchestrator, provider, runStore } = harness(
      {},
      {
        fetchContents: (urls) => ({ value: urls.map((url) => doc(url, `full text of ${url}`)), cost: 0.003 }),
      }
    );

    const result = await orchestrator.run(
      { subjectId: "TEST-EVENT", mode: "fast", budgetCeiling: 1 },
      { correlationId: "run-fast" }
    );

    expect(result.runId).toBe("run-fast");
    expect(result.states).toEqual(["planning", "executing", "synthesizing", "verifying", "done"]);
    expect(result.researchSummary.steps.map((step) => [step.id, step.status])).toEqual([
      ["background-1", "completed"],
      ["background-2", "completed"],
      ["synthesis-1", "completed"],
    ]);
    expect([...new Set(result.researchSummary.steps.map((step) => step.phase))]).toEqual(["background", "synthesis"]);
    expect(result.escalated).toBe(false);
    expect(result.escalation).toEqual({ escalate: false, triggers: ["ev_delta"], blockedBy: "disabled" });
    expect(result.budgetExhausted).toBe(false);
    expect(result.totalCost).toBe(0.023);
    expect(result.budgetSpent).toBe(0.03);
    expect(result.budgetCeiling).toBe(1);
    expect(result.analysis.predictedProbability).toBe(60);
    expect(result.analysis.confidence).toBe("medium");
    expect(result.analysis.sources).toEqual([BULL, BEAR]);
    expect(result.verification).toEqual({
      passed: true,
      issues: [],
      checkedSources: 2,
      suggestedEscalation: false,
    });
    expect(result.critiques).toEqual([]);
    expect(provider.calls.createDeepTask).toBe(0);

    const stored = await runStore.load("TEST-EVENT", "run-fast");
    expect(stored?.result).toEqual(result);
    expect(stored?.savedAt).toBe(NOW.toISOString());
  });

  it("escalates an out-of-range synthesis and repairs it through the critics", async () => {
    let calls = 0;
    const inflated: SynthesizeFn = (input) => {
      const output = synthesize(input);
      calls++;
      return calls === 1 ? { ...output, analysis: { ...output.analysis, predictedProbability: 150 } } : output;
    };
    const { orchestrator } = harness({ synthesize: inflated });

    const result = await orchestrator.run(
      { subjectId: "TEST-EVENT", mode: "standard", escalationEnabled: true },
      { correlationId: "run-escalated" }
    );

    expect(result.initialVerification.issues).toEqual(["predicted probability out of range [0, 100]: 150"]);
    expect(result.escalated).toBe(true);
    expect(result.escalation.triggers).toEqual(["verification_failed", "ev_delta"]);
    expect(result.states).toEqual([
      "planning",
      "executing",
      "synthesizing",
      "verifying",
      "escalating",
      "supervising",
      "re_verifying",
      "done",
    ]);
    expect(result.critiques.map((critique) => [critique.critic, critique.status])).toEqual([
      ["research", "completed"],
      ["consistency", "completed"],
      ["synthesis", "skipped"],
    ]);
    expect(result.researchSummary.steps.map((step) => step.id).slice(-2)).toEqual([
      "critic-background-1",
      "critic-current_news-1",
    ]);
    expect(result.analysis.predictedProbability).toBe(55);
    expect(result.analysis.confidence).toBe("low");
    expect(result.analysis.probabilitySource).toBe("aggregate");
    expect(result.verification.passed).toBe(true);
    expect(result.budgetCeiling).toBe(0.25);
    expect(result.budgetSpent).toBe(0.2);
    expect(result.totalCost).toBe(0.06);
    expect(result.budgetExhausted).toBe(false);
  });

  it("returns a partial analysis when the budget runs out mid-plan", async () => {
    const { orchestrator, provider } = harness();

    const result = await orchestrator.run(
      {
        subjectId: "TEST-EVENT",
        mode: "standard",
        budgetCeiling: 0.02,
        escalationEnabled: true,
        costOverrides: { search: 0.01, ask: 0.01, fetch_contents: 0.01 },
      },
      { correlationId: "run-starved" }
    );

    expect(result.researchSummary.steps.map((step) => [step.id, step.status, step.error?.kind])).toEqual([
      ["background-1", "completed", undefined],
      ["current_news-1", "completed", undefined],
      ["current_news-2", "skipped", "budget_exhausted"],
      ["expert_opinions-1", "skipped", "budget_exhausted"],
      ["expert_opinions-2", "skipped", "budget_exhausted"],
      ["synthesis-1", "skipped", "budget_exhausted"],
    ]);
    expect(provider.calls.search).toBe(2);
    expect(provider.calls.ask).toBe(0);
    expect(result.budgetExhausted).toBe(true);
    expect(result.researchSummary.budgetExhausted).toBe(true);
    expect(result.budgetSpent).toBe(0.02);
    expect(result.totalCost).toBe(0.02);
    expect(result.analysis.predictedProbability).toBe(60);
    expect(result.analysis.sources).toEqual([BULL, BEAR]);
    expect(result.analysis.reasoning).toContain("Research was cut short by the budget ceiling.");
    expect(result.escalated).toBe(false);
    expect(result.escalation).toEqual({ escalate: false, triggers: ["ev_delta"], blockedBy: "no_budget" });
    expect(result.states).toEqual(["planning", "executing", "synthesizing", "verifying", "done"]);
  });

  it("spends nothing more once cancelled, escalation included", async () => {
    const critique = vi.fn<SynthesisCapability["critique"]>(async () => ({
      value: { predictedProbability: 30, confidence: "medium", notes: "unused" },
      cost: 0.05,
    }));
    const { orchestrator, provider } = harness({
      marketData: new FakeMarketData(testMarket({}, { midpointProbability: 0.2 })),
      synthesisCritic: { isAvailable: () => true, estimatedCost: 0.05, critique },
    });
    const controller = new AbortController();
    controller.abort();

    const result = await orchestrator.run(
      { subjectId: "TEST-EVENT", mode: "fast", budgetCeiling: 1, escalationEnabled: true },
      { correlationId: "run-cancelled", signal: controller.signal }
    );

    expect(result.researchSummary.steps.map((step) => [step.status, step.error?.kind])).toEqual([
      ["failed", "cancelled"],
      ["failed", "cancelled"],
      ["failed", "cancelled"],
    ]);
    expect(result.escalation).toEqual({ escalate: false, triggers: ["ev_delta"], blockedBy: "cancelled" });
    expect(result.escalated).toBe(false);
    expect(result.critiques).toEqual([]);
    expect(critique).not.toHaveBeenCalled();
    expect(provider.calls.search).toBe(0);
    expect(result.budgetSpent).toBe(0);
    expect(result.totalCost).toBe(0);
    expect(result.states).toEqual(["planning", "executing", "synthesizing", "verifying", "done"]);
  });

  it("propagates a market data failure and closes the session", async () => {
    const marketData: MarketDataProvider = {
      getSubject: async () => {
        throw ProviderError.fromStatus("kalshi", 404, "market not found");
      },
    };
    const { orchestrator, observability, provider } = harness({ marketData });
    const endSession = vi.spyOn(observability, "endSession");

    await expect(orchestrator.run({ subjectId: "MISSING", mode: "fast" })).rejects.toThrow(
      "kalshi API error 404: market not found"
    );
    expect(endSession).toHaveBeenCalledWith(expect.any(String), expect.objectContaining({ success: false }));
    expect(provider.calls.search).toBe(0);
  });

  it("returns the result when saving it fails", async () => {
    class FailingStore extends MemoryStore {
      override async write(): Promise<void> {
        throw new Error("disk full");
      }
    }
    const { orchestrator } = harness({ runStore: new RunStore(new FailingStore()) });

    const result = await orchestrator.run({ subjectId: "TEST-EVENT", mode: "fast" });

    expect(result.subjectId).toBe("TEST-EVENT");
    expect(result.budgetCeiling).toBe(0.05);
  });

  it("reports the critic agent as disabled without a synthesis critic", () => {
    const { orchestrator } = harness();
    expect(orchestrator.getInfo().agents).toEqual([
      { name: "critic", version: "1.0.0", role: "critique", enabled: false },
    ]);
  });
});
