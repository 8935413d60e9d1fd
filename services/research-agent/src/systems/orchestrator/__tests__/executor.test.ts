import { describe, it, expect } from "vitest";
import { ProviderError } from "@sibyl/core";
import { MemoryStore } from "../../../shared/store/memory.js";
import type { SearchQuery, SourceDocument, Priced } from "../capabilities.js";
import { clampConcurrency, runPlan } from "../executor/plan-runner.js";
import { executeStep, resolveContentUrls, toStep, type ExecutionContext } from "../executor/step-executor.js";
import { BudgetLedger } from "../ledger.js";
import { buildPlan } from "../plan/builder.js";
import { StoreHandleStore } from "../tracker/handle-store.js";
import { AsyncTaskTracker, type SleepFn } from "../tracker/tracker.js";
import type { Plan, ResearchMode, Step } from "../types.js";
import { doc, FakeResearchProvider, NOW, testSubject } from "./fakes.js";

function context(
  provider: FakeResearchProvider,
  ledger: BudgetLedger,
  options: { signal?: AbortSignal; sleep?: SleepFn; priorSteps?: Step[] } = {}
): ExecutionContext {
  const store = new StoreHandleStore(new MemoryStore());
  const tracker = new AsyncTaskTracker({
    store,
    provider,
    sleep: options.sleep ?? (async () => undefined),
    now: () => NOW.getTime(),
  });
  return {
    runId: "run-1",
    subject: testSubject(),
    ledger,
    provider,
    tracker,
    priorSteps: options.priorSteps ?? [],
    signal: options.signal,
    now: () => NOW,
  };
}

function plan(mode: ResearchMode, options: Parameters<typeof buildPlan>[3] = {}): Plan {
  return buildPlan(testSubject(), mode, 1, { now: NOW, ...options });
}

function stepOf(source: Plan, id: string): Step {
  const planned = source.steps.find((step) => step.id === id);
  if (!planned) throw new Error(`no step ${id}`);
  return toStep(planned);
}

describe("executeStep", () => {
  it("runs a search and reconciles the reported cost", async () => {
    const provider = new FakeResearchProvider({
      search: () => ({
        value: [doc("https://news.example.com/a", "Officials confirm the plan", "Update"), doc("", "no link")],
        cost: 0.025,
      }),
    });
    const ledger = new BudgetLedger(1);
    const step = stepOf(plan("standard"), "current_news-1");

    await executeStep(step, context(provider, ledger));

    expect(provider.searches).toEqual([
      {
        query: "the test event happen news",
        numResults: 10,
        searchType: "auto",
        includeText: true,
        includeHighlights: true,
        category: "news",
        startPublishedDate: "2026-01-30T12:00:00.000Z",
      },
    ]);
    expect(step.status).toBe("completed");
    expect(step.cost).toBe(0.025);
    expect(step.result?.snippets).toEqual([
      {
        text: "Officials confirm the plan",
        title: "Update",
        url: "https://news.example.com/a",
        origin: "search",
        stepId: "current_news-1",
      },
      { text: "no link", url: null, origin: "search", stepId: "current_news-1" },
    ]);
    expect(step.startedAt).toBe(NOW.toISOString());
    expect(ledger.snapshot()).toEqual({ ceiling: 1, spent: 0.03, actual: 0.025, remaining: 0.97 });
  });

  it("turns provider errors into a failed step", async () => {
    const provider = new FakeResearchProvider({
      failures: { search: ProviderError.fromStatus("exa", 429, "slow down") },
    });
    const ledger = new BudgetLedger(1);
    const step = stepOf(plan("fast"), "background-1");

    await executeStep(step, context(provider, ledger));

    expect(step.status).toBe("failed");
    expect(step.error).toEqual({ kind: "rate_limit", message: "exa API error 429: slow down" });
    expect(step.cost).toBe(0);
    expect(ledger.spent).toBe(0.012);
    expect(ledger.actual).toBe(0);
  });

  it("lets programming errors propagate", async () => {
    const provider = new FakeResearchProvider({ failures: { search: new TypeError("boom") } });
    const step = stepOf(plan("fast"), "background-1");

    await expect(executeStep(step, context(provider, new BudgetLedger(1)))).rejects.toThrow("boom");
  });

  it("skips a step the ledger refuses", async () => {
    const provider = new FakeResearchProvider();
    const ledger = new BudgetLedger(0.01);
    const step = stepOf(plan("standard"), "background-1");

    await executeStep(step, context(provider, ledger));

    expect(step.status).toBe("skipped");
    expect(step.error).toEqual({
      kind: "budget_exhausted",
      message: "reservation of $0.03 refused with $0.01 remaining",
    });
    expect(provider.calls.search).toBe(0);
    expect(ledger.spent).toBe(0);
  });

  it("fails a step as cancelled once the run is aborted", async () => {
    const provider = new FakeResearchProvider();
    const controller = new AbortController();
    controller.abort();
    const step = stepOf(plan("fast"), "background-1");

    await executeStep(step, context(provider, new BudgetLedger(1), { signal: controller.signal }));

    expect(step.status).toBe("failed");
    expect(step.error).toEqual({ kind: "cancelled", message: "run cancelled" });
    expect(provider.calls.search).toBe(0);
  });

  it("completes fetch_contents for free when there is nothing to fetch", async () => {
    const provider = new FakeResearchProvider();
    const ledger = new BudgetLedger(1);
    const step = stepOf(plan("fast"), "synthesis-1");

    await executeStep(step, context(provider, ledger));

    expect(step.status).toBe("completed");
    expect(step.result).toEqual({ snippets: [] });
    expect(provider.calls.fetchContents).toBe(0);
    expect(ledger.actual).toBe(0);
  });

  it("records the answer text of an ask step", async () => {
    const provider = new FakeResearchProvider({
      ask: () => ({
        value: { answer: "Most analysts expect it.", citations: [doc("https://analysis.example.net/x", "cited")] },
        cost: 0.005,
      }),
    });
    const step = stepOf(plan("standard"), "expert_opinions-1");

    await executeStep(step, context(provider, new BudgetLedger(1)));

    expect(step.result?.answerText).toBe("Most analysts expect it.");
    expect(step.result?.snippets.map((snippet) => snippet.origin)).toEqual(["ask"]);
  });

  it("runs a deep task through the tracker", async () => {
    const provider = new FakeResearchProvider();
    const ledger = new BudgetLedger(1);
    const ctx = context(provider, ledger, {
      sleep: async () =>
        provider.updateTask("task-1", {
          status: "completed",
          output: "Analysts give a 62% chance.",
          citations: [{ url: "https://research.example.org/a", title: "Report", text: "" }],
          cost: 0.45,
        }),
    });
    const step = stepOf(plan("deep"), "deep_research-1");

    await executeStep(step, ctx);

    expect(step.status).toBe("completed");
    expect(step.cost).toBe(0.45);
    expect(step.result).toEqual({
      snippets: [
        {
          text: "Report",
          title: "Report",
          url: "https://research.example.org/a",
          origin: "deep_task",
          stepId: "deep_research-1",
        },
      ],
      deepOutput: "Analysts give a 62% chance.",
      externalTaskId: "task-1",
    });
    expect(await ctx.tracker.listHandles()).toEqual([]);
    expect(ledger.spent).toBe(0.5);
  });

  it("fails a deep task the provider failed", async () => {
    const provider = new FakeResearchProvider();
    const ctx = context(provider, new BudgetLedger(1), {
      sleep: async () => provider.updateTask("task-1", { status: "failed", error: "quota exceeded" }),
    });
    const step = stepOf(plan("deep"), "deep_research-1");

    await executeStep(step, ctx);

    expect(step.status).toBe("failed");
    expect(step.error).toEqual({ kind: "api", message: "deep task failed: quota exceeded" });
  });

  it("reports a deep task that outlives its timeout", async () => {
    const provider = new FakeResearchProvider();
    let clock = NOW.getTime();
    const ctx = context(provider, new BudgetLedger(1));
    const tracker = new AsyncTaskTracker({
      store: new StoreHandleStore(new MemoryStore()),
      provider,
      sleep: async (ms) => {
        clock += ms;
      },
      now: () => clock,
    });
    const step = stepOf(plan("deep", { deepTaskTimeoutSeconds: 10 }), "deep_research-1");

    await executeStep(step, { ...ctx, tracker });

    expect(step.status).toBe("failed");
    expect(step.error).toEqual({ kind: "timeout", message: "deep task still running after 10s" });
    expect(await tracker.listHandles()).toHaveLength(1);
  });
});

describe("resolveContentUrls", () => {
  it("collects unique URLs from completed steps of the named phases", () => {
    const source = plan("standard");
    const background = stepOf(source, "background-1");
    background.status = "completed";
    background.result = {
      snippets: [
        { text: "a", url: "https://a.example.com/1", origin: "search", stepId: background.id },
        { text: "b", url: null, origin: "search", stepId: background.id },
        { text: "c", url: "https://a.example.com/1", origin: "search", stepId: background.id },
      ],
    };
    const failed = stepOf(source, "current_news-1");
    failed.status = "failed";
    failed.result = { snippets: [{ text: "x", url: "https://x.example.com", origin: "search", stepId: failed.id }] };

    expect(resolveContentUrls([background, failed], { fromPhases: ["background", "current_news"], limit: 5 })).toEqual([
      "https://a.example.com/1",
    ]);
    expect(resolveContentUrls([background], { fromPhases: ["current_news"], limit: 5 })).toEqual([]);
  });
});

describe("runPlan", () => {
  it("stops at the budget ceiling and skips what remains", async () => {
    const provider = new FakeResearchProvider({ search: () => ({ value: [], cost: 0.01 }) });
    const ledger = new BudgetLedger(0.02);
    const source = buildPlan(testSubject(), "standard", 0.02, {
      now: NOW,
      costOverrides: { search: 0.01, ask: 0.01, fetch_contents: 0.01, deep_task: 0.01 },
    });

    const { steps, budgetExhausted } = await runPlan(source, context(provider, ledger));

    expect(steps.map((step) => [step.id, step.status, step.error?.message])).toEqual([
      ["background-1", "completed", undefined],
      ["current_news-1", "completed", undefined],
      ["current_news-2", "skipped", "reservation of $0.01 refused with $0 remaining"],
      ["expert_opinions-1", "skipped", "reservation of $0.01 refused with $0 remaining"],
      ["expert_opinions-2", "skipped", "phase expert_opinions halted by budget"],
      ["synthesis-1", "skipped", "reservation of $0.01 refused with $0 remaining"],
    ]);
    expect(budgetExhausted).toBe(true);
    expect(ledger.spent).toBe(0.02);
    expect(provider.calls.search).toBe(2);
    expect(provider.calls.ask).toBe(0);
  });

  it("fetches contents for URLs found in earlier phases", async () => {
    const results: Record<string, SourceDocument[]> = {
      "the test event happen": [doc("https://a.example.com", "a"), doc("https://b.example.com", "b")],
      "the test event happen news": [doc("https://b.example.com", "b"), doc("https://c.example.com", "c")],
    };
    const fetched: string[][] = [];
    const provider = new FakeResearchProvider({
      search: (query) => ({ value: results[query.query] ?? [], cost: 0.01 }),
      fetchContents: (urls) => {
        fetched.push(urls);
        return { value: urls.map((url) => doc(url, `full text of ${url}`)), cost: 0.003 };
      },
    });

    const { steps, budgetExhausted } = await runPlan(plan("fast"), context(provider, new BudgetLedger(1)));

    expect(budgetExhausted).toBe(false);
    expect(fetched).toEqual([["https://a.example.com", "https://b.example.com", "https://c.example.com"]]);
    expect(steps[2]?.result?.snippets).toHaveLength(3);
  });

  it("bounds fan-out within a phase", async () => {
    let inFlight = 0;
    let peak = 0;

    class SlowProvider extends FakeResearchProvider {
      override async search(query: SearchQuery): Promise<Priced<SourceDocument[]>> {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return super.search(query);
      }
    }

    const provider = new SlowProvider();
    const { steps } = await runPlan(plan("standard"), context(provider, new BudgetLedger(1)), { maxConcurrency: 3 });

    expect(steps.every((step) => step.status === "completed")).toBe(true);
    expect(peak).toBe(2);
  });

  it("clamps concurrency to 1..3", () => {
    expect(clampConcurrency(undefined)).toBe(1);
    expect(clampConcurrency(0)).toBe(1);
    expect(clampConcurrency(2.7)).toBe(2);
    expect(clampConcurrency(10)).toBe(3);
  });
});
