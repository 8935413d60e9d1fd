import { describe, it, expect } from "vitest";
import { toStep } from "../executor/step-executor.js";
import { BudgetLedger } from "../ledger.js";
import { buildPlan } from "../plan/builder.js";
import { classifyEvidence, collectEvidence, diceSimilarity, stanceOf } from "../synthesis/factors.js";
import {
  confidenceFor,
  distinctDomains,
  findExplicitProbability,
  firstExplicitMention,
  sentimentProbability,
} from "../synthesis/probability.js";
import { scoreText } from "../synthesis/lexicon.js";
import { synthesize } from "../synthesis/synthesizer.js";
import type { Snippet, Step, StepResult } from "../types.js";
import { NOW, testMarket, testSubject } from "./fakes.js";

const plan = buildPlan(testSubject(), "standard", 0.25, { now: NOW });

function completed(id: string, result: StepResult): Step {
  const planned = plan.steps.find((step) => step.id === id);
  if (!planned) throw new Error(`no step ${id}`);
  return { ...toStep(planned), status: "completed", result };
}

function snippet(stepId: string, url: string | null, text: string, title?: string): Snippet {
  return { text, title, url, origin: "search", stepId };
}

describe("scoreText", () => {
  it("counts every keyword occurrence", () => {
    expect(scoreText("Strong rally, strong approval. Some risk remains.")).toEqual({ positive: 4, negative: 1 });
  });
});

describe("stanceOf", () => {
  it("needs a margin of one keyword", () => {
    expect(stanceOf({ positive: 2, negative: 1 })).toBe("bull");
    expect(stanceOf({ positive: 0, negative: 1 })).toBe("bear");
    expect(stanceOf({ positive: 1, negative: 1 })).toBe("neutral");
  });
});

describe("sentimentProbability", () => {
  it("is 0.5 without keyword hits", () => {
    expect(sentimentProbability(0, 0)).toBe(0.5);
  });

  it("moves with the keyword balance inside [0.2, 0.8]", () => {
    expect(sentimentProbability(3, 1)).toBeCloseTo(0.65);
    expect(sentimentProbability(10, 0)).toBeCloseTo(0.8);
    expect(sentimentProbability(0, 4)).toBeCloseTo(0.2);
  });
});

describe("explicit probabilities", () => {
  it("finds the earliest stated probability", () => {
    expect(findExplicitProbability("Odds moved; analysts now see a 62% chance, up from a probability of 40%.")).toEqual({
      probability: 0.62,
      match: "62% chance",
    });
    expect(findExplicitProbability("a probability of 35%")).toEqual({ probability: 0.35, match: "probability of 35%" });
    expect(findExplicitProbability("a 150% chance")).toBeNull();
  });

  it("prefers deep research output over answers and snippets", () => {
    const mention = firstExplicitMention([
      { origin: "snippet", text: "a 30% chance" },
      { origin: "answer", text: "nothing stated" },
      { origin: "deep_task", text: "roughly 70 percent likelihood" },
    ]);
    expect(mention).toEqual({ probability: 0.7, match: "70 percent likelihood", origin: "deep_task" });
  });
});

describe("confidenceFor", () => {
  it("grades by explicit mention and domain spread", () => {
    expect(confidenceFor(true, 3)).toBe("high");
    expect(confidenceFor(false, 3)).toBe("medium");
    expect(confidenceFor(true, 1)).toBe("low");
    expect(distinctDomains(["https://www.a.example.com/x", "https://a.example.com/y", "not a url"])).toBe(1);
  });
});

describe("collectEvidence", () => {
  it("drops unsourced snippets and near duplicates, in step order", () => {
    const steps = [
      completed("background-1", {
        snippets: [
          snippet("background-1", "https://a.example.com/1", "The committee approved the budget on Tuesday"),
          snippet("background-1", null, "no source"),
          snippet("background-1", "  ", "blank source"),
        ],
      }),
      completed("current_news-1", {
        snippets: [snippet("current_news-1", "https://b.example.com/2", "The committee approved the budget on Tuesday.")],
      }),
      {
        ...completed("current_news-2", { snippets: [snippet("current_news-2", "https://c.example.com", "ignored")] }),
        status: "failed" as const,
      },
    ];

    const evidence = collectEvidence(steps);

    expect(evidence.snippets.map((s) => s.url)).toEqual(["https://a.example.com/1"]);
    expect(evidence.droppedUnsourced).toBe(2);
    expect(evidence.droppedDuplicates).toBe(1);
  });

  it("scores identical strings as fully similar", () => {
    expect(diceSimilarity("night", "night")).toBe(1);
    expect(diceSimilarity("night", "nacht")).toBe(0.25);
  });
});

describe("classifyEvidence", () => {
  it("keeps the first snippet per URL", () => {
    const { factors, totals } = classifyEvidence([
      { ...snippet("s", "https://a.example.com", "Strong gains"), url: "https://a.example.com" },
      { ...snippet("s", "https://a.example.com", "Sudden crash"), url: "https://a.example.com" },
    ]);

    expect(factors).toEqual([
      { description: "Strong gains", impact: "up", sourceUrl: "https://a.example.com", stance: "bull" },
    ]);
    expect(totals).toEqual({ positive: 2, negative: 1 });
  });
});

describe("synthesize", () => {
  const bull = "https://news.example.com/a";
  const bear = "https://blog.example.org/b";
  const neutral = "https://analysis.example.net/c";

  function evidenceSteps(): Step[] {
    const background = completed("background-1", {
      snippets: [
        snippet("background-1", bull, "Strong rally expected after approval", "Outlook"),
        snippet("background-1", bear, "Officials warn of risk and concern over delays"),
        snippet("background-1", null, "unsourced claim"),
        snippet("background-1", bull, "Strong rally expected after approval", "Outlook"),
      ],
    });
    const ask = completed("expert_opinions-1", {
      snippets: [{ ...snippet("expert_opinions-1", neutral, "Neutral commentary on the schedule"), origin: "ask" }],
      answerText: "Markets imply a 65% chance of passage.",
    });
    return [background, ask];
  }

  it("builds a cited analysis from completed steps", () => {
    const ledger = new BudgetLedger(0.25);
    ledger.reserve(0.08);
    ledger.reconcile(0.08, 0.02);

    const { summary, analysis } = synthesize({
      plan,
      steps: evidenceSteps(),
      market: testMarket(),
      ledger,
      budgetExhausted: false,
      now: NOW,
    });

    expect(analysis.factors).toEqual([
      { description: "Outlook: Strong rally expected after approval", impact: "up", sourceUrl: bull, stance: "bull" },
      { description: "Officials warn of risk and concern over delays", impact: "down", sourceUrl: bear, stance: "bear" },
      { description: "Neutral commentary on the schedule", impact: "unclear", sourceUrl: neutral, stance: "neutral" },
    ]);
    expect(analysis.sources).toEqual([bull, bear, neutral]);
    expect(analysis.predictedProbability).toBe(65);
    expect(analysis.probabilitySource).toBe("explicit");
    expect(analysis.confidence).toBe("high");
    expect(analysis.marketProbability).toBe(0.4);
    expect(analysis.generatedAt).toBe(NOW.toISOString());
    expect(analysis.reasoning).toBe(
      'Market "Will the test event happen?" trades at 40.0%. ' +
        "Research gathered 3 sourced factors from 3 domains (1 bullish, 1 bearish, 1 neutral). " +
        'An explicit estimate of 65% ("65% chance") was found in a provider answer. ' +
        "Key factors: Outlook: Strong rally expected after approval | " +
        "Officials warn of risk and concern over delays | Neutral commentary on the schedule"
    );

    expect(summary.queriesUsed).toEqual(["the test event happen"]);
    expect(summary.totalSourcesFound).toBe(3);
    expect(summary.droppedUnsourced).toBe(1);
    expect(summary.totalCost).toBe(0.02);
    expect(summary.budgetCeiling).toBe(0.25);
    expect(summary.narrative).toBe(
      [
        `- [bull] Outlook: Strong rally expected after approval (${bull})`,
        `- [bear] Officials warn of risk and concern over delays (${bear})`,
        `- [neutral] Neutral commentary on the schedule (${neutral})`,
      ].join("\n")
    );
    expect(summary.steps.map((step) => [step.id, step.snippetCount])).toEqual([
      ["background-1", 4],
      ["expert_opinions-1", 1],
    ]);
  });

  it("gives every factor a source URL that appears in sources", () => {
    const { analysis } = synthesize({
      plan,
      steps: evidenceSteps(),
      market: testMarket(),
      ledger: new BudgetLedger(1),
      budgetExhausted: false,
    });

    for (const factor of analysis.factors) {
      expect(factor.sourceUrl.length).toBeGreaterThan(0);
      expect(analysis.sources).toContain(factor.sourceUrl);
    }
  });

  it("falls back to an even estimate without evidence", () => {
    const { summary, analysis } = synthesize({
      plan,
      steps: plan.steps.map(toStep),
      market: testMarket(),
      ledger: new BudgetLedger(0.25),
      budgetExhausted: true,
      now: NOW,
    });

    expect(analysis.predictedProbability).toBe(50);
    expect(analysis.probabilitySource).toBe("sentiment");
    expect(analysis.confidence).toBe("low");
    expect(analysis.factors).toEqual([]);
    expect(analysis.reasoning).toBe(
      'Market "Will the test event happen?" trades at 40.0%. ' +
        "Research gathered 0 sourced factors from 0 domains (0 bullish, 0 bearish, 0 neutral). " +
        "Without an explicit estimate, keyword balance gives 50%. " +
        "Research was cut short by the budget ceiling."
    );
    expect(summary.narrative).toBe("No sourced evidence was gathered.");
    expect(summary.budgetExhausted).toBe(true);
  });
});
