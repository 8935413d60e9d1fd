import { describe, it, expect } from "vitest";
import type { AnalysisResult, Factor } from "../types.js";
import { verify } from "../verifier.js";

const REASONING =
  "Research across two outlets points to a modest lead for yes, but the schedule remains uncertain.";

function factor(sourceUrl: string, overrides: Partial<Factor> = {}): Factor {
  return { description: `Reported by ${sourceUrl}`, impact: "up", sourceUrl, stance: "bull", ...overrides };
}

function analysis(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  const factors = [factor("https://news.example.com/a"), factor("https://blog.example.org/b")];
  return {
    subjectId: "TEST-EVENT",
    marketProbability: 0.4,
    predictedProbability: 55,
    confidence: "medium",
    reasoning: REASONING,
    factors,
    sources: factors.map((f) => f.sourceUrl),
    probabilitySource: "sentiment",
    generatedAt: "2026-03-01T12:00:00.000Z",
    ...overrides,
  };
}

describe("verify", () => {
  it("passes a well-formed analysis", () => {
    expect(verify(analysis())).toEqual({
      passed: true,
      issues: [],
      checkedSources: 2,
      suggestedEscalation: false,
    });
  });

  it("flags an out-of-range prediction and suggests escalation", () => {
    const report = verify(analysis({ predictedProbability: 150 }));

    expect(report.passed).toBe(false);
    expect(report.issues).toEqual(["predicted probability out of range [0, 100]: 150"]);
    expect(report.suggestedEscalation).toBe(true);
  });

  it("flags an out-of-range market probability", () => {
    expect(verify(analysis({ marketProbability: 40 })).issues).toEqual([
      "market probability out of range [0, 1]: 40",
    ]);
  });

  it("flags duplicate and unbacked sources", () => {
    const report = verify(
      analysis({
        sources: ["https://news.example.com/a", "https://news.example.com/a", "https://other.example.com/z"],
      })
    );

    expect(report.issues).toEqual([
      "duplicate sources: https://news.example.com/a",
      "sources not backed by any factor: https://other.example.com/z",
    ]);
    expect(report.checkedSources).toBe(3);
  });

  it("requires distinct domains above low confidence", () => {
    const factors = [factor("https://news.example.com/a"), factor("https://www.news.example.com/b")];
    const sources = factors.map((f) => f.sourceUrl);

    expect(verify(analysis({ factors, sources })).issues).toEqual([
      "medium confidence needs at least 2 distinct source domains, found 1",
    ]);
    expect(verify(analysis({ factors, sources, confidence: "low" })).passed).toBe(true);
    expect(verify(analysis({ factors, sources }), undefined, { minCitationDomains: 1 }).passed).toBe(true);
  });

  it("bounds the reasoning length", () => {
    expect(verify(analysis({ reasoning: "too short" })).issues).toEqual(["reasoning length 9 outside [50, 2000]"]);
    expect(verify(analysis({ reasoning: "x".repeat(2001) })).issues).toEqual([
      "reasoning length 2001 outside [50, 2000]",
    ]);
  });

  it("rejects a high-confidence prediction that copies the market", () => {
    const factors = [
      factor("https://a.example.com"),
      factor("https://b.example.com"),
      factor("https://c.example.com"),
    ];
    const report = verify(
      analysis({ confidence: "high", predictedProbability: 40, factors, sources: factors.map((f) => f.sourceUrl) })
    );

    expect(report.issues).toEqual(["high-confidence prediction equals the market price"]);
  });

  it("checks factor URLs against the research summary", () => {
    const base = analysis();
    const summary = {
      subjectId: "TEST-EVENT",
      title: "Will the test event happen?",
      mode: "fast" as const,
      factors: base.factors.slice(0, 1),
      narrative: "",
      queriesUsed: [],
      totalSourcesFound: 1,
      droppedUnsourced: 0,
      totalCost: 0,
      budgetCeiling: 1,
      budgetExhausted: false,
      steps: [],
    };

    expect(verify(base, summary).issues).toEqual([
      "factor URLs not gathered by research: https://blog.example.org/b",
    ]);
  });
});
