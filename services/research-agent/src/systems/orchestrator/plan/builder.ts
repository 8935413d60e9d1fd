/**
 * Plan Builder
 * Deterministic construction of research plans from a subject and mode
 */

import { createHash } from "crypto";
import { ValidationError } from "@sibyl/core";
import type { ResearchSubject } from "../capabilities.js";
import type {
  Action,
  AskParams,
  DeepTaskParams,
  FetchContentsParams,
  Phase,
  Plan,
  PlannedStep,
  ResearchMode,
  SearchParams,
} from "../types.js";
import { assertNever, DEFAULT_POLICY } from "../types.js";
import {
  type CostOverrides,
  estimateAnswerCost,
  estimateContentsCost,
  estimateDeepTaskCost,
  estimateSearchCost,
  modeSettings,
  roundUsd,
} from "./policy.js";
import { deepTaskInstructions, generateQueries } from "./queries.js";

export interface PlanOptions {
  recencyDays?: number;
  deepTaskTimeoutSeconds?: number;
  deepTaskPollSeconds?: number;
  /** Replace the estimate of every step with the given action */
  costOverrides?: CostOverrides;
  now?: Date;
}

interface ResolvedOptions {
  recencyDays: number;
  deepTaskTimeoutSeconds: number;
  deepTaskPollSeconds: number;
  costOverrides: CostOverrides;
}

// ============================================
// VALIDATION
// ============================================

function requirePositive(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${field} must be positive`, {
      field,
      expected: "> 0",
      received: String(value),
    });
  }
}

function resolveOptions(options: PlanOptions): ResolvedOptions {
  const resolved: ResolvedOptions = {
    recencyDays: options.recencyDays ?? DEFAULT_POLICY.recencyDays,
    deepTaskTimeoutSeconds: options.deepTaskTimeoutSeconds ?? DEFAULT_POLICY.deepTaskTimeoutSeconds,
    deepTaskPollSeconds: options.deepTaskPollSeconds ?? DEFAULT_POLICY.deepTaskPollSeconds,
    costOverrides: options.costOverrides ?? {},
  };

  requirePositive(resolved.recencyDays, "recencyDays");
  if (!Number.isInteger(resolved.recencyDays)) {
    throw new ValidationError("recencyDays must be a whole number of days", {
      field: "recencyDays",
      received: String(resolved.recencyDays),
    });
  }
  requirePositive(resolved.deepTaskTimeoutSeconds, "deepTaskTimeoutSeconds");
  requirePositive(resolved.deepTaskPollSeconds, "deepTaskPollSeconds");

  for (const [action, cost] of Object.entries(resolved.costOverrides)) {
    if (cost !== undefined && (!Number.isFinite(cost) || cost < 0)) {
      throw new ValidationError(`cost override for ${action} must be a non-negative amount`, {
        field: `costOverrides.${action}`,
        received: String(cost),
      });
    }
  }

  return resolved;
}

// ============================================
// STEP FACTORY
// ============================================

class StepList {
  private readonly steps: PlannedStep[] = [];
  private readonly perPhase = new Map<Phase, number>();

  constructor(private readonly overrides: CostOverrides, private readonly idPrefix = "") {}

  private nextId(phase: Phase): string {
    const n = (this.perPhase.get(phase) ?? 0) + 1;
    this.perPhase.set(phase, n);
    return `${this.idPrefix}${phase}-${n}`;
  }

  private cost(action: Action, estimate: number): number {
    return roundUsd(this.overrides[action] ?? estimate);
  }

  search(phase: Phase, params: SearchParams): void {
    this.steps.push({
      id: this.nextId(phase),
      phase,
      action: "search",
      description: `Search${params.category ? ` ${params.category}` : ""}: ${params.query}`,
      estimatedCost: this.cost("search", estimateSearchCost(params)),
      params,
    });
  }

  ask(phase: Phase, params: AskParams): void {
    this.steps.push({
      id: this.nextId(phase),
      phase,
      action: "ask",
      description: `Topic summary for: ${params.query}`,
      estimatedCost: this.cost("ask", estimateAnswerCost(params.includeText)),
      params,
    });
  }

  deepTask(phase: Phase, params: DeepTaskParams): void {
    this.steps.push({
      id: this.nextId(phase),
      phase,
      action: "deep_task",
      description: `Deep research task: ${params.instructions}`,
      estimatedCost: this.cost("deep_task", estimateDeepTaskCost()),
      params,
    });
  }

  fetchContents(phase: Phase, params: FetchContentsParams): void {
    this.steps.push({
      id: this.nextId(phase),
      phase,
      action: "fetch_contents",
      description: `Fetch full text of top ${params.limit} sources from ${params.fromPhases.join(", ")}`,
      estimatedCost: this.cost("fetch_contents", estimateContentsCost(params.limit)),
      params,
    });
  }

  build(): readonly PlannedStep[] {
    return Object.freeze(
      this.steps.map((step) => {
        Object.freeze(step.params);
        return Object.freeze(step);
      })
    );
  }
}

// ============================================
// PLAN
// ============================================

function planIdFor(subjectId: string, mode: ResearchMode, recencyDays: number, stepCount: number): string {
  return createHash("sha256")
    .update(`${subjectId}|${mode}|${recencyDays}|${stepCount}`)
    .digest("hex")
    .slice(0, 12);
}

function freezePlan(
  subject: ResearchSubject,
  mode: ResearchMode,
  budgetCeiling: number,
  recencyDays: number,
  steps: readonly PlannedStep[],
  now: Date
): Plan {
  const total = roundUsd(steps.reduce((sum, step) => sum + step.estimatedCost, 0));
  return Object.freeze({
    planId: planIdFor(subject.id, mode, recencyDays, steps.length),
    subjectId: subject.id,
    mode,
    createdAt: now.toISOString(),
    budgetCeiling,
    totalEstimatedCost: total,
    recencyDays,
    steps,
  });
}

function validateInputs(subject: ResearchSubject, budgetCeiling: number): string[] {
  requirePositive(budgetCeiling, "budgetCeiling");
  const queries = generateQueries(subject.title);
  if (queries.length === 0) {
    throw new ValidationError(`subject ${subject.id} has no usable title`, {
      field: "title",
      received: subject.title,
    });
  }
  return queries;
}

/**
 * Build the research plan for a subject.
 *
 * Pure: the same subject, mode and options always produce the same steps.
 * The plan ignores the budget when choosing steps; the ledger enforces it.
 */
export function buildPlan(
  subject: ResearchSubject,
  mode: ResearchMode,
  budgetCeiling: number,
  options: PlanOptions = {}
): Plan {
  const resolved = resolveOptions(options);
  const queries = validateInputs(subject, budgetCeiling);
  const settings = modeSettings(mode);
  const steps = new StepList(resolved.costOverrides);

  const [primary, newsQuery = primary, analysisQuery = primary] = queries;

  const search = (query: string, extra: Partial<SearchParams> = {}): SearchParams => ({
    query,
    numResults: settings.numResults,
    searchType: settings.searchType,
    includeText: settings.includeText,
    includeHighlights: settings.includeHighlights,
    ...extra,
  });

  switch (mode) {
    case "fast": {
      steps.search("background", search(primary));
      steps.search("background", search(newsQuery));
      steps.fetchContents("synthesis", { fromPhases: ["background"], limit: settings.contentsLimit });
      break;
    }
    case "standard":
    case "deep": {
      const news = { category: "news" as const, recencyDays: resolved.recencyDays };

      steps.search("background", search(primary));
      steps.search("current_news", search(newsQuery, news));
      steps.search("current_news", search(primary, news));
      steps.ask("expert_opinions", { query: primary, includeText: settings.includeText });
      steps.search("expert_opinions", search(analysisQuery));

      const fromPhases: Phase[] = ["background", "current_news", "expert_opinions"];
      if (mode === "deep") {
        steps.deepTask("deep_research", {
          instructions: deepTaskInstructions(subject.title),
          timeoutSeconds: resolved.deepTaskTimeoutSeconds,
          pollIntervalSeconds: resolved.deepTaskPollSeconds,
        });
        fromPhases.push("deep_research");
      }

      steps.fetchContents("synthesis", { fromPhases, limit: settings.contentsLimit });
      break;
    }
    default:
      return assertNever(mode, "research mode");
  }

  return freezePlan(subject, mode, budgetCeiling, resolved.recencyDays, steps.build(), options.now ?? new Date());
}

/**
 * Narrow verification-focused plan run by the research critic
 */
export function buildCriticPlan(
  subject: ResearchSubject,
  mode: ResearchMode,
  budgetCeiling: number,
  options: PlanOptions = {}
): Plan {
  const resolved = resolveOptions(options);
  const queries = validateInputs(subject, budgetCeiling);
  const [primary] = queries;
  const steps = new StepList(resolved.costOverrides, "critic-");

  const verify = (query: string, extra: Partial<SearchParams> = {}): SearchParams => ({
    query,
    numResults: 5,
    searchType: "auto",
    includeText: false,
    includeHighlights: true,
    ...extra,
  });

  steps.search("background", verify(`${primary} fact check`));
  steps.search(
    "current_news",
    verify(`${primary} latest official update`, { category: "news", recencyDays: resolved.recencyDays })
  );

  return freezePlan(subject, mode, budgetCeiling, resolved.recencyDays, steps.build(), options.now ?? new Date());
}
