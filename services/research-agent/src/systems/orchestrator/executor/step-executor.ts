/**
 * Step Executor
 * Runs one planned step against the ledger and the research provider
 */

import { isProviderError, redactSecrets, toRedactedError } from "@sibyl/core";
import type { IObservability } from "../../../shared/observability/types.js";
import type {
  DeepTaskSnapshot,
  ResearchProvider,
  ResearchSubject,
  SourceDocument,
} from "../capabilities.js";
import type { BudgetLedger } from "../ledger.js";
import type { AsyncTaskTracker, PollOutcome } from "../tracker/tracker.js";
import type {
  Action,
  FetchContentsParams,
  PlannedStep,
  Step,
  StepError,
  StepErrorKind,
  StepResult,
} from "../types.js";
import { assertNever } from "../types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ExecutionContext {
  runId: string;
  subject: ResearchSubject;
  ledger: BudgetLedger;
  provider: ResearchProvider;
  tracker: AsyncTaskTracker;
  /** Every step of the run so far; fetch_contents resolves its URLs from these */
  priorSteps: readonly Step[];
  signal?: AbortSignal;
  observability?: IObservability;
  now?: () => Date;
}

type ActionOutcome =
  | { ok: true; result: StepResult; cost: number }
  | { ok: false; error: StepError; cost: number };

export function toStep(planned: PlannedStep): Step {
  return { ...planned, status: "pending", cost: 0 };
}

function toSnippets(documents: SourceDocument[], origin: Action, stepId: string): StepResult["snippets"] {
  return documents.map((doc) => ({
    text: doc.text,
    title: doc.title,
    url: doc.url && doc.url.trim().length > 0 ? doc.url : null,
    publishedDate: doc.publishedDate,
    origin,
    stepId,
  }));
}

/**
 * Unique URLs gathered by completed steps of the referenced phases, in step order
 */
export function resolveContentUrls(steps: readonly Step[], params: FetchContentsParams): string[] {
  const urls = new Set<string>();
  for (const step of steps) {
    if (step.status !== "completed" || !params.fromPhases.includes(step.phase)) {
      continue;
    }
    for (const snippet of step.result?.snippets ?? []) {
      if (snippet.url) {
        urls.add(snippet.url);
      }
    }
  }
  return [...urls].slice(0, params.limit);
}

function deepTaskResult(task: DeepTaskSnapshot, stepId: string): StepResult {
  return {
    snippets: toSnippets(
      task.citations.map((citation) => ({
        ...citation,
        text: citation.text || citation.title || "",
      })),
      "deep_task",
      stepId
    ),
    deepOutput: task.output,
    externalTaskId: task.taskId,
  };
}

async function runAction(step: Step, ctx: ExecutionContext): Promise<ActionOutcome> {
  const now = ctx.now ?? (() => new Date());

  switch (step.action) {
    case "search": {
      const { recencyDays, ...params } = step.params;
      const { value, cost } = await ctx.provider.search(
        {
          ...params,
          startPublishedDate: recencyDays
            ? new Date(now().getTime() - recencyDays * DAY_MS).toISOString()
            : undefined,
        },
        ctx.signal
      );
      return { ok: true, result: { snippets: toSnippets(value, "search", step.id) }, cost };
    }

    case "fetch_contents": {
      const urls = resolveContentUrls(ctx.priorSteps, step.params);
      if (urls.length === 0) {
        return { ok: true, result: { snippets: [] }, cost: 0 };
      }
      const { value, cost } = await ctx.provider.fetchContents(urls, { includeText: true }, ctx.signal);
      return { ok: true, result: { snippets: toSnippets(value, "fetch_contents", step.id) }, cost };
    }

    case "ask": {
      const { value, cost } = await ctx.provider.ask(
        step.params.query,
        { includeText: step.params.includeText },
        ctx.signal
      );
      return {
        ok: true,
        result: { snippets: toSnippets(value.citations, "ask", step.id), answerText: value.answer },
        cost,
      };
    }

    case "deep_task": {
      const { handle } = await ctx.tracker.begin(
        { subjectId: ctx.subject.id, runId: ctx.runId, stepId: step.id },
        step.params.instructions
      );
      let outcome: PollOutcome;
      try {
        outcome = await ctx.tracker.poll(handle, {
          timeoutMs: step.params.timeoutSeconds * 1000,
          intervalMs: step.params.pollIntervalSeconds * 1000,
          signal: ctx.signal,
        });
      } catch (error) {
        ctx.tracker.release(handle);
        throw error;
      }

      switch (outcome.kind) {
        case "terminal": {
          const { task } = outcome;
          await ctx.tracker.complete(outcome.handle);
          if (task.status === "completed") {
            return { ok: true, result: deepTaskResult(task, step.id), cost: task.cost ?? 0 };
          }
          const detail = task.error ? `: ${redactSecrets(task.error)}` : "";
          return {
            ok: false,
            error: { kind: "api", message: `deep task ${task.status}${detail}` },
            cost: task.cost ?? 0,
          };
        }
        case "timeout":
          ctx.tracker.release(outcome.handle);
          return {
            ok: false,
            error: {
              kind: "timeout",
              message: `deep task still ${outcome.lastStatus} after ${step.params.timeoutSeconds}s`,
            },
            cost: 0,
          };
        case "cancelled":
          ctx.tracker.release(outcome.handle);
          return { ok: false, error: { kind: "cancelled", message: "run cancelled" }, cost: 0 };
        default:
          return assertNever(outcome, "poll outcome");
      }
    }

    default:
      return assertNever(step, "step action");
  }
}

async function report(step: Step, ctx: ExecutionContext): Promise<void> {
  await ctx.observability?.recordEvent({
    type: `step.${step.status}`,
    correlationId: ctx.runId,
    stepId: step.id,
    targetId: ctx.subject.id,
    level: step.status === "failed" ? "warn" : "debug",
    data: {
      phase: step.phase,
      action: step.action,
      estimatedCost: step.estimatedCost,
      cost: step.cost,
      errorKind: step.error?.kind,
    },
  });
}

function finish(step: Step, ctx: ExecutionContext, status: "completed" | "failed" | "skipped"): void {
  step.status = status;
  step.finishedAt = (ctx.now ?? (() => new Date()))().toISOString();
}

/**
 * Mark a step that never ran
 */
export async function skipStep(
  step: Step,
  ctx: ExecutionContext,
  kind: Extract<StepErrorKind, "budget_exhausted" | "cancelled">,
  message: string
): Promise<Step> {
  step.error = { kind, message };
  finish(step, ctx, kind === "cancelled" ? "failed" : "skipped");
  await report(step, ctx);
  return step;
}

/**
 * Execute a step in place.
 *
 * Provider failures end as a failed step; anything else is a programming
 * error and propagates.
 */
export async function executeStep(step: Step, ctx: ExecutionContext): Promise<Step> {
  if (ctx.signal?.aborted) {
    return skipStep(step, ctx, "cancelled", "run cancelled");
  }

  if (!ctx.ledger.reserve(step.estimatedCost)) {
    return skipStep(
      step,
      ctx,
      "budget_exhausted",
      `reservation of $${step.estimatedCost} refused with $${ctx.ledger.remaining()} remaining`
    );
  }

  step.status = "running";
  step.startedAt = (ctx.now ?? (() => new Date()))().toISOString();

  let outcome: ActionOutcome;
  try {
    outcome = await runAction(step, ctx);
  } catch (error) {
    if (!isProviderError(error)) {
      throw error;
    }
    const redacted = toRedactedError(error);
    const kind: StepErrorKind = ctx.signal?.aborted ? "cancelled" : error.kind;
    outcome = { ok: false, error: { kind, message: redacted.message }, cost: 0 };
  }

  ctx.ledger.reconcile(step.estimatedCost, outcome.cost);
  step.cost = outcome.cost;

  if (outcome.ok) {
    step.result = outcome.result;
    finish(step, ctx, "completed");
  } else {
    step.error = outcome.error;
    finish(step, ctx, "failed");
  }

  await report(step, ctx);
  return step;
}
