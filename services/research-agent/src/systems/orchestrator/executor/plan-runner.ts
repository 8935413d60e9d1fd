/**
 * Plan Runner
 * Phases run strictly in order; steps within a phase fan out up to maxConcurrency
 */

import type { Phase, Plan, Step } from "../types.js";
import { executeStep, skipStep, toStep, type ExecutionContext } from "./step-executor.js";

export const MAX_CONCURRENCY = 3;

export interface RunPlanOptions {
  maxConcurrency?: number;
}

export interface PlanRunOutcome {
  steps: Step[];
  budgetExhausted: boolean;
}

function phasesInOrder(plan: Plan): Phase[] {
  const phases: Phase[] = [];
  for (const step of plan.steps) {
    if (!phases.includes(step.phase)) {
      phases.push(step.phase);
    }
  }
  return phases;
}

export function clampConcurrency(requested: number | undefined): number {
  const value = Math.floor(requested ?? 1);
  if (!Number.isFinite(value) || value < 1) return 1;
  return Math.min(value, MAX_CONCURRENCY);
}

/**
 * Execute every step of the plan.
 *
 * The first budget refusal in a phase stops it: steps not yet started there
 * are skipped and the next phase still runs (it will usually be refused too).
 */
export async function runPlan(
  plan: Plan,
  ctx: ExecutionContext,
  options: RunPlanOptions = {}
): Promise<PlanRunOutcome> {
  const steps = plan.steps.map(toStep);
  const stepCtx: ExecutionContext = { ...ctx, priorSteps: [...ctx.priorSteps, ...steps] };
  const concurrency = clampConcurrency(options.maxConcurrency);
  let budgetExhausted = false;

  for (const phase of phasesInOrder(plan)) {
    const phaseSteps = steps.filter((step) => step.phase === phase);
    let next = 0;
    let halted = false;

    const worker = async (): Promise<void> => {
      while (!halted && next < phaseSteps.length) {
        const step = phaseSteps[next++];
        if (!step) return;
        await executeStep(step, stepCtx);
        if (step.status === "skipped") {
          halted = true;
        }
      }
    };

    await Promise.all(
      Array.from({ length: Math.min(concurrency, phaseSteps.length) }, () => worker())
    );

    if (halted) {
      budgetExhausted = true;
      for (const step of phaseSteps) {
        if (step.status === "pending") {
          await skipStep(step, stepCtx, "budget_exhausted", `phase ${phase} halted by budget`);
        }
      }
    }
  }

  return { steps, budgetExhausted };
}
