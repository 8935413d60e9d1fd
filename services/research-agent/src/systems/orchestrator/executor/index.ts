export {
  executeStep,
  skipStep,
  toStep,
  resolveContentUrls,
  type ExecutionContext,
} from "./step-executor.js";
export {
  runPlan,
  clampConcurrency,
  MAX_CONCURRENCY,
  type RunPlanOptions,
  type PlanRunOutcome,
} from "./plan-runner.js";
