/**
 * Research Orchestrator
 * Public entry point of @sibyl/research-agent
 */

export {
  ResearchOrchestrator,
  createResearchOrchestrator,
  type RunInput,
  type OrchestratorDependencies,
} from "./system.js";
export { RunStore, runKey, contentHashOf, RUN_SCHEMA_VERSION, type StoredRun } from "./run-store.js";
export { BudgetLedger, type LedgerSnapshot } from "./ledger.js";
export { RunStateMachine } from "./state.js";
export { buildPlan, buildCriticPlan, type PlanOptions } from "./plan/builder.js";
export { verify, type VerifierPolicy } from "./verifier.js";
export { decideEscalation, Supervisor } from "./escalation/index.js";
export { synthesize, type SynthesizeFn } from "./synthesis/index.js";
export { runPlan, executeStep } from "./executor/index.js";
export {
  AsyncTaskTracker,
  StoreHandleStore,
  SupabaseHandleStore,
  handleKey,
  type HandleStore,
  type RecoveryReport,
  type TaskHandle,
} from "./tracker/index.js";
export { createSynthesisCritic, CriticAgent } from "./agents/critic/index.js";
export {
  CritiqueFailedError,
  type MarketDataProvider,
  type MarketSnapshot,
  type ResearchProvider,
  type ResearchSubject,
  type SynthesisCapability,
  type CritiqueBundle,
} from "./capabilities.js";
export * from "./schemas.js";
export * from "./types.js";

// Wiring for embedders
export { ExaResearchProvider } from "../../domains/exa/research-provider.js";
export { KalshiMarketData } from "../../domains/kalshi/market-data.js";
export { ClaudeExecutor } from "../../shared/executor/claude.js";
export type { IExecutor } from "../../shared/executor/types.js";
export { ConsoleObservability, NoOpObservability } from "../../shared/observability/console.js";
export { SupabaseObservability, createSupabaseObservability } from "../../shared/observability/supabase.js";
export type { IObservability } from "../../shared/observability/types.js";
export { FileStore } from "../../shared/store/file.js";
export { MemoryStore } from "../../shared/store/memory.js";
export type { IStore } from "../../shared/store/types.js";
