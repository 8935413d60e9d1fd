/**
 * @sibyl/research-agent CLI
 *
 *   research run <ticker> [fast|standard|deep] [budgetUsd]
 *   research recover [--resume]
 *
 * Results are printed as JSON; failures as a redacted {kind, message}.
 */

import { z } from "zod";
import { ConfigError, getBaseConfig, logger, toRedactedError, ValidationError, type BaseConfig } from "@sibyl/core";
import { isSupabaseConfigured, shutdownEventStore } from "@sibyl/db";
import { getExaClient } from "@sibyl/exa";
import { getKalshiClient } from "@sibyl/kalshi";
import { ExaResearchProvider } from "./domains/exa/research-provider.js";
import { KalshiMarketData } from "./domains/kalshi/market-data.js";
import { ClaudeExecutor } from "./shared/executor/claude.js";
import { createSupabaseObservability } from "./shared/observability/supabase.js";
import type { IObservability } from "./shared/observability/types.js";
import { FileStore } from "./shared/store/file.js";
import { createSynthesisCritic } from "./systems/orchestrator/agents/critic/index.js";
import { RunStore } from "./systems/orchestrator/run-store.js";
import { ResearchModeSchema } from "./systems/orchestrator/schemas.js";
import { ResearchOrchestrator } from "./systems/orchestrator/system.js";
import { StoreHandleStore, SupabaseHandleStore, type HandleStore } from "./systems/orchestrator/tracker/handle-store.js";
import { AsyncTaskTracker, type RecoveryReport } from "./systems/orchestrator/tracker/tracker.js";

const USAGE = `Usage:
  research run <ticker> [fast|standard|deep] [budgetUsd]
  research recover [--resume]`;

const BudgetArgSchema = z.coerce.number().positive();

interface Runtime {
  config: BaseConfig;
  observability: IObservability;
  fileStore: FileStore;
  tracker: AsyncTaskTracker;
  provider: ExaResearchProvider;
}

function createRuntime(): Runtime {
  const config = getBaseConfig();
  logger.setLevel(config.env.logLevel);

  const observability = createSupabaseObservability({
    systemName: "research-orchestrator",
    logLevel: config.env.logLevel,
  });
  const fileStore = new FileStore({ basePath: config.env.dataDir });
  const handles: HandleStore = isSupabaseConfigured()
    ? new SupabaseHandleStore()
    : new StoreHandleStore(fileStore);
  const exa = getExaClient();
  if (!exa.isConfigured()) {
    throw new ConfigError("EXA_API_KEY is not set", { variable: "EXA_API_KEY" });
  }
  const provider = new ExaResearchProvider(exa);
  const tracker = new AsyncTaskTracker({ store: handles, provider, observability });

  return { config, observability, fileStore, tracker, provider };
}

function parseRunArgs(args: string[], config: BaseConfig) {
  const [subjectId, modeArg, budgetArg] = args;
  if (!subjectId) {
    throw new ValidationError(`missing ticker\n${USAGE}`, { field: "ticker" });
  }

  const mode = ResearchModeSchema.safeParse(modeArg ?? config.agent.defaultMode);
  if (!mode.success) {
    throw new ValidationError(`unknown mode "${modeArg}"; expected fast, standard or deep`, {
      field: "mode",
      received: modeArg,
    });
  }

  let budgetCeiling = config.agent.budgetUsd;
  if (budgetArg !== undefined) {
    const budget = BudgetArgSchema.safeParse(budgetArg);
    if (!budget.success) {
      throw new ValidationError(`budget must be a positive number of dollars, got "${budgetArg}"`, {
        field: "budget",
        received: budgetArg,
      });
    }
    budgetCeiling = budget.data;
  }

  return { subjectId, mode: mode.data, budgetCeiling };
}

async function runCommand(args: string[], signal: AbortSignal): Promise<void> {
  const runtime = createRuntime();
  const { config, observability } = runtime;
  const input = parseRunArgs(args, config);

  const orchestrator = new ResearchOrchestrator({
    marketData: new KalshiMarketData(getKalshiClient()),
    provider: runtime.provider,
    tracker: runtime.tracker,
    observability,
    synthesisCritic: createSynthesisCritic(new ClaudeExecutor(), observability),
    runStore: new RunStore(runtime.fileStore, { mirrorToSupabase: true }),
    policy: {
      escalationEnabled: config.agent.escalationEnabled,
      evDeltaThreshold: config.agent.evDeltaThreshold,
      minVolume24h: config.agent.minVolume24h,
      maxConcurrency: config.agent.maxConcurrency,
      minCitationDomains: config.agent.minCitationDomains,
      deepTaskTimeoutSeconds: config.agent.deepTaskTimeoutSeconds,
      deepTaskPollSeconds: config.agent.deepTaskPollSeconds,
    },
  });

  const result = await orchestrator.run(input, { signal, initiatedBy: "cli" });
  console.log(JSON.stringify(result, null, 2));
}

function describeReport(report: RecoveryReport): Record<string, unknown> {
  const base = {
    outcome: report.outcome,
    runId: report.handle.runId,
    stepId: report.handle.stepId,
    subjectId: report.handle.subjectId,
    externalTaskId: report.handle.externalTaskId,
  };

  switch (report.outcome) {
    case "recovered":
      return { ...base, status: report.task.status, output: report.task.output, cost: report.task.cost };
    case "running":
      return { ...base, status: report.status };
    case "unrecoverable":
    case "deferred":
      return { ...base, reason: report.reason };
  }
}

async function recoverCommand(args: string[], signal: AbortSignal): Promise<void> {
  const { config, tracker } = createRuntime();
  const resume = args.includes("--resume")
    ? {
        timeoutMs: config.agent.deepTaskTimeoutSeconds * 1000,
        intervalMs: config.agent.deepTaskPollSeconds * 1000,
      }
    : undefined;

  const reports = await tracker.reconcileOrphans({ resume, signal });
  console.log(JSON.stringify(reports.map(describeReport), null, 2));
}

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);
  const controller = new AbortController();
  const onSignal = (): void => controller.abort();
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    switch (command) {
      case "run":
        await runCommand(args, controller.signal);
        break;
      case "recover":
        await recoverCommand(args, controller.signal);
        break;
      default:
        throw new ValidationError(command ? `unknown command "${command}"\n${USAGE}` : USAGE, {
          field: "command",
        });
    }
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await shutdownEventStore();
  }
}

main().catch((error: unknown) => {
  console.error(JSON.stringify({ error: toRedactedError(error) }, null, 2));
  process.exitCode = 1;
});
