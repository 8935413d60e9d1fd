/**
 * Run Store
 * Persists completed runs under runs/<subjectId>/<runId>, optionally mirrored to agent_runs
 */

import { createHash } from "crypto";
import { z } from "zod";
import { logger, ValidationError } from "@sibyl/core";
import { agentRunRepo, isSupabaseConfigured } from "@sibyl/db";
import type { IStore } from "../../shared/store/types.js";
import { AgentRunResultSchema } from "./schemas.js";
import type { AgentRunResult } from "./types.js";

const log = logger.child({ component: "RunStore" });

export const RUN_SCHEMA_VERSION = "agent_run_v1";
export const RUN_PREFIX = "runs/";

const StoredRunSchema = z.object({
  schemaVersion: z.literal(RUN_SCHEMA_VERSION),
  savedAt: z.string(),
  contentHash: z.string(),
  result: AgentRunResultSchema,
});

export type StoredRun = z.infer<typeof StoredRunSchema>;

export function runKey(subjectId: string, runId: string): string {
  return `${RUN_PREFIX}${subjectId}/${runId}`;
}

export function contentHashOf(result: AgentRunResult): string {
  return createHash("sha256").update(JSON.stringify(result)).digest("hex");
}

export interface RunStoreOptions {
  /** Also insert into agent_runs when Supabase is configured */
  mirrorToSupabase?: boolean;
  now?: () => Date;
}

export class RunStore {
  private readonly mirror: boolean;
  private readonly now: () => Date;

  constructor(
    private readonly store: IStore,
    options: RunStoreOptions = {}
  ) {
    this.mirror = options.mirrorToSupabase ?? false;
    this.now = options.now ?? (() => new Date());
  }

  async save(result: AgentRunResult): Promise<StoredRun> {
    const record: StoredRun = {
      schemaVersion: RUN_SCHEMA_VERSION,
      savedAt: this.now().toISOString(),
      contentHash: contentHashOf(result),
      result,
    };

    await this.store.write(runKey(result.subjectId, result.runId), record);
    log.debug("Run saved", { runId: result.runId, subjectId: result.subjectId });

    if (this.mirror && isSupabaseConfigured()) {
      await agentRunRepo.create({
        id: result.runId,
        subject_id: result.subjectId,
        mode: result.mode,
        status: "completed",
        escalated: result.escalated,
        verification_passed: result.verification.passed,
        predicted_probability: result.analysis.predictedProbability,
        market_probability: result.analysis.marketProbability,
        confidence: result.analysis.confidence,
        total_cost_usd: result.totalCost,
        budget_ceiling_usd: result.budgetCeiling,
        budget_exhausted: result.budgetExhausted,
        result,
        content_hash: record.contentHash,
      });
    }

    return record;
  }

  /**
   * Returns null when absent; throws ValidationError when the record does not parse
   */
  async load(subjectId: string, runId: string): Promise<StoredRun | null> {
    const key = runKey(subjectId, runId);
    const raw = await this.store.read(key);
    if (raw === null) return null;

    const parsed = StoredRunSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`stored run ${key} is invalid`, {
        field: parsed.error.issues[0]?.path.join("."),
      });
    }
    return parsed.data;
  }

  /**
   * Run ids for a subject, or `<subjectId>/<runId>` keys across all subjects
   */
  async list(subjectId?: string): Promise<string[]> {
    const prefix = subjectId ? `${RUN_PREFIX}${subjectId}/` : RUN_PREFIX;
    const keys = await this.store.list(prefix);
    return keys.map((key) => key.slice(prefix.length));
  }
}
