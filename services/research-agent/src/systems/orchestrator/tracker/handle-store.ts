/**
 * Handle Stores
 * Durable records of in-flight deep tasks, keyed task-handles/<subject>/<run>/<step>
 */

import { z } from "zod";
import { logger, ValidationError } from "@sibyl/core";
import { taskHandleRepo, type DeepTaskHandleRow } from "@sibyl/db";
import type { IStore } from "../../../shared/store/types.js";

export const HANDLE_PREFIX = "task-handles/";

export const DeepTaskStatusSchema = z.enum(["pending", "running", "completed", "failed", "canceled"]);

export const TaskHandleSchema = z.object({
  key: z.string().min(1),
  runId: z.string().min(1),
  stepId: z.string().min(1),
  subjectId: z.string().min(1),
  externalTaskId: z.string().min(1),
  fingerprint: z.string().length(16),
  status: DeepTaskStatusSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type TaskHandle = z.infer<typeof TaskHandleSchema>;

export interface HandleKey {
  subjectId: string;
  runId: string;
  stepId: string;
}

export function handleKey(key: HandleKey): string {
  return `${HANDLE_PREFIX}${key.subjectId}/${key.runId}/${key.stepId}`;
}

export interface HandleStore {
  /** Insert or replace; resolves only once the record is durable */
  put(handle: TaskHandle): Promise<void>;
  get(key: string): Promise<TaskHandle | null>;
  list(): Promise<TaskHandle[]>;
  remove(key: string): Promise<boolean>;
}

// ============================================
// IStore-backed (file by default)
// ============================================

const log = logger.child({ component: "HandleStore" });

export class StoreHandleStore implements HandleStore {
  constructor(private readonly store: IStore) {}

  async put(handle: TaskHandle): Promise<void> {
    await this.store.write(handle.key, handle);
  }

  async get(key: string): Promise<TaskHandle | null> {
    const raw = await this.store.read(key);
    if (raw === null) {
      return null;
    }
    const parsed = TaskHandleSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`corrupt task handle at ${key}`, {
        field: key,
        received: parsed.error.issues.map((issue) => issue.message).join("; "),
      });
    }
    return parsed.data;
  }

  async list(): Promise<TaskHandle[]> {
    const keys = await this.store.list(HANDLE_PREFIX);
    const handles: TaskHandle[] = [];

    for (const key of keys) {
      const parsed = TaskHandleSchema.safeParse(await this.store.read(key));
      if (parsed.success) {
        handles.push(parsed.data);
      } else {
        log.warn("Skipping unreadable task handle", { key });
      }
    }

    return handles;
  }

  async remove(key: string): Promise<boolean> {
    return this.store.delete(key);
  }
}

// ============================================
// Supabase (deep_task_handles table)
// ============================================

function fromRow(row: DeepTaskHandleRow): TaskHandle {
  return TaskHandleSchema.parse({
    key: row.key,
    runId: row.run_id,
    stepId: row.step_id,
    subjectId: row.subject_id,
    externalTaskId: row.external_task_id,
    fingerprint: row.fingerprint,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  });
}

export class SupabaseHandleStore implements HandleStore {
  async put(handle: TaskHandle): Promise<void> {
    await taskHandleRepo.upsert({
      key: handle.key,
      run_id: handle.runId,
      step_id: handle.stepId,
      subject_id: handle.subjectId,
      external_task_id: handle.externalTaskId,
      fingerprint: handle.fingerprint,
      status: handle.status,
      created_at: handle.createdAt,
      updated_at: handle.updatedAt,
    });
  }

  async get(key: string): Promise<TaskHandle | null> {
    const row = await taskHandleRepo.get(key);
    return row ? fromRow(row) : null;
  }

  async list(): Promise<TaskHandle[]> {
    const rows = await taskHandleRepo.list(HANDLE_PREFIX);
    return rows.map(fromRow);
  }

  async remove(key: string): Promise<boolean> {
    return taskHandleRepo.remove(key);
  }
}
