/**
 * Async Task Tracker
 * Durable handles for long-running deep research tasks
 *
 * A handle is persisted before its task is ever polled, so a crashed run
 * leaves a record that reconcileOrphans() (or the next begin() for the same
 * instructions) can pick up without creating a second task.
 *
 * A run owns its handles while it holds them: this tracker keeps the keys it
 * is working on in memory, and poll() renews updatedAt as a lease. begin()
 * and reconcileOrphans() only touch handles whose lease has run out.
 */

import { createHash } from "crypto";
import { isProviderError, logger, TaskLostError, toRedactedError, type Logger } from "@sibyl/core";
import type {
  DeepTaskSnapshot,
  DeepTaskStatus,
  ResearchProvider,
} from "../capabilities.js";
import { isTerminalTaskStatus } from "../capabilities.js";
import type { IObservability } from "../../../shared/observability/types.js";
import { handleKey, type HandleKey, type HandleStore, type TaskHandle } from "./handle-store.js";

export type DeepTaskCapability = Pick<ResearchProvider, "createDeepTask" | "pollDeepTask" | "listDeepTasks">;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after ms, or as soon as the signal aborts
 */
export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });

export function fingerprintOf(instructions: string): string {
  return createHash("sha256").update(instructions).digest("hex").slice(0, 16);
}

export const DEFAULT_LEASE_MS = 120_000;

export interface TrackerDependencies {
  store: HandleStore;
  provider: DeepTaskCapability;
  observability?: IObservability;
  sleep?: SleepFn;
  now?: () => number;
  /** A handle untouched this long is an orphan; keep it well above the poll interval */
  leaseMs?: number;
}

export interface BeginResult {
  handle: TaskHandle;
  /** True when an orphaned task from an earlier run was taken over */
  adopted: boolean;
}

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
}

export type PollOutcome =
  | { kind: "terminal"; task: DeepTaskSnapshot; handle: TaskHandle }
  | { kind: "timeout"; handle: TaskHandle; lastStatus: DeepTaskStatus }
  | { kind: "cancelled"; handle: TaskHandle };

export type RecoveryReport =
  | { outcome: "recovered"; handle: TaskHandle; task: DeepTaskSnapshot }
  | { outcome: "running"; handle: TaskHandle; status: DeepTaskStatus }
  | { outcome: "unrecoverable"; handle: TaskHandle; reason: string }
  | { outcome: "deferred"; handle: TaskHandle; reason: string };

export interface ReconcileOptions {
  /** Keep polling tasks that are still running, up to this long each */
  resume?: { timeoutMs: number; intervalMs: number };
  signal?: AbortSignal;
}

export class AsyncTaskTracker {
  private readonly store: HandleStore;
  private readonly provider: DeepTaskCapability;
  private readonly observability?: IObservability;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly leaseMs: number;
  private readonly owned = new Set<string>();
  private readonly log: Logger = logger.child({ component: "AsyncTaskTracker" });

  private queue: Promise<void> = Promise.resolve();

  constructor(deps: TrackerDependencies) {
    this.store = deps.store;
    this.provider = deps.provider;
    this.observability = deps.observability;
    this.sleep = deps.sleep ?? abortableSleep;
    this.now = deps.now ?? Date.now;
    this.leaseMs = deps.leaseMs ?? DEFAULT_LEASE_MS;
  }

  /**
   * Serialise store mutations
   */
  private withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }

  /** Polled by a run of this tracker, or by any run within the lease */
  private isHeld(handle: TaskHandle): boolean {
    return this.owned.has(handle.key) || this.now() - Date.parse(handle.updatedAt) < this.leaseMs;
  }

  private isOrphan(handle: TaskHandle): boolean {
    return !isTerminalTaskStatus(handle.status) && !this.isHeld(handle);
  }

  private async record(type: string, handle: TaskHandle): Promise<void> {
    await this.observability?.recordEvent({
      type,
      correlationId: handle.runId,
      targetId: handle.subjectId,
      data: { stepId: handle.stepId, externalTaskId: handle.externalTaskId },
    });
  }

  /**
   * Start (or adopt) the deep task for a step. The handle is durable when this resolves.
   */
  async begin(key: HandleKey, instructions: string): Promise<BeginResult> {
    const fingerprint = fingerprintOf(instructions);
    const newKey = handleKey(key);

    const result = await this.withLock(async (): Promise<BeginResult> => {
      const orphan = (await this.store.list()).find(
        (handle) =>
          handle.subjectId === key.subjectId &&
          handle.fingerprint === fingerprint &&
          this.isOrphan(handle)
      );

      if (orphan) {
        const adopted: TaskHandle = {
          ...orphan,
          key: newKey,
          runId: key.runId,
          stepId: key.stepId,
          updatedAt: this.timestamp(),
        };
        await this.store.put(adopted);
        if (orphan.key !== newKey) {
          await this.store.remove(orphan.key);
        }
        this.owned.add(newKey);
        return { handle: adopted, adopted: true };
      }

      const createdAt = this.timestamp();
      const task = await this.provider.createDeepTask(instructions);
      const handle: TaskHandle = {
        key: newKey,
        runId: key.runId,
        stepId: key.stepId,
        subjectId: key.subjectId,
        externalTaskId: task.taskId,
        fingerprint,
        status: task.status,
        createdAt,
        updatedAt: createdAt,
      };
      await this.store.put(handle);
      this.owned.add(newKey);
      return { handle, adopted: false };
    });

    this.log.info(result.adopted ? "Adopted orphaned deep task" : "Created deep task", {
      runId: key.runId,
      stepId: key.stepId,
      subjectId: key.subjectId,
      externalTaskId: result.handle.externalTaskId,
    });
    await this.record(result.adopted ? "task.adopted" : "task.created", result.handle);

    return result;
  }

  private async updateStatus(handle: TaskHandle, status: DeepTaskStatus): Promise<TaskHandle> {
    const updated: TaskHandle = { ...handle, status, updatedAt: this.timestamp() };
    return this.withLock(async () => {
      if (await this.store.get(handle.key)) {
        await this.store.put(updated);
      }
      return updated;
    });
  }

  /**
   * Poll until the task is terminal, the timeout passes or the signal aborts.
   * Provider errors propagate; the handle stays in every non-terminal case.
   */
  async poll(handle: TaskHandle, options: PollOptions): Promise<PollOutcome> {
    const deadline = this.now() + options.timeoutMs;
    let current = handle;

    for (;;) {
      if (options.signal?.aborted) {
        return { kind: "cancelled", handle: current };
      }

      const task = await this.provider.pollDeepTask(current.externalTaskId);
      // renew the lease at half-life
      const held = this.now() - Date.parse(current.updatedAt);
      if (task.status !== current.status || held >= this.leaseMs / 2) {
        current = await this.updateStatus(current, task.status);
      }

      if (isTerminalTaskStatus(task.status)) {
        return { kind: "terminal", task, handle: current };
      }

      const left = deadline - this.now();
      if (left <= 0) {
        return { kind: "timeout", handle: current, lastStatus: task.status };
      }

      await this.sleep(Math.min(options.intervalMs, left), options.signal);
    }
  }

  /**
   * Forget a handle whose task reached a terminal state
   */
  async complete(handle: TaskHandle): Promise<void> {
    await this.withLock(() => this.store.remove(handle.key));
    this.owned.delete(handle.key);
  }

  /**
   * Stop holding a handle that stays in the store (timeout, cancellation, provider error).
   * Its lease then runs out and a later run or reconcileOrphans() can take it over.
   */
  release(handle: TaskHandle): void {
    this.owned.delete(handle.key);
  }

  async listHandles(): Promise<TaskHandle[]> {
    return this.store.list();
  }

  private async locate(
    handle: TaskHandle,
    listed: DeepTaskSnapshot[]
  ): Promise<{ handle: TaskHandle; task: DeepTaskSnapshot } | null> {
    const byId = listed.find((task) => task.taskId === handle.externalTaskId);
    if (byId) {
      return { handle, task: byId };
    }

    try {
      return { handle, task: await this.provider.pollDeepTask(handle.externalTaskId) };
    } catch (error) {
      if (!(isProviderError(error) && error.statusCode === 404)) {
        throw error;
      }
    }

    const since = Date.parse(handle.createdAt);
    const match = listed
      .filter((task) => fingerprintOf(task.instructions) === handle.fingerprint)
      .filter((task) => Date.parse(task.createdAt) >= since)
      .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt))[0];

    if (!match) {
      return null;
    }

    const rekeyed: TaskHandle = {
      ...handle,
      externalTaskId: match.taskId,
      status: match.status,
      updatedAt: this.timestamp(),
    };
    await this.withLock(() => this.store.put(rekeyed));
    this.log.info("Re-linked handle by fingerprint", {
      runId: handle.runId,
      stepId: handle.stepId,
      previousTaskId: handle.externalTaskId,
      externalTaskId: match.taskId,
    });
    return { handle: rekeyed, task: match };
  }

  /**
   * Resolve every persisted handle whose lease has run out against the provider. Never creates a task.
   */
  async reconcileOrphans(options: ReconcileOptions = {}): Promise<RecoveryReport[]> {
    const handles = await this.store.list();
    if (handles.length === 0) {
      return [];
    }

    const listed = await this.provider.listDeepTasks();
    const reports: RecoveryReport[] = [];

    for (const handle of handles) {
      // a live run is still polling it
      if (this.isHeld(handle)) {
        continue;
      }

      let located: { handle: TaskHandle; task: DeepTaskSnapshot } | null;
      try {
        located = await this.locate(handle, listed);
      } catch (error) {
        const redacted = toRedactedError(error);
        this.log.warn("Could not reach provider for handle", {
          runId: handle.runId,
          stepId: handle.stepId,
          kind: redacted.kind,
        });
        reports.push({ outcome: "deferred", handle, reason: redacted.message });
        continue;
      }

      if (!located) {
        const lost = new TaskLostError(handle.externalTaskId, { runId: handle.runId, stepId: handle.stepId });
        await this.withLock(() => this.store.remove(handle.key));
        this.log.warn("Task unrecoverable", { ...lost.context, code: lost.code });
        await this.record("task.lost", handle);
        reports.push({ outcome: "unrecoverable", handle, reason: lost.message });
        continue;
      }

      let { handle: current, task } = located;

      if (!isTerminalTaskStatus(task.status) && options.resume) {
        try {
          const outcome = await this.poll(current, { ...options.resume, signal: options.signal });
          current = outcome.handle;
          if (outcome.kind === "terminal") {
            task = outcome.task;
          }
        } catch (error) {
          const redacted = toRedactedError(error);
          this.log.warn("Resumed polling failed", { runId: current.runId, kind: redacted.kind });
          reports.push({ outcome: "deferred", handle: current, reason: redacted.message });
          continue;
        }
      }

      if (isTerminalTaskStatus(task.status)) {
        await this.complete(current);
        await this.record("task.recovered", current);
        reports.push({ outcome: "recovered", handle: current, task });
      } else {
        if (task.status !== current.status) {
          current = await this.updateStatus(current, task.status);
        }
        reports.push({ outcome: "running", handle: current, status: task.status });
      }
    }

    return reports;
  }
}
