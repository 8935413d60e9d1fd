import { describe, it, expect } from "vitest";
import { ValidationError } from "@sibyl/core";
import { NoOpObservability } from "../../../shared/observability/console.js";
import { MemoryStore } from "../../../shared/store/memory.js";
import { contentHashOf, RunStore, runKey } from "../run-store.js";
import { ResearchOrchestrator } from "../system.js";
import { handleKey, StoreHandleStore, type TaskHandle } from "../tracker/handle-store.js";
import { AsyncTaskTracker } from "../tracker/tracker.js";
import type { AgentRunResult } from "../types.js";
import { FakeMarketData, FakeResearchProvider, NOW } from "./fakes.js";

async function completedRun(runId: string): Promise<AgentRunResult> {
  const provider = new FakeResearchProvider();
  const observability = new NoOpObservability();
  const orchestrator = new ResearchOrchestrator({
    marketData: new FakeMarketData(),
    provider,
    tracker: new AsyncTaskTracker({ store: new StoreHandleStore(new MemoryStore()), provider, observability }),
    observability,
    now: () => NOW,
  });
  return orchestrator.run({ subjectId: "TEST-EVENT", mode: "fast", budgetCeiling: 0.5 }, { correlationId: runId });
}

function handle(overrides: Partial<TaskHandle> = {}): TaskHandle {
  const key = handleKey({ subjectId: "TEST-EVENT", runId: "run-1", stepId: "deep_research-1" });
  return {
    key,
    runId: "run-1",
    stepId: "deep_research-1",
    subjectId: "TEST-EVENT",
    externalTaskId: "task-1",
    fingerprint: "0123456789abcdef",
    status: "running",
    createdAt: NOW.toISOString(),
    updatedAt: NOW.toISOString(),
    ...overrides,
  };
}

describe("RunStore", () => {
  it("saves, loads and lists runs per subject", async () => {
    const store = new MemoryStore();
    const runs = new RunStore(store, { now: () => NOW });
    const first = await completedRun("run-a");
    const second = await completedRun("run-b");

    const record = await runs.save(first);
    await runs.save(second);

    expect(record).toEqual({
      schemaVersion: "agent_run_v1",
      savedAt: "2026-03-01T12:00:00.000Z",
      contentHash: contentHashOf(first),
      result: first,
    });
    expect(record.contentHash).toMatch(/^[0-9a-f]{64}$/);
    expect(await store.exists(runKey("TEST-EVENT", "run-a"))).toBe(true);
    expect((await runs.load("TEST-EVENT", "run-a"))?.result).toEqual(first);
    expect(await runs.list("TEST-EVENT")).toEqual(["run-a", "run-b"]);
    expect(await runs.list()).toEqual(["TEST-EVENT/run-a", "TEST-EVENT/run-b"]);
  });

  it("returns null for an unknown run", async () => {
    const runs = new RunStore(new MemoryStore());

    expect(await runs.load("TEST-EVENT", "missing")).toBeNull();
  });

  it("rejects a record that does not parse", async () => {
    const store = new MemoryStore();
    await store.write("runs/TEST-EVENT/bad", { schemaVersion: "agent_run_v0" });
    const runs = new RunStore(store);

    await expect(runs.load("TEST-EVENT", "bad")).rejects.toThrow(
      new ValidationError("stored run runs/TEST-EVENT/bad is invalid")
    );
  });
});

describe("StoreHandleStore", () => {
  it("keys handles by subject, run and step", () => {
    expect(handle().key).toBe("task-handles/TEST-EVENT/run-1/deep_research-1");
  });

  it("round-trips and removes handles", async () => {
    const handles = new StoreHandleStore(new MemoryStore());
    const stored = handle();

    await handles.put(stored);
    await handles.put({ ...stored, status: "completed" });

    expect(await handles.get(stored.key)).toEqual({ ...stored, status: "completed" });
    expect(await handles.remove(stored.key)).toBe(true);
    expect(await handles.remove(stored.key)).toBe(false);
    expect(await handles.get(stored.key)).toBeNull();
  });

  it("reports a corrupt handle on get", async () => {
    const store = new MemoryStore();
    await store.write("task-handles/TEST-EVENT/run-1/deep_research-1", { key: "x" });

    await expect(new StoreHandleStore(store).get("task-handles/TEST-EVENT/run-1/deep_research-1")).rejects.toThrow(
      new ValidationError("corrupt task handle at task-handles/TEST-EVENT/run-1/deep_research-1")
    );
  });

  it("skips unreadable records when listing", async () => {
    const store = new MemoryStore();
    const handles = new StoreHandleStore(store);
    await handles.put(handle());
    await store.write("task-handles/OTHER/run-9/deep_research-1", { status: "bogus" });
    await store.write("runs/TEST-EVENT/run-1", { unrelated: true });

    expect((await handles.list()).map((h) => h.externalTaskId)).toEqual(["task-1"]);
  });
});
