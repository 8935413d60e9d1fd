import { afterEach, describe, it, expect, vi } from "vitest";
import { EventLog, type EventRow, type EventSink } from "../event-store.js";

function row(eventType: string): EventRow {
  return { event_type: eventType, trace_id: "run-1", timestamp: "2026-03-01T12:00:00.000Z" };
}

function setup(overrides: { maxBatchSize?: number } = {}) {
  const sink = vi.fn<EventSink>().mockResolvedValue({ error: null });
  const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  const events = new EventLog({ sink, sleep, ...overrides });
  return { sink, sleep, events };
}

afterEach(() => {
  vi.useRealTimers();
});

describe("EventLog", () => {
  it("writes buffered rows as one batch on flush", async () => {
    const { sink, events } = setup();

    events.append(row("run.started"));
    events.append(row("run.completed"));
    expect(events.pendingCount).toBe(2);

    await events.flush();

    expect(sink).toHaveBeenCalledTimes(1);
    expect(sink.mock.calls[0]?.[0].map((r) => r.event_type)).toEqual(["run.started", "run.completed"]);
    expect(events.pendingCount).toBe(0);
  });

  it("writes as soon as a batch is full", async () => {
    const { sink, events } = setup({ maxBatchSize: 2 });

    events.append(row("run.started"));
    expect(sink).not.toHaveBeenCalled();
    events.append(row("run.state_changed"));
    expect(sink).toHaveBeenCalledTimes(1);

    await events.flush();
    expect(sink).toHaveBeenCalledTimes(1);
  });

  it("flushes after the batch interval", async () => {
    vi.useFakeTimers();
    const { sink, events } = setup();

    events.append(row("run.started"));
    await vi.advanceTimersByTimeAsync(99);
    expect(sink).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);

    expect(sink).toHaveBeenCalledTimes(1);
  });

  it("retries failed inserts with doubling delays, then drops the batch", async () => {
    const { sink, sleep, events } = setup();
    sink.mockResolvedValue({ error: { message: "insert failed" } });

    events.append(row("run.failed"));
    await events.flush();

    expect(sink).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
    expect(events.pendingCount).toBe(0);
  });

  it("treats a thrown insert as a failed attempt", async () => {
    const { sink, sleep, events } = setup();
    sink.mockRejectedValueOnce(new Error("fetch failed"));

    events.append(row("run.completed"));
    await events.flush();

    expect(sink).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[100]]);
  });
});
