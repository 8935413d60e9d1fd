import { afterEach, describe, it, expect } from "vitest";
import { logger, type LogEntry } from "../logger.js";

function capture(): LogEntry[] {
  const entries: LogEntry[] = [];
  logger.setHandlers([(entry) => entries.push(entry)]);
  return entries;
}

afterEach(() => {
  logger.resetHandlers();
  logger.setLevel("info");
});

describe("logger", () => {
  it("drops entries below the current level", () => {
    const entries = capture();
    logger.setLevel("warn");

    logger.info("hidden");
    logger.warn("shown");

    expect(entries.map((entry) => entry.message)).toEqual(["shown"]);
  });

  it("merges child context and redacts secret keys", () => {
    const entries = capture();

    logger.child({ component: "Test" }).info("calling provider", { runId: "run-1", apiKey: "test-secret" });

    expect(entries[0]?.context).toEqual({ component: "Test", runId: "run-1", apiKey: "[REDACTED]" });
  });

  it("redacts credentials inside messages and errors", () => {
    const entries = capture();

    logger.error("request failed with token=test-secret", new Error("Bearer abc.def"));

    expect(entries[0]?.message).toBe("request failed with token=[REDACTED]");
    expect(entries[0]?.error?.message).toBe("[REDACTED]");
  });

  it("emits metrics as info entries", () => {
    const entries = capture();

    logger.metric("run.cost_usd", 0.12, { mode: "fast" });

    expect(entries[0]).toMatchObject({
      level: "info",
      message: "METRIC: run.cost_usd=0.12",
      context: { mode: "fast", metric: "run.cost_usd", value: 0.12 },
    });
  });
});
