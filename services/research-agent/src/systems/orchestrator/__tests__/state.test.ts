import { describe, it, expect, vi } from "vitest";
import { InvariantError } from "@sibyl/core";
import { RunStateMachine } from "../state.js";

describe("RunStateMachine", () => {
  it("walks the escalation path and notifies the listener", () => {
    const listener = vi.fn();
    const machine = new RunStateMachine(listener);

    for (const state of [
      "executing",
      "synthesizing",
      "verifying",
      "escalating",
      "supervising",
      "re_verifying",
      "done",
    ] as const) {
      machine.transition(state);
    }

    expect(machine.state).toBe("done");
    expect(machine.history).toEqual([
      "planning",
      "executing",
      "synthesizing",
      "verifying",
      "escalating",
      "supervising",
      "re_verifying",
      "done",
    ]);
    expect(listener).toHaveBeenCalledTimes(7);
    expect(listener).toHaveBeenNthCalledWith(1, "executing", "planning");
  });

  it("allows verifying -> done", () => {
    const machine = new RunStateMachine();
    machine.transition("executing");
    machine.transition("synthesizing");
    machine.transition("verifying");

    expect(machine.canTransition("done")).toBe(true);
    machine.transition("done");
    expect(machine.canTransition("executing")).toBe(false);
  });

  it("rejects illegal transitions", () => {
    const machine = new RunStateMachine();

    expect(() => machine.transition("verifying")).toThrow(InvariantError);
    expect(() => machine.transition("done")).toThrow("illegal run transition planning -> done");
    expect(machine.state).toBe("planning");
    expect(machine.history).toEqual(["planning"]);
  });
});
