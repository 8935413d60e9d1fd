/**
 * Run State Machine
 */

import { InvariantError } from "@sibyl/core";
import type { RunState } from "./types.js";

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  planning: ["executing"],
  executing: ["synthesizing"],
  synthesizing: ["verifying"],
  verifying: ["done", "escalating"],
  escalating: ["supervising"],
  supervising: ["re_verifying"],
  re_verifying: ["done"],
  done: [],
};

export type StateListener = (next: RunState, previous: RunState) => void;

export class RunStateMachine {
  private current: RunState = "planning";
  private readonly visited: RunState[] = ["planning"];

  constructor(private readonly onTransition?: StateListener) {}

  get state(): RunState {
    return this.current;
  }

  /** Every state entered so far, in order */
  get history(): readonly RunState[] {
    return this.visited;
  }

  canTransition(next: RunState): boolean {
    return TRANSITIONS[this.current].includes(next);
  }

  transition(next: RunState): void {
    if (!this.canTransition(next)) {
      throw new InvariantError(`illegal run transition ${this.current} -> ${next}`, {
        from: this.current,
        to: next,
      });
    }
    const previous = this.current;
    this.current = next;
    this.visited.push(next);
    this.onTransition?.(next, previous);
  }
}
