/**
 * Budget Ledger
 * Cumulative spend against a ceiling, held in integer micro-dollars
 */

import { ValidationError } from "@sibyl/core";

const MICROS_PER_USD = 1_000_000;

function toMicros(amount: number, field: string): number {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new ValidationError(`${field} must be a non-negative amount`, {
      field,
      expected: ">= 0",
      received: String(amount),
    });
  }
  return Math.round(amount * MICROS_PER_USD);
}

function toUsd(micros: number): number {
  return micros / MICROS_PER_USD;
}

export interface LedgerSnapshot {
  ceiling: number;
  /** Reservations plus any overrun reported by providers */
  spent: number;
  /** Provider-reported cost */
  actual: number;
  remaining: number;
}

/**
 * Spend never decreases. reserve() is the only admission check; reconcile()
 * may exceed the ceiling by one step's overrun.
 *
 * Every method is synchronous, so a check and its commit cannot interleave
 * with another caller on the event loop.
 */
export class BudgetLedger {
  private readonly ceilingMicros: number;
  private spentMicros = 0;
  private actualMicros = 0;

  constructor(ceiling: number) {
    if (!Number.isFinite(ceiling) || ceiling <= 0) {
      throw new ValidationError("budget ceiling must be positive", {
        field: "ceiling",
        expected: "> 0",
        received: String(ceiling),
      });
    }
    this.ceilingMicros = Math.round(ceiling * MICROS_PER_USD);
  }

  get ceiling(): number {
    return toUsd(this.ceilingMicros);
  }

  get spent(): number {
    return toUsd(this.spentMicros);
  }

  get actual(): number {
    return toUsd(this.actualMicros);
  }

  remaining(): number {
    return toUsd(Math.max(0, this.ceilingMicros - this.spentMicros));
  }

  /**
   * Commit the amount iff budget remains and the ceiling still holds afterwards
   */
  reserve(amount: number): boolean {
    const micros = toMicros(amount, "amount");
    if (this.ceilingMicros - this.spentMicros <= 0) {
      return false;
    }
    if (this.spentMicros + micros > this.ceilingMicros) {
      return false;
    }
    this.spentMicros += micros;
    return true;
  }

  /**
   * Record what a reserved step actually cost. Overruns are charged; savings are not refunded.
   */
  reconcile(reserved: number, actual: number): void {
    const reservedMicros = toMicros(reserved, "reserved");
    const actualMicros = toMicros(actual, "actual");
    this.actualMicros += actualMicros;
    this.spentMicros += Math.max(0, actualMicros - reservedMicros);
  }

  snapshot(): LedgerSnapshot {
    return {
      ceiling: this.ceiling,
      spent: this.spent,
      actual: this.actual,
      remaining: this.remaining(),
    };
  }
}
