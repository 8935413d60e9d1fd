import { describe, it, expect } from "vitest";
import { ValidationError } from "@sibyl/core";
import { BudgetLedger } from "../ledger.js";

describe("BudgetLedger", () => {
  it("commits reservations that fit", () => {
    const ledger = new BudgetLedger(0.1);

    expect(ledger.reserve(0.03)).toBe(true);
    expect(ledger.reserve(0.07)).toBe(true);
    expect(ledger.spent).toBe(0.1);
    expect(ledger.remaining()).toBe(0);
  });

  it("refuses a reservation that would cross the ceiling", () => {
    const ledger = new BudgetLedger(0.05);

    expect(ledger.reserve(0.03)).toBe(true);
    expect(ledger.reserve(0.03)).toBe(false);
    expect(ledger.spent).toBe(0.03);
  });

  it("refuses even free reservations once nothing remains", () => {
    const ledger = new BudgetLedger(0.01);
    ledger.reserve(0.01);

    expect(ledger.reserve(0)).toBe(false);
  });

  it("keeps micro-dollar sums exact", () => {
    const ledger = new BudgetLedger(0.3);
    for (let i = 0; i < 3; i++) ledger.reserve(0.1);

    expect(ledger.spent).toBe(0.3);
    expect(ledger.reserve(0.000001)).toBe(false);
  });

  it("charges overruns and never refunds savings", () => {
    const ledger = new BudgetLedger(0.05);
    ledger.reserve(0.03);
    ledger.reconcile(0.03, 0.01);

    expect(ledger.spent).toBe(0.03);
    expect(ledger.actual).toBe(0.01);

    ledger.reserve(0.02);
    ledger.reconcile(0.02, 0.04);

    expect(ledger.spent).toBe(0.07);
    expect(ledger.actual).toBe(0.05);
    expect(ledger.remaining()).toBe(0);
    expect(ledger.reserve(0.001)).toBe(false);
  });

  it("reports a snapshot", () => {
    const ledger = new BudgetLedger(1);
    ledger.reserve(0.25);
    ledger.reconcile(0.25, 0.2);

    expect(ledger.snapshot()).toEqual({ ceiling: 1, spent: 0.25, actual: 0.2, remaining: 0.75 });
  });

  it("rejects invalid amounts", () => {
    expect(() => new BudgetLedger(0)).toThrow(ValidationError);
    const ledger = new BudgetLedger(1);
    expect(() => ledger.reserve(-0.01)).toThrow("amount must be a non-negative amount");
    expect(() => ledger.reconcile(0.01, Number.NaN)).toThrow("actual must be a non-negative amount");
  });
});
