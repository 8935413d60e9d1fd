/**
 * Escalation Gate
 */

import type { BudgetLedger } from "../ledger.js";
import type {
  AnalysisResult,
  EscalationDecision,
  EscalationTrigger,
  VerificationReport,
} from "../types.js";

export interface GatePolicy {
  enabled: boolean;
  evDeltaThreshold: number;
  minVolume24h: number;
}

export interface GateInput {
  report: VerificationReport;
  analysis: AnalysisResult;
  volume24h: number;
  ledger: Pick<BudgetLedger, "remaining">;
  policy: GatePolicy;
  /** The run was cancelled; nothing more may be spent */
  cancelled?: boolean;
}

// Probabilities are compared in millionths so a delta landing on the threshold counts
const MICROS = 1_000_000;

export function escalationTriggers(input: Omit<GateInput, "ledger">): EscalationTrigger[] {
  const triggers: EscalationTrigger[] = [];

  if (!input.report.passed) {
    triggers.push("verification_failed");
  }

  const delta = Math.round(
    Math.abs(input.analysis.predictedProbability * (MICROS / 100) - input.analysis.marketProbability * MICROS)
  );
  const threshold = Math.round(input.policy.evDeltaThreshold * MICROS);
  if (delta >= threshold && input.volume24h >= input.policy.minVolume24h) {
    triggers.push("ev_delta");
  }

  return triggers;
}

/**
 * Escalate iff not cancelled, enabled, triggered and budget remains
 */
export function decideEscalation(input: GateInput): EscalationDecision {
  const triggers = escalationTriggers(input);

  if (input.cancelled) {
    return { escalate: false, triggers, blockedBy: "cancelled" };
  }
  if (!input.policy.enabled) {
    return { escalate: false, triggers, blockedBy: "disabled" };
  }
  if (triggers.length === 0) {
    return { escalate: false, triggers, blockedBy: "no_trigger" };
  }
  if (input.ledger.remaining() <= 0) {
    return { escalate: false, triggers, blockedBy: "no_budget" };
  }
  return { escalate: true, triggers };
}
