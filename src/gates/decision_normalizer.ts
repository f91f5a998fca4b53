import { DecisionState } from "../contracts/evidence";
import type { AuditLogger } from "../logging/logger";

const BLOCKING_SCENARIO_MARKERS = ["out_of_scope", "crisis"] as const;

export type DecisionMismatchKind = "asserted" | "asserted_unrecognized" | "mode";

export type DecisionMismatch = {
  kind: DecisionMismatchKind;
  upstream: string;
  resolved: DecisionState;
};

export type DecisionResolution = {
  decisionState: DecisionState;
  modeImplied: DecisionState;
  asserted: DecisionState | null;
  mismatches: DecisionMismatch[];
};

// Exact match only; "BLOCK" or " no-op " fall through to GUIDE.
export function stateImpliedByMode(mode: string | null | undefined): DecisionState {
  if (mode === "no-op") return "ALLOW";
  if (mode === "block") return "BLOCK";
  return "GUIDE";
}

/**
 * Map decision-engine output onto ALLOW | GUIDE | BLOCK.
 *
 * Priority: OutOfScope frequency, then blocking scenario markers, then the mode.
 */
export function normalizeDecision(
  mode: string | null | undefined,
  freqType: string | null | undefined,
  scenario: string | null | undefined
): DecisionState {
  if (freqType === "OutOfScope") return "BLOCK";

  const scenarioLower = (scenario ?? "").toLowerCase();
  if (BLOCKING_SCENARIO_MARKERS.some((marker) => scenarioLower.includes(marker))) {
    return "BLOCK";
  }

  return stateImpliedByMode(mode);
}

/**
 * Compute the authoritative decision state and compare it with what upstream implied or asserted.
 * The computed value always wins; disagreements are logged, never fatal.
 */
export function resolveDecisionState(args: {
  mode: string | null | undefined;
  freqType: string | null | undefined;
  scenario: string | null | undefined;
  asserted?: unknown;
  log?: AuditLogger;
  context?: Record<string, unknown>;
}): DecisionResolution {
  const decisionState = normalizeDecision(args.mode, args.freqType, args.scenario);
  const modeImplied = stateImpliedByMode(args.mode);
  const mismatches: DecisionMismatch[] = [];

  let asserted: DecisionState | null = null;
  if (args.asserted !== undefined && args.asserted !== null) {
    const raw = String(args.asserted);
    const parsed = DecisionState.safeParse(raw.trim().toUpperCase());
    if (!parsed.success) {
      mismatches.push({ kind: "asserted_unrecognized", upstream: raw.slice(0, 32), resolved: decisionState });
    } else {
      asserted = parsed.data;
      if (asserted !== decisionState) {
        mismatches.push({ kind: "asserted", upstream: asserted, resolved: decisionState });
      }
    }
  }

  if (modeImplied !== decisionState) {
    mismatches.push({ kind: "mode", upstream: modeImplied, resolved: decisionState });
  }

  if (mismatches.length > 0) {
    args.log?.warn(
      {
        evt: "decision_state.mismatch",
        ...args.context,
        decisionState,
        modeImplied,
        asserted,
        freqType: args.freqType ?? null,
        mismatches,
      },
      "decision_state.mismatch"
    );
  }

  return { decisionState, modeImplied, asserted, mismatches };
}
