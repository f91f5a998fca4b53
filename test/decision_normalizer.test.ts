import { describe, it, expect } from "vitest";

import { normalizeDecision, resolveDecisionState, stateImpliedByMode } from "../src/gates/decision_normalizer";
import { makeLogger } from "./support/capture_logger";

describe("normalizeDecision", () => {
  it("maps modes onto decision states", () => {
    expect(normalizeDecision("no-op", "Calm", "general")).toBe("ALLOW");
    expect(normalizeDecision("block", "Calm", "general")).toBe("BLOCK");
    expect(normalizeDecision("repair", "Calm", "general")).toBe("GUIDE");
    expect(normalizeDecision("suggest", "Calm", "general")).toBe("GUIDE");
    expect(normalizeDecision(null, "Calm", null)).toBe("GUIDE");
  });

  it("blocks OutOfScope regardless of mode", () => {
    expect(normalizeDecision("no-op", "OutOfScope", "general")).toBe("BLOCK");
  });

  it("blocks blocking scenarios case-insensitively", () => {
    expect(normalizeDecision("no-op", "Calm", "Crisis_Support")).toBe("BLOCK");
    expect(normalizeDecision("repair", "Calm", "topic_OUT_OF_SCOPE")).toBe("BLOCK");
  });

  it("maps only the exact mode values and guides everything else", () => {
    expect(stateImpliedByMode("no-op")).toBe("ALLOW");
    expect(stateImpliedByMode("block")).toBe("BLOCK");
    expect(stateImpliedByMode("  NO-OP ")).toBe("GUIDE");
    expect(stateImpliedByMode("Block")).toBe("GUIDE");
    expect(normalizeDecision("BLOCK", "Calm", "general")).toBe("GUIDE");
  });
});

describe("resolveDecisionState", () => {
  it("corrects an asserted state and logs both mismatches", () => {
    const { log, entries } = makeLogger();

    const resolution = resolveDecisionState({
      mode: "guide",
      freqType: "OutOfScope",
      scenario: "general",
      asserted: "guide",
      log,
      context: { requestId: "req-1" },
    });

    expect(resolution).toEqual({
      decisionState: "BLOCK",
      modeImplied: "GUIDE",
      asserted: "GUIDE",
      mismatches: [
        { kind: "asserted", upstream: "GUIDE", resolved: "BLOCK" },
        { kind: "mode", upstream: "GUIDE", resolved: "BLOCK" },
      ],
    });
    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe("warn");
    expect(entries[0].message).toBe("decision_state.mismatch");
    expect(entries[0].context.requestId).toBe("req-1");
    expect(entries[0].context.decisionState).toBe("BLOCK");
  });

  it("reports an unrecognized asserted state", () => {
    const resolution = resolveDecisionState({
      mode: "repair",
      freqType: "Calm",
      scenario: "general",
      asserted: "MAYBE",
    });

    expect(resolution.decisionState).toBe("GUIDE");
    expect(resolution.asserted).toBeNull();
    expect(resolution.mismatches).toEqual([{ kind: "asserted_unrecognized", upstream: "MAYBE", resolved: "GUIDE" }]);
  });

  it("does not log when everything agrees", () => {
    const { log, entries } = makeLogger();

    const resolution = resolveDecisionState({
      mode: "no-op",
      freqType: "Neutral",
      scenario: "general",
      asserted: "ALLOW",
      log,
    });

    expect(resolution.decisionState).toBe("ALLOW");
    expect(resolution.mismatches).toEqual([]);
    expect(entries).toEqual([]);
  });
});
