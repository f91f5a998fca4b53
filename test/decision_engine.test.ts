import { describe, it, expect } from "vitest";

import { parseVerdict } from "../src/engine/decision_engine";
import { FakeDecisionEngine } from "../src/engine/fake_decision_engine";
import { HttpDecisionEngine } from "../src/engine/http_decision_engine";
import { DecisionEngineError } from "../src/errors";
import { fetchSettlingOnAbort } from "./support/hanging_fetch";

const verdictBody = {
  freq_type: "Calm",
  mode: "repair",
  confidence: { final: 0.8, classifier: 0.6 },
  output: { scenario: "general", repaired_text: "fixed" },
};

describe("parseVerdict", () => {
  it("applies defaults for mode and output", () => {
    const verdict = parseVerdict({ freq_type: "Calm", confidence: { final: 0.5 } });

    expect(verdict.mode).toBe("repair");
    expect(verdict.output).toEqual({ scenario: "unknown" });
  });

  it("rejects a verdict without a frequency type", () => {
    const error = (() => {
      try {
        parseVerdict({ confidence: { final: 0.5 } });
        return null;
      } catch (err) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(DecisionEngineError);
    expect(error).toMatchObject({ errorCode: "invalid_verdict", retryable: false, statusCode: 502 });
  });
});

describe("FakeDecisionEngine", () => {
  it("returns a deterministic stub verdict", async () => {
    const engine = new FakeDecisionEngine();
    const verdict = await engine.evaluate("hello there");

    expect(verdict.mode).toBe("no-op");
    expect(verdict.output.repaired_text).toBe("[no-op] Stub verdict: received 11 chars.");
    expect(engine.calls).toBe(1);
  });
});

describe("HttpDecisionEngine", () => {
  it("posts the text and parses the verdict", async () => {
    const bodies: unknown[] = [];
    const fetchImpl: typeof fetch = async (_input, init) => {
      bodies.push(typeof init?.body === "string" ? JSON.parse(init.body) : null);
      return new Response(JSON.stringify(verdictBody), { status: 200 });
    };
    const engine = new HttpDecisionEngine({ url: "https://engine.test/evaluate", fetchImpl });

    const verdict = await engine.evaluate("hello");

    expect(bodies).toEqual([{ text: "hello" }]);
    expect(verdict.freq_type).toBe("Calm");
    expect(verdict.output.repaired_text).toBe("fixed");
  });

  it("maps an upstream failure status to a retryable engine error", async () => {
    const fetchImpl: typeof fetch = async () => new Response("unavailable", { status: 503 });
    const engine = new HttpDecisionEngine({ url: "https://engine.test/evaluate", fetchImpl });

    await expect(engine.evaluate("hello")).rejects.toMatchObject({
      message: "decision engine status 503",
      statusCode: 502,
      retryable: true,
      errorCode: "engine_status",
    });
  });

  it("maps a client error status to a non-retryable engine error", async () => {
    const fetchImpl: typeof fetch = async () => new Response("bad", { status: 400 });
    const engine = new HttpDecisionEngine({ url: "https://engine.test/evaluate", fetchImpl });

    await expect(engine.evaluate("hello")).rejects.toMatchObject({ retryable: false, errorCode: "engine_status" });
  });

  it("reports an unreachable engine", async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    const engine = new HttpDecisionEngine({ url: "https://engine.test/evaluate", fetchImpl });

    await expect(engine.evaluate("hello")).rejects.toMatchObject({ errorCode: "engine_unreachable" });
  });

  it("rejects a body that is not JSON", async () => {
    const fetchImpl: typeof fetch = async () => new Response("<html>", { status: 200 });
    const engine = new HttpDecisionEngine({ url: "https://engine.test/evaluate", fetchImpl });

    await expect(engine.evaluate("hello")).rejects.toMatchObject({ errorCode: "invalid_verdict" });
  });

  it("keeps its timeout when the caller passes a cancellation signal", async () => {
    const engine = new HttpDecisionEngine({
      url: "https://engine.test/evaluate",
      fetchImpl: fetchSettlingOnAbort,
      timeoutMs: 20,
    });

    await expect(engine.evaluate("hello", { signal: new AbortController().signal })).rejects.toMatchObject({
      errorCode: "engine_timeout",
      retryable: true,
    });
  });
});
