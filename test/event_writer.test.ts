import { describe, it, expect } from "vitest";

import { createAnalysisEvent, createFeedbackEvent } from "../src/audit/audit_events";
import { EventWriter, eventPath } from "../src/audit/event_writer";
import { buildEvidence } from "../src/evidence/evidence_builder";
import { EventStoreWriteError } from "../src/errors";
import { DisabledEventStore, MemoryEventStore, type EventStore } from "../src/store/event_store";
import { makeLogger } from "./support/capture_logger";

const clock = {
  now: () => new Date("2026-03-04T05:06:07Z"),
  newId: () => "evt-1",
};

const feedbackEvent = () =>
  createFeedbackEvent({ log_id: "log-1", accuracy: 4, helpful: 5, accepted: true }, clock);

describe("eventPath", () => {
  it("buckets by kind and UTC date", () => {
    expect(eventPath("logs", "analysis", "abc", "2026-12-31T23:59:59Z")).toBe("logs/analysis/2026/12/31/abc.json");
    expect(eventPath("/audit/", "feedback", "abc", "2026-01-02T00:00:00Z")).toBe("audit/feedback/2026/01/02/abc.json");
    expect(eventPath("", "feedback", "abc", "2026-01-02T00:00:00Z")).toBe("feedback/2026/01/02/abc.json");
  });
});

describe("audit events", () => {
  it("creates frozen events", () => {
    const event = feedbackEvent();

    expect(event).toEqual({
      id: "evt-1",
      timestamp: "2026-03-04T05:06:07.000Z",
      target_log_id: "log-1",
      feedback: { accuracy: 4, helpful: 5, accepted: true },
    });
    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.feedback)).toBe(true);
  });

  it("carries the input fingerprint and no text", () => {
    const evidence = buildEvidence({
      requestText: "some private words",
      repairedText: null,
      freqType: "Calm",
      mode: "repair",
      scenario: "general",
      decisionState: "GUIDE",
      confidenceFinal: 0.9,
      confidenceClassifier: 0.9,
      salt: "test-salt",
      apiVersion: "2.0.0",
    });

    const event = createAnalysisEvent(
      {
        evidence,
        salted: true,
        metadata: {
          decision_state: "GUIDE",
          decision_state_mismatch: false,
          freq_type: "Calm",
          mode: "repair",
          confidence: 0.9,
          safety_flag: null,
          text_length: 18,
          api_version: "2.0.0",
        },
      },
      clock
    );

    expect(event.input).toEqual({ fingerprint_sha256: evidence.input_fp_sha256, length: 18, salted: true });
    expect(JSON.stringify(event)).not.toContain("private words");
  });
});

describe("EventWriter", () => {
  it("writes one pretty JSON object per event", async () => {
    const store = new MemoryEventStore();
    const { log } = makeLogger();
    const writer = new EventWriter({ store, log });

    const outcome = await writer.writeFeedback(feedbackEvent());

    expect(outcome).toEqual({ status: "written", path: "logs/feedback/2026/03/04/evt-1.json", store: "memory" });
    const stored = store.get("logs/feedback/2026/03/04/evt-1.json");
    expect(stored?.message).toBe("audit: feedback evt-1");
    expect(stored?.body.endsWith("}\n")).toBe(true);
    expect(JSON.parse(stored?.body ?? "null")).toEqual({
      id: "evt-1",
      timestamp: "2026-03-04T05:06:07.000Z",
      target_log_id: "log-1",
      feedback: { accuracy: 4, helpful: 5, accepted: true },
    });
    expect(writer.counters()).toEqual({ written: 1, failed: 0, skipped: 0 });
  });

  it("scrubs the event again before serializing", async () => {
    const store = new MemoryEventStore();
    const { log } = makeLogger();
    const writer = new EventWriter({ store, prefix: "audit", log });
    const evidence = {
      ...buildEvidence({
        requestText: "hello",
        repairedText: null,
        freqType: "Calm",
        mode: "repair",
        scenario: "general",
        confidenceFinal: 0.5,
        confidenceClassifier: 0.5,
        salt: "",
        apiVersion: "2.0.0",
      }),
      metrics: { prompt: "leaked", score: 1 },
    };
    const event = createAnalysisEvent(
      {
        evidence,
        salted: false,
        metadata: {
          decision_state: "GUIDE",
          decision_state_mismatch: false,
          freq_type: "Calm",
          mode: "repair",
          confidence: 0.5,
          safety_flag: null,
          text_length: 5,
          api_version: "2.0.0",
        },
      },
      clock
    );

    const outcome = await writer.writeAnalysis(event);
    expect(outcome.path).toBe("audit/analysis/2026/03/04/evt-1.json");

    const body: unknown = JSON.parse(store.get(outcome.path)?.body ?? "null");
    expect(body).toMatchObject({ evidence: { metrics: { score: 1 } } });
    expect(store.get(outcome.path)?.body).not.toContain("leaked");
  });

  it("reports a failed write without rejecting", async () => {
    const failing: EventStore = {
      kind: "github",
      enabled: true,
      put: async () => {
        throw new EventStoreWriteError("github status 500", { store: "github", statusCode: 500 });
      },
    };
    const { log, entries } = makeLogger();
    const writer = new EventWriter({ store: failing, log });

    const outcome = await writer.writeFeedback(feedbackEvent());

    expect(outcome).toEqual({
      status: "failed",
      path: "logs/feedback/2026/03/04/evt-1.json",
      store: "github",
      error: "github status 500",
    });
    expect(writer.counters()).toEqual({ written: 0, failed: 1, skipped: 0 });
    expect(entries.map((entry) => entry.message)).toEqual(["audit.write_failed"]);
  });

  it("skips every write when the store is disabled", async () => {
    const { log } = makeLogger();
    const writer = new EventWriter({ store: new DisabledEventStore(), log });

    const outcome = await writer.writeFeedback(feedbackEvent());

    expect(outcome).toEqual({ status: "skipped", path: "logs/feedback/2026/03/04/evt-1.json", store: "none" });
    expect(writer.counters()).toEqual({ written: 0, failed: 0, skipped: 1 });
    expect(writer.enabled).toBe(false);
  });
});
