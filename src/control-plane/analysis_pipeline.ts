import type { AnalyzeRequest, AnalyzeResponse, FeedbackRequest, FeedbackResponse } from "../contracts/analyze";
import type { DecisionState } from "../contracts/evidence";
import type { Verdict } from "../contracts/verdict";
import { createAnalysisEvent, createFeedbackEvent } from "../audit/audit_events";
import type { EventWriter } from "../audit/event_writer";
import type { DecisionEngine } from "../engine/decision_engine";
import { VerdictRejectedError, errorMessage } from "../errors";
import { buildEvidence } from "../evidence/evidence_builder";
import { resolveDecisionState } from "../gates/decision_normalizer";
import type { LicenseGuard } from "../license/license_guard";
import type { AuditLogger } from "../logging/logger";
import type { MetricsAggregator } from "../metrics/metrics_aggregator";

export const LOW_CONFIDENCE_THRESHOLD = 0.3;

export const SAFETY_NOTE = "Safety gate triggered. Downstream system should follow crisis/safety policy.";
export const UNKNOWN_TONE_NOTE =
  "Unable to detect specific tone pattern. The text appears neutral or requires more context.";
export const BLOCKED_NOTE = "Request blocked by decision policy. No repaired text is returned.";

export type AnalysisDeps = {
  engine: DecisionEngine;
  guard: LicenseGuard;
  writer: EventWriter;
  metrics: MetricsAggregator;
  log: AuditLogger;
  salt: string;
  apiVersion: string;
  clock?: () => number;
  now?: () => Date;
};

export type ServedOutput = {
  repairedText: string | null;
  repairNote: string | null;
};

const lowConfidenceNote = (confidence: number, freqType: string) =>
  `Low confidence detection (${confidence.toFixed(2)}). Suggested tone: ${freqType}. Please review manually.`;

const isSafetyFlagged = (flag: string | null) => flag !== null && flag !== "" && flag !== "none";

/**
 * What the caller gets back for one verdict.
 *
 * A raised safety flag returns the caller's own text untouched with a safety note.
 * Unknown frequency or low confidence returns the caller's text with a review note.
 * BLOCK never returns repaired text.
 */
export function serveOutput(args: {
  requestText: string;
  verdict: Verdict;
  decisionState: DecisionState;
}): ServedOutput {
  const { verdict } = args;
  const safetyFlag = verdict.safety?.flag ?? null;
  const confidence = verdict.confidence.final;

  let repairedText = verdict.output.repaired_text ?? null;
  let repairNote: string | null = null;

  if (isSafetyFlagged(safetyFlag)) {
    repairedText = args.requestText;
    repairNote = SAFETY_NOTE;
  } else if (verdict.freq_type === "Unknown") {
    repairedText = args.requestText;
    repairNote = UNKNOWN_TONE_NOTE;
  } else if (confidence !== null && confidence < LOW_CONFIDENCE_THRESHOLD) {
    repairedText = args.requestText;
    repairNote = lowConfidenceNote(confidence, verdict.freq_type);
  }

  if (args.decisionState === "BLOCK") {
    return { repairedText: null, repairNote: repairNote ?? BLOCKED_NOTE };
  }

  return { repairedText, repairNote };
}

const isOutOfScopeHit = (verdict: Verdict) =>
  verdict.freq_type === "OutOfScope" || verdict.output.scenario.toLowerCase().includes("out_of_scope");

/**
 * One request through the audit pipeline:
 * license gate, engine, decision state, served output, evidence, audit event, metrics.
 */
export async function runAnalysis(
  deps: AnalysisDeps,
  request: AnalyzeRequest,
  ctx: { requestId?: string } = {}
): Promise<AnalyzeResponse> {
  const clock = deps.clock ?? (() => performance.now());
  const startedAt = clock();

  await deps.guard.admitRequest();

  const verdict = await deps.engine.evaluate(request.text);
  if (verdict.error) {
    throw new VerdictRejectedError(verdict.reason ?? "engine_error");
  }

  const resolution = resolveDecisionState({
    mode: verdict.mode,
    freqType: verdict.freq_type,
    scenario: verdict.output.scenario,
    asserted: verdict.metrics?.decision_state,
    log: deps.log,
    context: { requestId: ctx.requestId ?? null },
  });
  const decisionState = resolution.decisionState;

  const served = serveOutput({ requestText: request.text, verdict, decisionState });

  const evidence = buildEvidence({
    requestText: request.text,
    repairedText: served.repairedText,
    freqType: verdict.freq_type,
    mode: verdict.mode,
    scenario: verdict.output.scenario,
    decisionState,
    confidenceFinal: verdict.confidence.final,
    confidenceClassifier: verdict.confidence.classifier,
    metrics: verdict.metrics,
    audit: verdict.audit,
    llmUsed: verdict.llm_used,
    cacheHit: verdict.cache_hit,
    model: verdict.model,
    usage: verdict.usage,
    outputSource: verdict.output_source,
    pipelineFingerprint: verdict.pipeline_version_fingerprint,
    salt: deps.salt,
    apiVersion: deps.apiVersion,
  });

  if (!evidence.schema_valid) {
    deps.log.warn(
      { evt: "evidence.schema_invalid", requestId: ctx.requestId ?? null, schemaErrors: evidence.schema_errors ?? [] },
      "evidence.schema_invalid"
    );
  }

  const safetyFlag = verdict.safety?.flag ?? null;
  const event = createAnalysisEvent(
    {
      evidence,
      salted: deps.salt.length > 0,
      metadata: {
        decision_state: decisionState,
        decision_state_mismatch: resolution.mismatches.length > 0,
        freq_type: verdict.freq_type,
        mode: verdict.mode,
        confidence: verdict.confidence.final,
        safety_flag: safetyFlag,
        text_length: evidence.input_length,
        api_version: deps.apiVersion,
      },
    },
    { now: deps.now }
  );

  const write = await deps.writer.writeAnalysis(event);

  try {
    deps.metrics.record({
      decisionState,
      latencyMs: clock() - startedAt,
      llmUsed: verdict.llm_used ?? null,
      outOfScopeHit: isOutOfScopeHit(verdict),
    });
  } catch (error) {
    deps.log.error({ evt: "metrics.record_failed", error: errorMessage(error) }, "metrics.record_failed");
  }

  return {
    freq_type: verdict.freq_type,
    confidence: verdict.confidence.final,
    scenario: verdict.output.scenario,
    mode: verdict.mode,
    decision_state: decisionState,
    repaired_text: served.repairedText,
    repair_note: served.repairNote,
    safety_flag: safetyFlag,
    safety_confidence: verdict.safety?.confidence ?? null,
    log_id: event.id,
    evidence: {
      schema_version: evidence.schema_version,
      schema_valid: evidence.schema_valid,
      schema_errors: evidence.schema_errors ?? [],
    },
    audit_write: { status: write.status, store: write.store, path: write.path },
  };
}

export async function submitFeedback(
  deps: { writer: EventWriter; now?: () => Date },
  request: FeedbackRequest
): Promise<FeedbackResponse> {
  const event = createFeedbackEvent(request, { now: deps.now });
  const write = await deps.writer.writeFeedback(event);
  return {
    status: "success",
    feedback_id: event.id,
    audit_write: { status: write.status, store: write.store, path: write.path },
  };
}
