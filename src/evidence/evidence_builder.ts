import {
  EVIDENCE_SCHEMA_VERSION,
  type DecisionState,
  type EvidenceConfidence,
  type EvidenceRecord,
} from "../contracts/evidence";
import { fingerprint } from "../privacy/fingerprint";
import { scrubRecord } from "../privacy/scrub";
import { validateEvidence } from "./evidence_schema";

export type BuildEvidenceArgs = {
  requestText: string;
  repairedText: string | null;
  freqType: string;
  mode: string;
  scenario: string;
  decisionState?: DecisionState | null;
  confidenceFinal: number | null;
  // undefined means the engine did not report a classifier confidence at all
  confidenceClassifier?: number | null;
  metrics?: Record<string, unknown>;
  audit?: Record<string, unknown>;
  llmUsed?: boolean | null;
  cacheHit?: boolean | null;
  model?: string | null;
  usage?: Record<string, unknown>;
  outputSource?: string | null;
  pipelineFingerprint?: string | null;
  salt: string;
  apiVersion: string;
};

/**
 * Assemble the content-free evidence record for one decision.
 *
 * Order: fingerprint, scrub the free-form sub-objects, validate, scrub again.
 * A schema violation is recorded on the record (`schema_valid`, `schema_errors`), never thrown.
 */
export function buildEvidence(args: BuildEvidenceArgs): EvidenceRecord {
  const input = fingerprint(args.requestText, args.salt);
  // BLOCK carries no output; fingerprint "" so length 0 stays a meaningful signal.
  const output = fingerprint(args.repairedText ?? "", args.salt);

  const confidence: EvidenceConfidence =
    args.confidenceClassifier === undefined
      ? { final: args.confidenceFinal }
      : { final: args.confidenceFinal, classifier: args.confidenceClassifier };

  const draft: EvidenceRecord = {
    schema_version: EVIDENCE_SCHEMA_VERSION,
    input_fp_sha256: input.sha256_hex,
    input_length: input.length,
    output_fp_sha256: output.sha256_hex,
    output_length: output.length,
    freq_type: args.freqType,
    mode: args.mode,
    scenario: args.scenario,
    decision_state: args.decisionState ?? null,
    confidence,
    metrics: scrubRecord(args.metrics ?? {}),
    audit: scrubRecord(args.audit ?? {}),
    llm_used: args.llmUsed ?? null,
    cache_hit: args.cacheHit ?? null,
    model: args.model ?? null,
    usage: scrubRecord(args.usage ?? {}),
    output_source: args.outputSource ?? null,
    api_version: args.apiVersion,
    pipeline_version_fingerprint: args.pipelineFingerprint ?? null,
    schema_valid: true,
  };

  const schemaErrors = validateEvidence(draft);
  const validated: EvidenceRecord =
    schemaErrors.length === 0
      ? draft
      : { ...draft, schema_valid: false, schema_errors: schemaErrors };

  return rescrub(validated);
}

/**
 * Second scrub pass over the assembled record. Fixed scalar fields only survive
 * if the scrubber kept them; free-form sub-objects take the re-scrubbed value.
 */
function rescrub(record: EvidenceRecord): EvidenceRecord {
  const pass = scrubRecord(record);
  const kept = (key: keyof EvidenceRecord) => Object.prototype.hasOwnProperty.call(pass, key);

  return {
    ...record,
    metrics: scrubRecord(pass.metrics),
    audit: scrubRecord(pass.audit),
    usage: scrubRecord(pass.usage),
    scenario: kept("scenario") ? record.scenario : "",
    model: kept("model") ? record.model : null,
    output_source: kept("output_source") ? record.output_source : null,
    pipeline_version_fingerprint: kept("pipeline_version_fingerprint")
      ? record.pipeline_version_fingerprint
      : null,
  };
}
