import { z } from "zod";

export const DecisionState = z.enum(["ALLOW", "GUIDE", "BLOCK"]);
export type DecisionState = z.infer<typeof DecisionState>;

export const EVIDENCE_SCHEMA_VERSION = "1.0";

export const REQUIRED_TOP_KEYS = [
  "schema_version",
  "input_fp_sha256",
  "input_length",
  "output_fp_sha256",
  "output_length",
  "freq_type",
  "mode",
  "scenario",
  "confidence",
  "metrics",
  "audit",
  "model",
  "usage",
  "output_source",
  "api_version",
  "pipeline_version_fingerprint",
] as const;

export type EvidenceConfidence = {
  final: number | null;
  classifier?: number | null;
};

export type EvidenceRecord = {
  schema_version: string;
  input_fp_sha256: string;
  input_length: number;
  output_fp_sha256: string;
  output_length: number;
  freq_type: string;
  mode: string;
  scenario: string;
  decision_state: DecisionState | null;
  confidence: EvidenceConfidence;
  metrics: Record<string, unknown>;
  audit: Record<string, unknown>;
  llm_used: boolean | null;
  cache_hit: boolean | null;
  model: string | null;
  usage: Record<string, unknown>;
  output_source: string | null;
  api_version: string;
  pipeline_version_fingerprint: string | null;
  schema_valid: boolean;
  schema_errors?: string[];
};

export type AnalysisEventMetadata = {
  decision_state: DecisionState;
  decision_state_mismatch: boolean;
  freq_type: string;
  mode: string;
  confidence: number | null;
  safety_flag: string | null;
  text_length: number;
  api_version: string;
};

export type AnalysisEvent = {
  id: string;
  timestamp: string;
  input: {
    fingerprint_sha256: string;
    length: number;
    salted: boolean;
  };
  evidence: EvidenceRecord;
  metadata: AnalysisEventMetadata;
};

export type FeedbackEvent = {
  id: string;
  timestamp: string;
  target_log_id: string;
  feedback: {
    accuracy: number;
    helpful: number;
    accepted: boolean;
  };
};
