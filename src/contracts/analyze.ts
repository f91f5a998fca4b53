import { z } from "zod";

import type { DecisionState } from "./evidence";

export const AnalyzeRequest = z.object({
  text: z.string().min(1).max(1000),
});

export type AnalyzeRequest = z.infer<typeof AnalyzeRequest>;

export const FeedbackRequest = z.object({
  log_id: z.string().min(1).max(200),
  accuracy: z.number().int().min(0).max(5),
  helpful: z.number().int().min(0).max(5),
  accepted: z.boolean(),
});

export type FeedbackRequest = z.infer<typeof FeedbackRequest>;

export type AuditWriteSummary = {
  status: "written" | "failed" | "skipped";
  store: string;
  path: string;
};

export type AnalyzeResponse = {
  freq_type: string;
  confidence: number | null;
  scenario: string;
  mode: string;
  decision_state: DecisionState;
  repaired_text: string | null;
  repair_note: string | null;
  safety_flag: string | null;
  safety_confidence: number | null;
  log_id: string;
  evidence: {
    schema_version: string;
    schema_valid: boolean;
    schema_errors: string[];
  };
  audit_write: AuditWriteSummary;
};

export type FeedbackResponse = {
  status: "success";
  feedback_id: string;
  audit_write: AuditWriteSummary;
};
