import { z } from "zod";

import { REQUIRED_TOP_KEYS } from "../contracts/evidence";

const FreeformObject = z.record(z.string(), z.unknown());

// Presence of required keys is checked separately; this schema only carries the soft type checks.
const EvidenceTypeSchema = z
  .object({
    input_length: z.number().int().optional(),
    output_length: z.number().int().optional(),
    confidence: z
      .object({
        final: z.number().nullable(),
        classifier: z.number().nullable(),
      })
      .passthrough()
      .optional(),
    llm_used: z.boolean().nullable().optional(),
    cache_hit: z.boolean().nullable().optional(),
    usage: FreeformObject.optional(),
    audit: FreeformObject.optional(),
    metrics: FreeformObject.optional(),
  })
  .passthrough();

const TYPE_REASONS: Record<string, string> = {
  input_length: "not_int",
  output_length: "not_int",
  confidence: "not_object",
  "confidence.final": "not_number",
  "confidence.classifier": "not_number",
  llm_used: "not_bool",
  cache_hit: "not_bool",
  usage: "not_object",
  audit: "not_object",
  metrics: "not_object",
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const issueToCode = (issue: z.ZodIssue): string => {
  const field = issue.path.map(String).join(".");
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
    return `missing:${field}`;
  }
  const topField = field.split(".").slice(0, 2).join(".");
  return `type:${field}_${TYPE_REASONS[field] ?? TYPE_REASONS[topField] ?? "invalid"}`;
};

/**
 * Validate an evidence record against schema v1.0.
 * Returns violation codes (`missing:<key>`, `type:<field>_<reason>`); an empty list means valid.
 */
export function validateEvidence(record: unknown): string[] {
  if (!isRecord(record)) return ["type:record_not_object"];

  const errors: string[] = [];
  for (const key of REQUIRED_TOP_KEYS) {
    if (!Object.prototype.hasOwnProperty.call(record, key)) {
      errors.push(`missing:${key}`);
    }
  }

  const parsed = EvidenceTypeSchema.safeParse(record);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      errors.push(issueToCode(issue));
    }
  }

  return Array.from(new Set(errors));
}
