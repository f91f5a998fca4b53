import { z } from "zod";

const FreeformObject = z.record(z.string(), z.unknown());

/**
 * Verdict returned by the decision engine for one request.
 * Raw-text fields the engine may include are accepted here and never leave the pipeline.
 */
export const VerdictSchema = z.object({
  freq_type: z.string().min(1),
  mode: z.string().default("repair"),
  confidence: z.object({
    final: z.number().nullable(),
    classifier: z.number().nullable().optional(),
  }),
  output: z
    .object({
      scenario: z.string().default("unknown"),
      repaired_text: z.string().nullable().optional(),
    })
    .default({}),
  safety: z
    .object({
      flag: z.string().nullable().optional(),
      confidence: z.number().nullable().optional(),
    })
    .optional(),
  llm_used: z.boolean().nullable().optional(),
  cache_hit: z.boolean().nullable().optional(),
  model: z.string().nullable().optional(),
  usage: FreeformObject.optional(),
  audit: FreeformObject.optional(),
  metrics: FreeformObject.optional(),
  output_source: z.string().nullable().optional(),
  pipeline_version_fingerprint: z.string().nullable().optional(),
  error: z.boolean().optional(),
  reason: z.string().optional(),
});

export type Verdict = z.infer<typeof VerdictSchema>;
