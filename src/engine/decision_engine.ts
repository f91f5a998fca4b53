import { VerdictSchema, type Verdict } from "../contracts/verdict";
import { DecisionEngineError } from "../errors";

export interface DecisionEngine {
  readonly kind: "fake" | "http";
  evaluate(text: string, opts?: { signal?: AbortSignal }): Promise<Verdict>;
}

export function parseVerdict(raw: unknown): Verdict {
  const parsed = VerdictSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "(root)");
    throw new DecisionEngineError(`decision engine verdict invalid: ${[...new Set(fields)].join(", ")}`, {
      retryable: false,
      errorCode: "invalid_verdict",
    });
  }
  return parsed.data;
}
