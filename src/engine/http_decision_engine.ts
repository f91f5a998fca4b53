import type { Verdict } from "../contracts/verdict";
import { DecisionEngineError } from "../errors";
import type { AuditLogger } from "../logging/logger";
import { parseVerdict, type DecisionEngine } from "./decision_engine";

export type HttpDecisionEngineOptions = {
  url: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  log?: AuditLogger;
};

/**
 * POSTs `{text}` to the decision engine and parses the verdict.
 * The request body is the only place the text travels; errors carry status codes, never the body.
 */
export class HttpDecisionEngine implements DecisionEngine {
  readonly kind = "http" as const;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log?: AuditLogger;

  constructor(opts: HttpDecisionEngineOptions) {
    this.url = opts.url;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.log = opts.log;
  }

  async evaluate(text: string, opts: { signal?: AbortSignal } = {}): Promise<Verdict> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.url, {
        method: "POST",
        headers: { "content-type": "application/json", accept: "application/json" },
        body: JSON.stringify({ text }),
        signal: opts.signal
          ? AbortSignal.any([opts.signal, AbortSignal.timeout(this.timeoutMs)])
          : AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === "TimeoutError";
      this.log?.error({ evt: "engine.request_failed", timedOut }, "engine.request_failed");
      throw new DecisionEngineError(timedOut ? "decision engine timeout" : "decision engine unreachable", {
        statusCode: 502,
        retryable: true,
        errorCode: timedOut ? "engine_timeout" : "engine_unreachable",
      });
    }

    if (!res.ok) {
      const statusCode = res.status;
      this.log?.error({ evt: "engine.request_failed", statusCode }, "engine.request_failed");
      throw new DecisionEngineError(`decision engine status ${statusCode}`, {
        statusCode: 502,
        retryable: statusCode >= 500 || statusCode === 429,
        errorCode: "engine_status",
      });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch {
      throw new DecisionEngineError("decision engine returned invalid JSON", {
        retryable: false,
        errorCode: "invalid_verdict",
      });
    }

    return parseVerdict(body);
  }
}
