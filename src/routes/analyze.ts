import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import { AnalyzeRequest } from "../contracts/analyze";
import { runAnalysis, type AnalysisDeps } from "../control-plane/analysis_pipeline";
import { DecisionEngineError, LicensePolicyError, VerdictRejectedError, errorMessage } from "../errors";

/**
 * Map pipeline failures onto HTTP. Bodies never carry request text.
 */
export function sendPipelineError(req: FastifyRequest, reply: FastifyReply, error: unknown) {
  if (error instanceof LicensePolicyError || error instanceof VerdictRejectedError) {
    return reply.code(error.statusCode).send(error.toJSON());
  }

  if (error instanceof DecisionEngineError) {
    req.log.error({ evt: "analyze.engine_failed", errorCode: error.errorCode ?? null }, "analyze.engine_failed");
    return reply.code(error.statusCode).send({
      error: "decision_engine_failed",
      code: error.errorCode ?? null,
      retryable: error.retryable,
    });
  }

  req.log.error({ evt: "analyze.failed", error: errorMessage(error) }, "analyze.failed");
  return reply.code(500).send({ error: "internal_error", retryable: true });
}

export async function analyzeRoutes(app: FastifyInstance, opts: { runtime: AnalysisDeps }) {
  const runtime = opts.runtime;

  app.post("/analyze", async (req, reply) => {
    const parsed = AnalyzeRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    try {
      return await runAnalysis(runtime, parsed.data, { requestId: req.id });
    } catch (error) {
      return sendPipelineError(req, reply, error);
    }
  });
}
