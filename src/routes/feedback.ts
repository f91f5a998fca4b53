import type { FastifyInstance } from "fastify";

import type { EventWriter } from "../audit/event_writer";
import { FeedbackRequest } from "../contracts/analyze";
import { submitFeedback } from "../control-plane/analysis_pipeline";

export async function feedbackRoutes(app: FastifyInstance, opts: { writer: EventWriter; now?: () => Date }) {
  app.post("/feedback", async (req, reply) => {
    const parsed = FeedbackRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    // log_id is opaque; feedback for an unknown analysis is still recorded.
    return submitFeedback(opts, parsed.data);
  });
}
