import Fastify, { type FastifyBaseLogger } from "fastify";
import cors from "@fastify/cors";

import { analyzeRoutes } from "./routes/analyze";
import { feedbackRoutes } from "./routes/feedback";
import { healthRoutes } from "./routes/healthz";
import { opsRoutes } from "./routes/ops";
import type { Runtime } from "./runtime";

export const API_PREFIX = "/api/v1";

export function buildApp(runtime: Runtime, opts: { logger?: FastifyBaseLogger | false } = {}) {
  const app = Fastify({ logger: opts.logger ?? false });

  // CORS: permissive, the API carries no cookies.
  app.register(cors, {
    origin: true,
  });

  app.register(healthRoutes, { runtime });
  app.register(analyzeRoutes, { prefix: API_PREFIX, runtime });
  app.register(feedbackRoutes, { prefix: API_PREFIX, writer: runtime.writer, now: runtime.now });
  app.register(opsRoutes, { prefix: API_PREFIX, runtime });

  return app;
}
