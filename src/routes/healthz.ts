import type { FastifyInstance } from "fastify";

import type { Runtime } from "../runtime";

export const SERVICE_NAME = "governance-audit";

export async function healthRoutes(app: FastifyInstance, opts: { runtime: Runtime }) {
  const runtime = opts.runtime;

  app.get("/healthz", async () => ({
    ok: true,
    service: SERVICE_NAME,
    ts: new Date().toISOString(),
  }));

  app.get("/health", async () => {
    const github = runtime.config.audit.github;
    const license = runtime.guard.snapshot();
    return {
      status: license.halted ? "halted" : "healthy",
      pipeline_ready: true,
      engine: runtime.engine.kind,
      logger_ready: runtime.writer.enabled,
      audit_store: runtime.writer.storeKind,
      backup_ready: runtime.writer.storeKind === "github",
      github_env_present: github !== null,
      github_repo_effective: github?.repo ?? null,
      license_valid: license.status.valid,
    };
  });

  app.get("/", async () => ({
    name: "Governance Audit API",
    version: runtime.apiVersion,
    status: "active",
    health: "/health",
  }));
}
