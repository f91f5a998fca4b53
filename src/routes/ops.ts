import type { FastifyInstance } from "fastify";

import type { Runtime } from "../runtime";

export async function opsRoutes(app: FastifyInstance, opts: { runtime: Runtime }) {
  const runtime = opts.runtime;

  app.get("/license", async () => {
    const state = runtime.guard.snapshot();
    return {
      mode: runtime.guard.mode,
      source: runtime.validator.sourceKind,
      halted: state.halted,
      halted_at: state.haltedAt,
      last_watchdog_cycle_at: state.lastWatchdogCycleAt,
      watchdog_running: runtime.watchdog.isRunning,
      watchdog_interval_ms: runtime.watchdog.intervalMs,
      status: state.status,
    };
  });

  app.get("/metrics", async () => runtime.metrics.snapshot());

  app.get("/stats", async () => {
    const metrics = runtime.metrics.snapshot();
    const license = runtime.guard.snapshot();
    return {
      total_analyses: metrics.total_analyses,
      decision_counts: metrics.decision_counts,
      audit: {
        store: runtime.writer.storeKind,
        enabled: runtime.writer.enabled,
        ...runtime.writer.counters(),
      },
      license: {
        valid: license.status.valid,
        reason: license.status.reason,
        halted: license.halted,
      },
      api_version: runtime.apiVersion,
      started_at: runtime.startedAt,
    };
  });
}
