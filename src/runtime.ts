import { EventWriter } from "./audit/event_writer";
import type { RuntimeConfig } from "./config/runtime_config";
import type { AnalysisDeps } from "./control-plane/analysis_pipeline";
import type { DecisionEngine } from "./engine/decision_engine";
import { FakeDecisionEngine } from "./engine/fake_decision_engine";
import { HttpDecisionEngine } from "./engine/http_decision_engine";
import {
  HttpEntitlementSource,
  StaticEntitlementSource,
  type EntitlementSource,
} from "./license/entitlement_source";
import { LicenseGuard } from "./license/license_guard";
import { LicenseValidator } from "./license/license_validator";
import { LicenseWatchdog, type SleepImpl } from "./license/license_watchdog";
import type { AuditLogger } from "./logging/logger";
import { MetricsAggregator } from "./metrics/metrics_aggregator";
import { DisabledEventStore, MemoryEventStore, type EventStore } from "./store/event_store";
import { GitHubContentsStore } from "./store/github_contents_store";
import { SqliteEventStore } from "./store/sqlite_event_store";

export type Runtime = AnalysisDeps & {
  config: RuntimeConfig;
  store: EventStore;
  validator: LicenseValidator;
  watchdog: LicenseWatchdog;
  startedAt: string;
};

export type RuntimeOverrides = {
  engine?: DecisionEngine;
  store?: EventStore;
  entitlementSource?: EntitlementSource;
  fetchImpl?: typeof fetch;
  sleepImpl?: SleepImpl;
  now?: () => Date;
  clock?: () => number;
};

export function createEventStore(config: RuntimeConfig, fetchImpl?: typeof fetch): EventStore {
  switch (config.audit.store) {
    case "github": {
      const gh = config.audit.github;
      if (!gh) return new DisabledEventStore();
      return new GitHubContentsStore({
        token: gh.token,
        repo: gh.repo,
        branch: gh.branch,
        apiBase: gh.apiBase ?? undefined,
        timeoutMs: config.audit.writeTimeoutMs,
        fetchImpl,
      });
    }
    case "sqlite":
      return new SqliteEventStore(config.audit.dbPath);
    case "memory":
      return new MemoryEventStore({ maxObjects: config.audit.memoryMaxObjects });
    case "none":
      return new DisabledEventStore();
  }
}

export function createEntitlementSource(config: RuntimeConfig, fetchImpl?: typeof fetch): EntitlementSource {
  if (config.license.serverUrl) {
    return new HttpEntitlementSource(config.license.serverUrl, { fetchImpl });
  }
  return new StaticEntitlementSource({
    license_id: config.license.id,
    expiry_date: config.license.expiryDate,
    quota_limit: config.license.quotaLimit,
    active: true,
  });
}

/**
 * Wire the components for one process. Tests pass overrides instead of touching the network or timers.
 */
export function createRuntime(config: RuntimeConfig, log: AuditLogger, overrides: RuntimeOverrides = {}): Runtime {
  const metrics = new MetricsAggregator({ windowSize: config.metricsWindowSize });

  const validator = new LicenseValidator({
    source: overrides.entitlementSource ?? createEntitlementSource(config, overrides.fetchImpl),
    licenseKey: config.license.key,
    now: overrides.now,
  });

  const guard = new LicenseGuard({
    validator,
    mode: config.license.mode,
    usage: () => metrics.totalAnalyses,
    log,
    requestCheckMaxAgeMs: config.license.watchdogIntervalMs,
    now: overrides.now,
  });

  const watchdog = new LicenseWatchdog({
    guard,
    intervalMs: config.license.watchdogIntervalMs,
    log,
    sleepImpl: overrides.sleepImpl,
  });

  const store = overrides.store ?? createEventStore(config, overrides.fetchImpl);
  const writer = new EventWriter({ store, prefix: config.audit.pathPrefix, log });

  const engine =
    overrides.engine
    ?? (config.decisionEngine.url
      ? new HttpDecisionEngine({
          url: config.decisionEngine.url,
          timeoutMs: config.decisionEngine.timeoutMs,
          fetchImpl: overrides.fetchImpl,
          log,
        })
      : new FakeDecisionEngine());

  return {
    config,
    engine,
    guard,
    validator,
    watchdog,
    store,
    writer,
    metrics,
    log,
    salt: config.fingerprintSalt,
    apiVersion: config.apiVersion,
    clock: overrides.clock,
    now: overrides.now,
    startedAt: (overrides.now?.() ?? new Date()).toISOString(),
  };
}

/**
 * Stop the watchdog, then release the audit store.
 * Resolves false if the watchdog loop did not exit in time.
 */
export async function closeRuntime(runtime: Runtime): Promise<boolean> {
  const stopped = await runtime.watchdog.stop();
  runtime.store.close?.();
  return stopped;
}
