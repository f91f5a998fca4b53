import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { ExpiryDate } from "../license/entitlement_source";
import type { EnforcementMode } from "../license/license_guard";
import { clampWatchdogInterval, DEFAULT_WATCHDOG_INTERVAL_MS } from "../license/license_watchdog";
import { DEFAULT_METRICS_WINDOW } from "../metrics/metrics_aggregator";
import { DEFAULT_MEMORY_STORE_MAX_OBJECTS, type EventStoreKind } from "../store/event_store";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const intWithDefault = (fallback: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const flag = z.preprocess(blankToUndefined, z.enum(["0", "1", "true", "false"]).optional());

const EnvSchema = z.object({
  NODE_ENV: optionalString,
  PORT: intWithDefault(7860, 0),
  HOST: optionalString,
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional()
  ),
  PINO_PRETTY: flag,
  FINGERPRINT_SALT: z.string().default(""),
  API_VERSION: optionalString,

  LICENSE_ENFORCEMENT_MODE: z.preprocess(
    (value) => (typeof value === "string" ? blankToUndefined(value.trim().toLowerCase()) : value),
    z.enum(["degrade", "stop"]).default("degrade")
  ),
  LICENSE_KEY: optionalString,
  LICENSE_ID: optionalString,
  LICENSE_EXPIRY_DATE: z.preprocess(blankToUndefined, ExpiryDate.optional()),
  LICENSE_QUOTA_LIMIT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).optional()),
  LICENSE_SERVER_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  LICENSE_WATCHDOG_INTERVAL_MS: intWithDefault(DEFAULT_WATCHDOG_INTERVAL_MS, 0),

  METRICS_WINDOW_SIZE: intWithDefault(DEFAULT_METRICS_WINDOW, 1),

  AUDIT_STORE: z.preprocess(
    (value) => (typeof value === "string" ? blankToUndefined(value.trim().toLowerCase()) : value),
    z.enum(["github", "sqlite", "memory", "none"]).optional()
  ),
  GITHUB_TOKEN: optionalString,
  GH_TOKEN: optionalString,
  GITHUB_REPO: optionalString,
  GH_REPO: optionalString,
  GITHUB_BRANCH: optionalString,
  GITHUB_API_BASE: z.preprocess(blankToUndefined, z.string().url().optional()),
  AUDIT_PATH_PREFIX: z.string().default("logs"),
  AUDIT_DB_PATH: z.string().min(1).default("./data/audit.db"),
  AUDIT_WRITE_TIMEOUT_MS: intWithDefault(10_000, 1),
  AUDIT_MEMORY_MAX_OBJECTS: intWithDefault(DEFAULT_MEMORY_STORE_MAX_OBJECTS, 1),

  DECISION_ENGINE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  DECISION_ENGINE_TIMEOUT_MS: intWithDefault(30_000, 1),
});

export type GitHubStoreConfig = {
  token: string;
  repo: string;
  branch: string | null;
  apiBase: string | null;
};

export type RuntimeConfig = {
  isDev: boolean;
  port: number;
  host: string;
  logLevel: string | null;
  pretty: boolean;
  fingerprintSalt: string;
  apiVersion: string;
  license: {
    mode: EnforcementMode;
    key: string | null;
    id: string | null;
    expiryDate: string | null;
    quotaLimit: number | null;
    serverUrl: string | null;
    watchdogIntervalMs: number;
  };
  metricsWindowSize: number;
  audit: {
    store: EventStoreKind;
    github: GitHubStoreConfig | null;
    pathPrefix: string;
    dbPath: string;
    writeTimeoutMs: number;
    memoryMaxObjects: number;
  };
  decisionEngine: {
    url: string | null;
    timeoutMs: number;
  };
};

export class RuntimeConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid runtime configuration: ${issues.join("; ")}`);
    this.name = "RuntimeConfigError";
    this.issues = issues;
  }
}

/**
 * GitHub credentials, GITHUB_* first with GH_* as fallback.
 */
export function resolveGitHubEnv(env: { GITHUB_TOKEN?: string; GH_TOKEN?: string; GITHUB_REPO?: string; GH_REPO?: string }) {
  return {
    token: env.GITHUB_TOKEN ?? env.GH_TOKEN ?? null,
    repo: env.GITHUB_REPO ?? env.GH_REPO ?? null,
  };
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    const issues = Object.entries(fieldErrors).map(([key, messages]) => `${key}: ${(messages ?? []).join(", ")}`);
    throw new RuntimeConfigError(issues);
  }
  const e = parsed.data;

  const gh = resolveGitHubEnv(e);
  const github: GitHubStoreConfig | null =
    gh.token && gh.repo
      ? { token: gh.token, repo: gh.repo, branch: e.GITHUB_BRANCH ?? null, apiBase: e.GITHUB_API_BASE ?? null }
      : null;

  const store: EventStoreKind = e.AUDIT_STORE ?? (github ? "github" : "memory");
  if (store === "github" && !github) {
    throw new RuntimeConfigError(["AUDIT_STORE: github requires GITHUB_TOKEN and GITHUB_REPO (or GH_TOKEN and GH_REPO)"]);
  }

  const isDev = e.NODE_ENV !== "production";

  return {
    isDev,
    port: e.PORT,
    host: e.HOST ?? "0.0.0.0",
    logLevel: e.LOG_LEVEL ?? null,
    pretty: e.PINO_PRETTY === "1" || e.PINO_PRETTY === "true",
    fingerprintSalt: e.FINGERPRINT_SALT,
    apiVersion: e.API_VERSION ?? "2.0.0",
    license: {
      mode: e.LICENSE_ENFORCEMENT_MODE,
      key: e.LICENSE_KEY ?? null,
      id: e.LICENSE_ID ?? null,
      expiryDate: e.LICENSE_EXPIRY_DATE ?? null,
      quotaLimit: e.LICENSE_QUOTA_LIMIT ?? null,
      serverUrl: e.LICENSE_SERVER_URL ?? null,
      watchdogIntervalMs: clampWatchdogInterval(e.LICENSE_WATCHDOG_INTERVAL_MS),
    },
    metricsWindowSize: e.METRICS_WINDOW_SIZE,
    audit: {
      store,
      github,
      pathPrefix: e.AUDIT_PATH_PREFIX,
      dbPath: e.AUDIT_DB_PATH,
      writeTimeoutMs: e.AUDIT_WRITE_TIMEOUT_MS,
      memoryMaxObjects: e.AUDIT_MEMORY_MAX_OBJECTS,
    },
    decisionEngine: {
      url: e.DECISION_ENGINE_URL ?? null,
      timeoutMs: e.DECISION_ENGINE_TIMEOUT_MS,
    },
  };
}
