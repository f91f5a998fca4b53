import { describe, it, expect } from "vitest";

import { loadRuntimeConfig, RuntimeConfigError } from "../src/config/runtime_config";
import { createEventStore } from "../src/runtime";
import { MemoryEventStore } from "../src/store/event_store";

describe("loadRuntimeConfig", () => {
  it("applies defaults", () => {
    const config = loadRuntimeConfig({});

    expect(config.port).toBe(7860);
    expect(config.host).toBe("0.0.0.0");
    expect(config.isDev).toBe(true);
    expect(config.fingerprintSalt).toBe("");
    expect(config.apiVersion).toBe("2.0.0");
    expect(config.license).toEqual({
      mode: "degrade",
      key: null,
      id: null,
      expiryDate: null,
      quotaLimit: null,
      serverUrl: null,
      watchdogIntervalMs: 300_000,
    });
    expect(config.metricsWindowSize).toBe(2000);
    expect(config.audit).toEqual({
      store: "memory",
      github: null,
      pathPrefix: "logs",
      dbPath: "./data/audit.db",
      writeTimeoutMs: 10_000,
      memoryMaxObjects: 1000,
    });
    expect(config.decisionEngine.url).toBeNull();
  });

  it("treats blank values as unset", () => {
    const config = loadRuntimeConfig({ PORT: "", LICENSE_KEY: "  ", AUDIT_STORE: "" });

    expect(config.port).toBe(7860);
    expect(config.license.key).toBeNull();
    expect(config.audit.store).toBe("memory");
  });

  it("bounds the memory store from AUDIT_MEMORY_MAX_OBJECTS", () => {
    const config = loadRuntimeConfig({ AUDIT_MEMORY_MAX_OBJECTS: "25" });
    const store = createEventStore(config);

    expect(config.audit.memoryMaxObjects).toBe(25);
    expect(store).toBeInstanceOf(MemoryEventStore);
    expect(store instanceof MemoryEventStore ? store.maxObjects : null).toBe(25);
    expect(() => loadRuntimeConfig({ AUDIT_MEMORY_MAX_OBJECTS: "0" })).toThrow(RuntimeConfigError);
  });

  it("selects the GitHub store when credentials are present", () => {
    const config = loadRuntimeConfig({ GH_TOKEN: "test-token", GH_REPO: "acme/audit-trail" });

    expect(config.audit.store).toBe("github");
    expect(config.audit.github).toEqual({ token: "test-token", repo: "acme/audit-trail", branch: null, apiBase: null });
  });

  it("prefers GITHUB_* over GH_*", () => {
    const config = loadRuntimeConfig({
      GITHUB_TOKEN: "test-token-a",
      GH_TOKEN: "test-token-b",
      GITHUB_REPO: "acme/primary",
      GH_REPO: "acme/fallback",
    });

    expect(config.audit.github?.token).toBe("test-token-a");
    expect(config.audit.github?.repo).toBe("acme/primary");
  });

  it("parses license settings", () => {
    const config = loadRuntimeConfig({
      LICENSE_ENFORCEMENT_MODE: "STOP",
      LICENSE_KEY: "test-license",
      LICENSE_ID: "lic-1",
      LICENSE_EXPIRY_DATE: "2026-12-31",
      LICENSE_QUOTA_LIMIT: "25",
      LICENSE_WATCHDOG_INTERVAL_MS: "1000",
    });

    expect(config.license).toMatchObject({
      mode: "stop",
      key: "test-license",
      id: "lic-1",
      expiryDate: "2026-12-31",
      quotaLimit: 25,
      watchdogIntervalMs: 60_000,
    });
  });

  it("marks production as non-dev", () => {
    expect(loadRuntimeConfig({ NODE_ENV: "production" }).isDev).toBe(false);
  });

  it("rejects invalid values", () => {
    expect(() => loadRuntimeConfig({ LICENSE_ENFORCEMENT_MODE: "halt" })).toThrow(RuntimeConfigError);
    expect(() => loadRuntimeConfig({ PORT: "abc" })).toThrow(/PORT/);
    expect(() => loadRuntimeConfig({ LICENSE_EXPIRY_DATE: "31/12/2026" })).toThrow(/LICENSE_EXPIRY_DATE/);
  });

  it("requires credentials for an explicit GitHub store", () => {
    expect(() => loadRuntimeConfig({ AUDIT_STORE: "github" })).toThrow(RuntimeConfigError);
  });
});
