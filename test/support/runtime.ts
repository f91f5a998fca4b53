import { loadRuntimeConfig } from "../../src/config/runtime_config";
import type { DecisionEngine } from "../../src/engine/decision_engine";
import type { EntitlementSource } from "../../src/license/entitlement_source";
import { createRuntime } from "../../src/runtime";
import { MemoryEventStore } from "../../src/store/event_store";
import { makeLogger } from "./capture_logger";

export const makeTestRuntime = (
  args: {
    env?: NodeJS.ProcessEnv;
    engine?: DecisionEngine;
    entitlementSource?: EntitlementSource;
  } = {}
) => {
  const { log, entries } = makeLogger();
  const store = new MemoryEventStore();
  const config = loadRuntimeConfig({
    LICENSE_KEY: "test-license",
    FINGERPRINT_SALT: "test-salt",
    ...args.env,
  });
  let tick = 0;
  const runtime = createRuntime(config, log, {
    engine: args.engine,
    entitlementSource: args.entitlementSource,
    store,
    now: () => new Date("2026-03-04T05:06:07Z"),
    clock: () => {
      tick += 5;
      return tick;
    },
  });

  return { runtime, store, entries };
};
