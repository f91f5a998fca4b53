import { buildApp } from "./app";
import { loadRuntimeConfig } from "./config/runtime_config";
import { errorMessage } from "./errors";
import { createLogger } from "./logging/logger";
import { closeRuntime, createRuntime } from "./runtime";

const config = loadRuntimeConfig();
const log = createLogger({ level: config.logLevel ?? undefined, isDev: config.isDev, pretty: config.pretty });
const runtime = createRuntime(config, log);
const app = buildApp(runtime, { logger: log });

async function main() {
  // Stop mode refuses to start on an invalid license.
  await runtime.guard.checkAtStartup();
  runtime.watchdog.start();

  log.info(
    {
      evt: "service.config",
      engine: runtime.engine.kind,
      auditStore: runtime.store.kind,
      licenseMode: config.license.mode,
      watchdogIntervalMs: runtime.watchdog.intervalMs,
      salted: config.fingerprintSalt.length > 0,
    },
    "service.config"
  );

  await app.listen({ port: config.port, host: config.host });
}

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ evt: "service.shutdown", signal }, "service.shutdown");

  try {
    await app.close();
  } catch (error) {
    log.error({ evt: "service.close_failed", error: errorMessage(error) }, "service.close_failed");
  }
  const stopped = await closeRuntime(runtime);
  process.exit(stopped ? 0 : 1);
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

main().catch((err) => {
  log.error({ evt: "service.start_failed", error: errorMessage(err) }, "service.start_failed");
  process.exit(1);
});
