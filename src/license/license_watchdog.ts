import { setTimeout as sleep } from "node:timers/promises";

import { errorMessage } from "../errors";
import type { AuditLogger } from "../logging/logger";
import type { LicenseGuard } from "./license_guard";

export const MIN_WATCHDOG_INTERVAL_MS = 60_000;
export const DEFAULT_WATCHDOG_INTERVAL_MS = 300_000;

export type SleepImpl = (ms: number, signal: AbortSignal) => Promise<void>;

// Resolves early when the signal aborts; any other failure propagates.
const abortableSleep: SleepImpl = async (ms, signal) => {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) return;
    throw error;
  }
};

export function clampWatchdogInterval(ms: number | undefined): number {
  if (ms === undefined || !Number.isFinite(ms)) return DEFAULT_WATCHDOG_INTERVAL_MS;
  return Math.max(MIN_WATCHDOG_INTERVAL_MS, Math.floor(ms));
}

/**
 * Periodic license re-validation. Sleeps first, then runs one guard cycle.
 * Cycle failures are logged; the loop keeps going until stopped.
 */
export class LicenseWatchdog {
  readonly intervalMs: number;
  private readonly guard: LicenseGuard;
  private readonly log: AuditLogger;
  private readonly sleepImpl: SleepImpl;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private cycles = 0;

  constructor(opts: { guard: LicenseGuard; intervalMs?: number; log: AuditLogger; sleepImpl?: SleepImpl }) {
    this.guard = opts.guard;
    this.log = opts.log;
    this.intervalMs = clampWatchdogInterval(opts.intervalMs);
    this.sleepImpl = opts.sleepImpl ?? abortableSleep;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  get completedCycles(): number {
    return this.cycles;
  }

  start(): void {
    if (this.loop) return;

    const controller = new AbortController();
    this.controller = controller;
    this.log.info({ evt: "license.watchdog.start", intervalMs: this.intervalMs }, "license.watchdog.start");

    this.loop = this.run(controller.signal).finally(() => {
      this.loop = null;
      this.controller = null;
    });
  }

  /**
   * Request shutdown and wait up to `timeoutMs` for the loop to exit.
   * Resolves false if the loop did not finish in time.
   */
  async stop(timeoutMs = 5000): Promise<boolean> {
    const loop = this.loop;
    if (!loop) return true;

    this.controller?.abort();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      const finished = await Promise.race([loop.then(() => true as const), timedOut]);
      if (!finished) {
        this.log.warn({ evt: "license.watchdog.stop_timeout", timeoutMs }, "license.watchdog.stop_timeout");
      }
      return finished;
    } finally {
      clearTimeout(timer);
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.sleepImpl(this.intervalMs, signal);
      if (signal.aborted) break;

      try {
        const status = await this.guard.runWatchdogCycle(signal);
        this.cycles += 1;
        if (status) {
          this.log.debug?.(
            { evt: "license.watchdog.cycle", valid: status.valid, reason: status.reason },
            "license.watchdog.cycle"
          );
        }
      } catch (error) {
        this.log.error(
          { evt: "license.watchdog.cycle_failed", error: errorMessage(error) },
          "license.watchdog.cycle_failed"
        );
      }
    }
    this.log.info({ evt: "license.watchdog.stop" }, "license.watchdog.stop");
  }
}
