import { LicensePolicyError } from "../errors";
import type { AuditLogger } from "../logging/logger";
import {
  AtomicCell,
  UNCHECKED_STATUS,
  type LicenseRuntimeState,
  type LicenseStatus,
} from "./license_status";
import type { LicenseValidator } from "./license_validator";

export type EnforcementMode = "degrade" | "stop";

export type LicenseGuardOptions = {
  validator: LicenseValidator;
  mode: EnforcementMode;
  usage: () => number;
  log: AuditLogger;
  // Request-time checks reuse an entitlement fetched within this window.
  requestCheckMaxAgeMs?: number;
  now?: () => Date;
};

/**
 * Owns the license runtime state: last status plus the halt flag.
 *
 * In stop mode an invalid status halts request serving. Only a later watchdog cycle
 * that sees a valid status clears the halt. Degrade mode logs and keeps serving.
 */
export class LicenseGuard {
  readonly mode: EnforcementMode;
  private readonly validator: LicenseValidator;
  private readonly usage: () => number;
  private readonly log: AuditLogger;
  private readonly requestCheckMaxAgeMs: number | undefined;
  private readonly now: () => Date;
  private readonly state = new AtomicCell<LicenseRuntimeState>({
    status: UNCHECKED_STATUS,
    halted: false,
    haltedAt: null,
    lastWatchdogCycleAt: null,
  });

  constructor(opts: LicenseGuardOptions) {
    this.mode = opts.mode;
    this.validator = opts.validator;
    this.usage = opts.usage;
    this.log = opts.log;
    this.requestCheckMaxAgeMs = opts.requestCheckMaxAgeMs;
    this.now = opts.now ?? (() => new Date());
  }

  snapshot(): LicenseRuntimeState {
    return this.state.get();
  }

  get halted(): boolean {
    return this.state.get().halted;
  }

  /**
   * Startup validation. In stop mode an invalid license refuses to start.
   */
  async checkAtStartup(): Promise<LicenseStatus> {
    const status = await this.validator.validate(this.usage());
    this.state.update((prev) => ({ ...prev, status }));

    if (!status.valid) {
      this.log.warn(
        { evt: "license.startup_invalid", mode: this.mode, reason: status.reason },
        "license.startup_invalid"
      );
      if (this.mode === "stop") {
        throw new LicensePolicyError("license_invalid", status.reason);
      }
    } else {
      this.log.info(
        { evt: "license.startup_ok", licenseId: status.license_id, quotaRemaining: status.quota_remaining },
        "license.startup_ok"
      );
    }

    return status;
  }

  /**
   * One periodic re-validation. Sets or clears the halt flag in stop mode.
   * If `signal` aborts while validation is in flight, the result is discarded.
   */
  async runWatchdogCycle(signal?: AbortSignal): Promise<LicenseStatus | null> {
    const status = await this.validator.validate(this.usage(), { signal });
    if (signal?.aborted) return null;

    const cycleAt = this.now().toISOString();
    const prev = this.state.get();

    if (status.valid) {
      if (prev.halted) {
        this.log.info({ evt: "license.resumed", reason: status.reason }, "license.resumed");
      }
      this.state.replace({ status, halted: false, haltedAt: null, lastWatchdogCycleAt: cycleAt });
      return status;
    }

    if (this.mode === "stop") {
      if (!prev.halted) {
        this.log.error({ evt: "license.halted", reason: status.reason, source: "watchdog" }, "license.halted");
      }
      this.state.replace({
        status,
        halted: true,
        haltedAt: prev.haltedAt ?? cycleAt,
        lastWatchdogCycleAt: cycleAt,
      });
    } else {
      this.log.warn({ evt: "license.degraded", reason: status.reason, source: "watchdog" }, "license.degraded");
      this.state.replace({ ...prev, status, lastWatchdogCycleAt: cycleAt });
    }

    return status;
  }

  /**
   * Request-time gate. Runs before the decision engine.
   */
  async admitRequest(): Promise<LicenseStatus> {
    const before = this.state.get();
    if (before.halted) {
      throw new LicensePolicyError("license_halted", before.status.reason);
    }

    const status = await this.validator.validate(this.usage(), { maxCacheAgeMs: this.requestCheckMaxAgeMs });

    if (status.valid) {
      this.state.update((prev) => ({ ...prev, status }));
      return status;
    }

    if (this.mode === "stop") {
      const haltedAt = this.now().toISOString();
      this.state.update((prev) => ({ ...prev, status, halted: true, haltedAt: prev.haltedAt ?? haltedAt }));
      this.log.error({ evt: "license.halted", reason: status.reason, source: "request" }, "license.halted");
      throw new LicensePolicyError("license_invalid", status.reason);
    }

    this.state.update((prev) => ({ ...prev, status }));
    this.log.warn({ evt: "license.degraded", reason: status.reason, source: "request" }, "license.degraded");
    return status;
  }
}
