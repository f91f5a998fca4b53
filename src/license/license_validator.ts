import { errorMessage } from "../errors";
import type { Entitlement, EntitlementSource } from "./entitlement_source";
import type { LicenseStatus } from "./license_status";

export type LicenseReason =
  | "ok"
  | "missing_license_key"
  | "license_inactive"
  | "license_expired"
  | "quota_exceeded"
  | `validation_exception:${string}`;

type CachedEntitlement = {
  entitlement: Entitlement;
  fetchedAtMs: number;
};

const MAX_EXCEPTION_DETAIL = 200;

/**
 * Evaluate an entitlement against the usage counter at one instant.
 * Each call is authoritative for its moment; nothing carries over from earlier checks.
 */
export function evaluateEntitlement(
  entitlement: Entitlement,
  usageCount: number,
  now: Date
): { valid: boolean; reason: LicenseReason; quotaRemaining: number | null } {
  const quotaRemaining =
    entitlement.quota_limit === null ? null : Math.max(0, entitlement.quota_limit - usageCount);

  if (!entitlement.active) {
    return { valid: false, reason: "license_inactive", quotaRemaining };
  }

  const today = now.toISOString().slice(0, 10);
  if (entitlement.expiry_date !== null && today > entitlement.expiry_date) {
    return { valid: false, reason: "license_expired", quotaRemaining };
  }

  if (entitlement.quota_limit !== null && usageCount >= entitlement.quota_limit) {
    return { valid: false, reason: "quota_exceeded", quotaRemaining };
  }

  return { valid: true, reason: "ok", quotaRemaining };
}

export class LicenseValidator {
  private readonly source: EntitlementSource;
  private readonly licenseKey: string | null;
  private readonly now: () => Date;
  private cached: CachedEntitlement | null = null;

  constructor(opts: { source: EntitlementSource; licenseKey?: string | null; now?: () => Date }) {
    this.source = opts.source;
    this.licenseKey = opts.licenseKey ?? null;
    this.now = opts.now ?? (() => new Date());
  }

  get sourceKind(): EntitlementSource["kind"] {
    return this.source.kind;
  }

  /**
   * Never rejects. A backend failure is reported as `validation_exception:<detail>`.
   * With `maxCacheAgeMs`, an entitlement fetched within that window is reused instead of calling the source.
   */
  async validate(
    usageCount: number,
    opts: { maxCacheAgeMs?: number; signal?: AbortSignal } = {}
  ): Promise<LicenseStatus> {
    const now = this.now();
    const checkedAt = now.toISOString();

    if (!this.licenseKey) {
      return this.invalid("missing_license_key", usageCount, checkedAt);
    }

    let entitlement: Entitlement;
    const cached = this.cached;
    if (
      opts.maxCacheAgeMs !== undefined
      && cached
      && now.getTime() - cached.fetchedAtMs <= opts.maxCacheAgeMs
    ) {
      entitlement = cached.entitlement;
    } else {
      try {
        entitlement = await this.source.fetchEntitlement(this.licenseKey, { signal: opts.signal });
        this.cached = { entitlement, fetchedAtMs: now.getTime() };
      } catch (error) {
        const detail = errorMessage(error).slice(0, MAX_EXCEPTION_DETAIL);
        return this.invalid(`validation_exception:${detail}`, usageCount, checkedAt);
      }
    }

    const verdict = evaluateEntitlement(entitlement, usageCount, now);
    return {
      valid: verdict.valid,
      reason: verdict.reason,
      license_id: entitlement.license_id,
      expiry_date: entitlement.expiry_date,
      quota_limit: entitlement.quota_limit,
      usage_count: usageCount,
      quota_remaining: verdict.quotaRemaining,
      checked_at_utc: checkedAt,
    };
  }

  private invalid(reason: LicenseReason, usageCount: number, checkedAt: string): LicenseStatus {
    return {
      valid: false,
      reason,
      license_id: null,
      expiry_date: null,
      quota_limit: null,
      usage_count: usageCount,
      quota_remaining: null,
      checked_at_utc: checkedAt,
    };
  }
}
