export type LicenseStatus = Readonly<{
  valid: boolean;
  reason: string;
  license_id: string | null;
  expiry_date: string | null;
  quota_limit: number | null;
  usage_count: number;
  quota_remaining: number | null;
  checked_at_utc: string | null;
}>;

export type LicenseRuntimeState = Readonly<{
  status: LicenseStatus;
  halted: boolean;
  haltedAt: string | null;
  lastWatchdogCycleAt: string | null;
}>;

export const UNCHECKED_STATUS: LicenseStatus = Object.freeze({
  valid: false,
  reason: "unchecked",
  license_id: null,
  expiry_date: null,
  quota_limit: null,
  usage_count: 0,
  quota_remaining: null,
  checked_at_utc: null,
});

/**
 * Single owned value that is only ever replaced whole.
 * Readers get a frozen snapshot and never observe a half-applied update.
 */
export class AtomicCell<T extends object> {
  private current: Readonly<T>;

  constructor(initial: T) {
    this.current = Object.freeze({ ...initial });
  }

  get(): Readonly<T> {
    return this.current;
  }

  replace(next: T): Readonly<T> {
    this.current = Object.freeze({ ...next });
    return this.current;
  }

  update(fn: (prev: Readonly<T>) => T): Readonly<T> {
    return this.replace(fn(this.current));
  }
}
