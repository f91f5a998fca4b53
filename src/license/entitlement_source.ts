import { z } from "zod";

import { LicenseBackendError } from "../errors";

export type Entitlement = {
  license_id: string | null;
  expiry_date: string | null;
  quota_limit: number | null;
  active: boolean;
};

export interface EntitlementSource {
  readonly kind: "static" | "http";
  fetchEntitlement(licenseKey: string, opts?: { signal?: AbortSignal }): Promise<Entitlement>;
}

export const ExpiryDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

/**
 * Entitlement taken from process configuration; no network involved.
 */
export class StaticEntitlementSource implements EntitlementSource {
  readonly kind = "static" as const;

  constructor(private readonly entitlement: Entitlement) {}

  async fetchEntitlement(): Promise<Entitlement> {
    return { ...this.entitlement };
  }
}

const EntitlementResponse = z.object({
  license_id: z.string().min(1),
  expiry_date: ExpiryDate.nullable().optional(),
  quota_limit: z.number().int().min(0).nullable().optional(),
  active: z.boolean().default(true),
});

/**
 * Entitlement looked up on a license server: GET <baseUrl>/licenses/<key>.
 */
export class HttpEntitlementSource implements EntitlementSource {
  readonly kind = "http" as const;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(
    private readonly baseUrl: string,
    opts: { fetchImpl?: typeof fetch; timeoutMs?: number } = {}
  ) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
  }

  async fetchEntitlement(licenseKey: string, opts: { signal?: AbortSignal } = {}): Promise<Entitlement> {
    const url = new URL(`licenses/${encodeURIComponent(licenseKey)}`, withTrailingSlash(this.baseUrl));

    const res = await this.fetchImpl(url.toString(), {
      headers: { accept: "application/json", "x-license-key": licenseKey },
      signal: withTimeout(opts.signal, this.timeoutMs),
    });

    if (!res.ok) {
      throw new LicenseBackendError(`license server status ${res.status}`, { statusCode: res.status });
    }

    const parsed = EntitlementResponse.safeParse(await res.json());
    if (!parsed.success) {
      throw new LicenseBackendError("license server response invalid");
    }

    return {
      license_id: parsed.data.license_id,
      expiry_date: parsed.data.expiry_date ?? null,
      quota_limit: parsed.data.quota_limit ?? null,
      active: parsed.data.active,
    };
  }
}

// The caller's signal cancels; it never replaces the request timeout.
const withTimeout = (signal: AbortSignal | undefined, timeoutMs: number): AbortSignal =>
  signal ? AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)]) : AbortSignal.timeout(timeoutMs);

const withTrailingSlash = (value: string) => (value.endsWith("/") ? value : `${value}/`);
