export type LicensePolicyErrorCode = "license_invalid" | "license_halted";

/**
 * Business-rule rejection: the license gate refused the request.
 * Surfaced to callers as 503, never degraded silently.
 */
export class LicensePolicyError extends Error {
  public readonly code: LicensePolicyErrorCode;
  public readonly statusCode = 503;
  public readonly reason: string;

  constructor(code: LicensePolicyErrorCode, reason: string) {
    super(`License policy rejected request: ${reason}`);
    this.name = "LicensePolicyError";
    this.code = code;
    this.reason = reason;
  }

  toJSON() {
    return {
      error: this.code,
      reason: this.reason,
      retryable: true,
    };
  }
}

export class DecisionEngineError extends Error {
  statusCode: number;
  retryable: boolean;
  errorCode?: string;

  constructor(
    message: string,
    args: {
      statusCode?: number;
      retryable?: boolean;
      errorCode?: string;
    } = {}
  ) {
    super(message);
    this.name = "DecisionEngineError";
    this.statusCode = args.statusCode ?? 502;
    this.retryable = args.retryable ?? true;
    this.errorCode = args.errorCode;
  }
}

export class EventStoreWriteError extends Error {
  statusCode?: number;
  store: string;

  constructor(message: string, args: { store: string; statusCode?: number }) {
    super(message);
    this.name = "EventStoreWriteError";
    this.store = args.store;
    this.statusCode = args.statusCode;
  }
}

export class LicenseBackendError extends Error {
  statusCode?: number;

  constructor(message: string, args: { statusCode?: number } = {}) {
    super(message);
    this.name = "LicenseBackendError";
    this.statusCode = args.statusCode;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * The decision engine answered but flagged the request itself as unprocessable.
 */
export class VerdictRejectedError extends Error {
  public readonly code = "verdict_rejected";
  public readonly statusCode = 400;
  public readonly reason: string;

  constructor(reason: string) {
    super(`Decision engine rejected request: ${reason}`);
    this.name = "VerdictRejectedError";
    this.reason = reason;
  }

  toJSON() {
    return {
      error: this.code,
      reason: this.reason,
      retryable: false,
    };
  }
}
