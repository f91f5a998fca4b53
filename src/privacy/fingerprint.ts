import { createHash } from "node:crypto";

export type Fingerprint = {
  sha256_hex: string;
  length: number;
};

/**
 * One-way stand-in for text that must never be persisted.
 * Input is hashed exactly as given (no trim, no normalization); length counts code points.
 */
export function fingerprint(text: string | null | undefined, salt: string): Fingerprint {
  const value = text ?? "";
  const sha256_hex = createHash("sha256").update(salt, "utf8").update(value, "utf8").digest("hex");
  return { sha256_hex, length: Array.from(value).length };
}
