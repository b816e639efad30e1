import crypto from "crypto";

// Per-process key: digests are only ever compared with each other, never stored.
const PEPPER = crypto.randomBytes(32);

export function hmacSecret(value: string): Buffer {
  return crypto.createHmac("sha256", PEPPER).update(value).digest();
}

/**
 * Constant-time string comparison. Both sides are reduced to fixed-length
 * HMAC digests first, so unequal lengths do not short-circuit.
 */
export function safeEqual(a: string, b: string): boolean {
  return crypto.timingSafeEqual(hmacSecret(a), hmacSecret(b));
}
