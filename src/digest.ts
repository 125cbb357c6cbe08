// src/digest.ts
// WS-Security UsernameToken password digest:
//   Digest = Base64( SHA1( Base64Decode(Nonce) + Created + Password ) )

import crypto from "crypto";
import { MalformedCredentialError } from "./errors.js";

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodeNonce(nonceBase64: string): Buffer {
  const s = String(nonceBase64 ?? "").replace(/\s+/g, "");
  if (!s) throw new MalformedCredentialError("empty_nonce");
  if (s.length % 4 !== 0 || !BASE64_RE.test(s)) {
    throw new MalformedCredentialError("nonce_not_base64", { length: s.length });
  }
  return Buffer.from(s, "base64");
}

export function computeDigest(nonce: Uint8Array, created: string, secret: string): string {
  return crypto
    .createHash("sha1")
    .update(nonce)
    .update(Buffer.from(created, "utf8"))
    .update(Buffer.from(secret, "utf8"))
    .digest("base64");
}

export function computePasswordDigest(nonceBase64: string, created: string, secret: string): string {
  return computeDigest(decodeNonce(nonceBase64), created, secret);
}

/**
 * Exact equality of two digest strings. Same answer as `===`; the byte compare
 * just does not exit early.
 */
export function digestsEqual(presented: string, expected: string): boolean {
  const a = Buffer.from(presented, "utf8");
  const b = Buffer.from(expected, "utf8");
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(a, b);
}

export function generateNonce(byteLength = 16): string {
  return crypto.randomBytes(byteLength).toString("base64");
}

/** `YYYY-MM-DDTHH:MM:SS.000Z`, the shape ONVIF clients send. */
export function currentTimestamp(now: Date = new Date()): string {
  return now.toISOString().replace(/\.\d{3}Z$/, ".000Z");
}
