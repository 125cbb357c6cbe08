// src/authenticator.ts
// Accept/reject for a presented UsernameToken.
//
// Order (first failure wins):
//   1. identifier resolves in the store
//   2. Digest:    nonce + created present, created fresh, digest matches
//   3. PlainText: presented password equals the stored secret
//   4. anything else is rejected
//
// Callers only ever see accepted/rejected; the reason is for the server log.

import type { AuthDecision, AuthOutcome, Credentials } from "./types.js";
import type { CredentialStore } from "./credentials.js";
import { computePasswordDigest, digestsEqual } from "./digest.js";
import { FRESHNESS_WINDOW_SECONDS, isFresh } from "./freshness.js";
import { MalformedCredentialError } from "./errors.js";

export interface AuthenticatorOptions {
  freshnessWindowSeconds?: number;
  clock?: () => Date;
}

export class Authenticator {
  private readonly windowSeconds: number;
  private readonly clock: () => Date;

  constructor(private readonly store: CredentialStore, opts: AuthenticatorOptions = {}) {
    this.windowSeconds = opts.freshnessWindowSeconds ?? FRESHNESS_WINDOW_SECONDS;
    this.clock = opts.clock ?? (() => new Date());
  }

  authenticate(presented: Credentials | null, now?: Date): AuthDecision {
    const outcome = this.evaluate(presented, now);
    return outcome.ok
      ? { accepted: true, principal: outcome.principal.identifier }
      : { accepted: false };
  }

  evaluate(presented: Credentials | null, now?: Date): AuthOutcome {
    if (!presented) return { ok: false, reason: "missing_credentials" };

    const identifier = presented.identifier;
    const principal = this.store.lookup(identifier);
    if (!principal) return { ok: false, reason: "unknown_principal", identifier };

    if (presented.mode === "Digest") {
      const { nonce, created } = presented;
      if (!nonce || !created) return { ok: false, reason: "malformed_credential", identifier };

      // one clock read per check
      const at = now ?? this.clock();
      if (!isFresh(created, at, this.windowSeconds)) {
        return { ok: false, reason: "stale_timestamp", identifier };
      }

      let expected: string;
      try {
        expected = computePasswordDigest(nonce, created, principal.secret);
      } catch (e) {
        if (e instanceof MalformedCredentialError) {
          return { ok: false, reason: "malformed_credential", identifier };
        }
        throw e;
      }

      if (!digestsEqual(presented.presentedSecret, expected)) {
        return { ok: false, reason: "digest_mismatch", identifier };
      }
      return { ok: true, principal };
    }

    if (presented.mode === "PlainText") {
      if (presented.presentedSecret !== principal.secret) {
        return { ok: false, reason: "plaintext_mismatch", identifier };
      }
      return { ok: true, principal };
    }

    return { ok: false, reason: "unsupported_password_type", identifier };
  }
}
