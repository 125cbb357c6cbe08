// src/credentials.ts

import type { Principal, PrincipalRole } from "./types.js";
import { ConfigError } from "./errors.js";

const ROLES: readonly PrincipalRole[] = ["Administrator", "User"];

export const DEFAULT_PRINCIPALS: readonly Principal[] = [
  { identifier: "admin", secret: "admin123", role: "Administrator" },
  { identifier: "user", secret: "user123", role: "User" },
];

export function isPrincipalRole(value: unknown): value is PrincipalRole {
  return ROLES.some((role) => role === value);
}

/**
 * Read-only principal table, built once at startup and handed to the
 * Authenticator. There is no mutation API.
 */
export class CredentialStore {
  private readonly byId: ReadonlyMap<string, Principal>;

  constructor(principals: readonly Principal[] = DEFAULT_PRINCIPALS) {
    const map = new Map<string, Principal>();
    for (const p of principals) {
      if (!p.identifier) throw new ConfigError("principal_missing_identifier");
      if (!isPrincipalRole(p.role)) {
        throw new ConfigError("principal_invalid_role", { identifier: p.identifier });
      }
      if (map.has(p.identifier)) {
        throw new ConfigError("principal_duplicate_identifier", { identifier: p.identifier });
      }
      map.set(p.identifier, Object.freeze({ ...p }));
    }
    this.byId = map;
  }

  lookup(identifier: string): Principal | null {
    return this.byId.get(identifier) ?? null;
  }

  get size(): number {
    return this.byId.size;
  }

  identifiers(): string[] {
    return [...this.byId.keys()];
  }
}
