/**
 * Authentication and authorization types.
 *
 * A request acts as a principal address. With API keys configured the
 * key decides the principal; without them the node is unsecured and
 * takes the principal from the X-Principal header.
 *
 * Role hierarchy: admin > operator > viewer
 */

import type { Address } from "@tracebound/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/** Permission levels; GET needs read, every other method write */
export type Permission = "read" | "write";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "header" | "anonymous";

  /** Absent only for anonymous callers in unsecured mode */
  readonly principal?: Address | undefined;
  readonly role: Role;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly principal: Address;
}
