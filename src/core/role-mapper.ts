/**
 * Role Mapper - Email to Role Lookup
 *
 * A total function `email -> role` over a configuration-supplied mapping with
 * a fixed fallback. NEVER throws: malformed input falls back to the default
 * (lowest-privilege) role.
 *
 * Usage:
 * ```typescript
 * const mapper = new RoleMapper({ mappings: { 'admin@example.com': 'admin' } });
 * mapper.roleFor('admin@example.com'); // 'admin'
 * mapper.roleFor('someone@example.com'); // 'user'
 * ```
 */

import { ROLE_ADMIN, ROLE_USER, type Role } from './types.js';

export interface RoleMappingConfig {
  /** Email address to role */
  mappings?: Record<string, Role>;

  /** Role for addresses without an entry (default: 'user') */
  defaultRole?: Role;
}

export class RoleMapper {
  private readonly mappings: Map<string, Role>;
  private readonly defaultRole: Role;

  constructor(config?: RoleMappingConfig) {
    this.defaultRole = config?.defaultRole ?? ROLE_USER;
    this.mappings = new Map(
      Object.entries(config?.mappings ?? {}).map(([email, role]) => [normalize(email), role])
    );
  }

  /**
   * Role for an email address. Lookup is case-insensitive and ignores
   * surrounding whitespace.
   */
  roleFor(email: unknown): Role {
    if (typeof email !== 'string' || email.trim().length === 0) {
      return this.defaultRole;
    }

    return this.mappings.get(normalize(email)) ?? this.defaultRole;
  }

  isAdmin(email: unknown): boolean {
    return this.roleFor(email) === ROLE_ADMIN;
  }

  getConfig(): Required<RoleMappingConfig> {
    return {
      mappings: Object.fromEntries(this.mappings),
      defaultRole: this.defaultRole,
    };
  }
}

function normalize(email: string): string {
  return email.trim().toLowerCase();
}
