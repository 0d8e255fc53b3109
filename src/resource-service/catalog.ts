/**
 * Mock resource catalog
 *
 * Static fixtures stand in for a document store. Every read returns fresh
 * copies enriched with the caller's access metadata.
 */

import { ROLE_ADMIN } from '../core/types.js';
import type { Identity } from '../core/types.js';

export type AccessLevel = 'user' | 'admin';

export interface Resource {
  id: number;
  title: string;
  content: string;
  type: string;
  created_at: string;
  sensitive?: boolean;
}

export interface AccessibleResource extends Resource {
  access_level: AccessLevel;
  accessible_by: string;
}

export interface ManagedUser {
  id: number;
  email: string;
  name: string;
  role: string;
  last_login: string;
  status: 'active' | 'disabled';
}

const USER_DOCUMENTS: readonly Resource[] = [
  {
    id: 1,
    title: 'Personal Document 1',
    content: 'This is a user-accessible document.',
    type: 'document',
    created_at: '2025-01-01T10:00:00Z',
  },
  {
    id: 2,
    title: 'User Report',
    content: 'Monthly user activity report.',
    type: 'report',
    created_at: '2025-01-15T14:30:00Z',
  },
  {
    id: 3,
    title: 'Project Files',
    content: 'Access to your project files and documents.',
    type: 'files',
    created_at: '2025-01-20T09:15:00Z',
  },
];

const ADMIN_RESOURCES: readonly Resource[] = [
  {
    id: 101,
    title: 'System Configuration',
    content: 'Critical system settings and configurations.',
    type: 'config',
    created_at: '2025-01-01T09:00:00Z',
    sensitive: true,
  },
  {
    id: 102,
    title: 'User Management Dashboard',
    content: 'Comprehensive user analytics and management tools.',
    type: 'dashboard',
    created_at: '2025-01-10T11:00:00Z',
    sensitive: true,
  },
  {
    id: 103,
    title: 'System Logs',
    content: 'Access to system logs and audit trails.',
    type: 'logs',
    created_at: '2025-01-25T16:45:00Z',
    sensitive: true,
  },
];

const MANAGED_USERS: readonly ManagedUser[] = [
  {
    id: 1,
    email: 'user1@example.com',
    name: 'Regular User',
    role: 'user',
    last_login: '2025-01-30T10:30:00Z',
    status: 'active',
  },
  {
    id: 2,
    email: 'admin@example.com',
    name: 'Admin User',
    role: 'admin',
    last_login: '2025-01-31T08:15:00Z',
    status: 'active',
  },
  {
    id: 3,
    email: 'user2@example.com',
    name: 'Another User',
    role: 'user',
    last_login: '2025-01-29T14:45:00Z',
    status: 'active',
  },
];

function enrich(
  resources: readonly Resource[],
  accessLevel: (resource: Resource) => AccessLevel,
  email: string
): AccessibleResource[] {
  return resources.map((resource) => ({
    ...resource,
    access_level: accessLevel(resource),
    accessible_by: email,
  }));
}

export function userResources(claims: Identity): AccessibleResource[] {
  return enrich(USER_DOCUMENTS, () => 'user', claims.email);
}

export function adminResources(claims: Identity): AccessibleResource[] {
  return enrich(ADMIN_RESOURCES, () => 'admin', claims.email);
}

/**
 * User documents for everyone; admin resources appended for admins
 */
export function accessibleResources(claims: Identity): AccessibleResource[] {
  const resources = claims.role === ROLE_ADMIN ? [...USER_DOCUMENTS, ...ADMIN_RESOURCES] : USER_DOCUMENTS;
  return enrich(resources, (resource) => (resource.sensitive ? 'admin' : 'user'), claims.email);
}

export function userProfile(claims: Identity, now: Date) {
  const isAdmin = claims.role === ROLE_ADMIN;
  const userCount = USER_DOCUMENTS.length;
  const adminCount = isAdmin ? ADMIN_RESOURCES.length : 0;

  return {
    user_info: {
      sub: claims.subjectId,
      email: claims.email,
      name: claims.displayName,
      picture: claims.avatarUrl ?? '',
      role: claims.role,
    },
    stats: {
      total_accessible_resources: userCount + adminCount,
      user_resources: userCount,
      admin_resources: adminCount,
      role: claims.role,
      last_accessed: now.toISOString(),
    },
    permissions: {
      can_access_user_resources: true,
      can_access_admin_resources: isAdmin,
      can_manage_users: isAdmin,
    },
  };
}

export function systemStats(now: Date) {
  return {
    total_resources: USER_DOCUMENTS.length + ADMIN_RESOURCES.length,
    user_resources_count: USER_DOCUMENTS.length,
    admin_resources_count: ADMIN_RESOURCES.length,
    system_uptime: '5 days, 12 hours',
    active_users: 15,
    total_api_calls: 1247,
    last_updated: now.toISOString(),
  };
}

export function managedUsers(): ManagedUser[] {
  return MANAGED_USERS.map((user) => ({ ...user }));
}
