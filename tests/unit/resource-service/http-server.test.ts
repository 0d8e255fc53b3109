/**
 * Resource Service HTTP Tests
 *
 * Role-checked routes and the success envelope.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import request from 'supertest';
import { createResourceService, type ResourceService } from '../../../src/resource-service/index.js';
import { ManualClock, createTestConfig, createTestIdentity } from '../../../src/testing/index.js';

const EIGHT_HOURS_MS = 8 * 60 * 60 * 1000;

describe('Resource Service HTTP', () => {
  let clock: ManualClock;
  let service: ResourceService;
  let userToken: string;
  let adminToken: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    clock = new ManualClock();
    service = createResourceService(createTestConfig(), { clock });
    userToken = await service.tokenCodec.issue(createTestIdentity());
    adminToken = await service.tokenCodec.issue(
      createTestIdentity({ subjectId: 'subject-admin', email: 'admin@example.com', displayName: 'Admin User', role: 'admin' })
    );
  });

  const get = (path: string, token?: string) => {
    const pending = request(service.app).get(path);
    return token ? pending.set('Authorization', `Bearer ${token}`) : pending;
  };

  describe('admin routes (role check)', () => {
    it.each(['/resources/admin', '/admin/stats', '/admin/users'])(
      'should refuse a user token on %s with 403',
      async (path) => {
        const response = await get(path, userToken).expect(403);

        expect(response.body).toEqual({ error: 'Admin access required', code: 'INSUFFICIENT_ROLE' });
      }
    );

    it('should serve admin resources to an admin', async () => {
      const response = await get('/resources/admin', adminToken).expect(200);

      expect(response.body.status).toBe('success');
      expect(response.body.message).toBe('Retrieved 3 admin resources');
      expect(response.body.timestamp).toBe('2025-01-01T12:00:00.000Z');
      expect(response.body.data.map((r: { id: number }) => r.id)).toEqual([101, 102, 103]);
      expect(response.body.data[0]).toMatchObject({
        access_level: 'admin',
        accessible_by: 'admin@example.com',
      });
    });

    it('should serve system statistics', async () => {
      const response = await get('/admin/stats', adminToken).expect(200);

      expect(response.body.data).toEqual({
        total_resources: 6,
        user_resources_count: 3,
        admin_resources_count: 3,
        system_uptime: '5 days, 12 hours',
        active_users: 15,
        total_api_calls: 1247,
        last_updated: '2025-01-01T12:00:00.000Z',
      });
    });

    it('should list managed users', async () => {
      const response = await get('/admin/users', adminToken).expect(200);

      expect(response.body.message).toBe('User list retrieved successfully');
      expect(response.body.data.map((u: { email: string }) => u.email)).toEqual([
        'user1@example.com',
        'admin@example.com',
        'user2@example.com',
      ]);
    });
  });

  describe('authenticated routes', () => {
    it('should serve user resources to any verified token', async () => {
      for (const token of [userToken, adminToken]) {
        const response = await get('/resources/user', token).expect(200);
        expect(response.body.message).toBe('Retrieved 3 user resources');
      }
    });

    it('should include admin resources in /resources/all only for admins', async () => {
      const asUser = await get('/resources/all', userToken).expect(200);
      const asAdmin = await get('/resources/all', adminToken).expect(200);

      expect(asUser.body.message).toBe('Retrieved 3 accessible resources');
      expect(asAdmin.body.message).toBe('Retrieved 6 accessible resources');
      expect(asAdmin.body.data.map((r: { access_level: string }) => r.access_level)).toEqual([
        'user',
        'user',
        'user',
        'admin',
        'admin',
        'admin',
      ]);
    });

    it('should describe the caller on /user/profile', async () => {
      const response = await get('/user/profile', userToken).expect(200);

      expect(response.body.data).toEqual({
        user_info: {
          sub: 'subject-123',
          email: 'user1@example.com',
          name: 'Regular User',
          picture: '',
          role: 'user',
        },
        stats: {
          total_accessible_resources: 3,
          user_resources: 3,
          admin_resources: 0,
          role: 'user',
          last_accessed: '2025-01-01T12:00:00.000Z',
        },
        permissions: {
          can_access_user_resources: true,
          can_access_admin_resources: false,
          can_manage_users: false,
        },
      });
    });
  });

  describe('token checks', () => {
    it('should answer 401 for an expired token (scenario D)', async () => {
      clock.advance(EIGHT_HOURS_MS + 60_000);

      const response = await get('/resources/user', userToken).expect(401);

      expect(response.body).toEqual({ error: 'Invalid or expired token', code: 'INVALID_TOKEN' });
    });

    it('should answer 401 without a token', async () => {
      const response = await get('/user/profile').expect(401);

      expect(response.body.code).toBe('MISSING_TOKEN');
    });

    it('should reject a token signed with another secret', async () => {
      const other = createResourceService(
        createTestConfig({ security: { tokenSecret: 'other-token-secret-0123456789abcdef' } }),
        { clock }
      );
      const foreign = await other.tokenCodec.issue(createTestIdentity({ role: 'admin' }));

      await get('/resources/admin', foreign).expect(401);
    });
  });

  it('should answer /health without a token', async () => {
    const response = await get('/health').expect(200);

    expect(response.body).toEqual({ status: 'healthy', service: 'resource-service' });
  });
});
