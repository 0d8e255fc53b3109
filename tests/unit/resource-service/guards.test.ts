/**
 * Request Guard Tests
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import express from 'express';
import request from 'supertest';
import {
  VerifiedRequestContext,
  extractBearerToken,
  withAuth,
} from '../../../src/resource-service/guards.js';
import { AuditService, InMemoryAuditStorage } from '../../../src/core/audit-service.js';
import { TokenCodec } from '../../../src/core/token-codec.js';
import type { RequiredRole } from '../../../src/core/types.js';
import { jsonErrorHandler } from '../../../src/utils/http-server.js';
import { ManualClock, TEST_TOKEN_SECRET, createTestIdentity } from '../../../src/testing/index.js';

describe('extractBearerToken', () => {
  it.each([
    ['Bearer abc.def.ghi', 'abc.def.ghi'],
    ['bearer abc', 'abc'],
    ['Bearer   abc  ', 'abc'],
  ])('should extract the token from %j', (header, expected) => {
    expect(extractBearerToken(header)).toBe(expected);
  });

  it.each([undefined, '', 'Basic dXNlcjpwYXNz', 'Bearer', 'Bearer a b', 42])(
    'should return null for %j',
    (header) => {
      expect(extractBearerToken(header)).toBeNull();
    }
  );
});

describe('withAuth', () => {
  let clock: ManualClock;
  let codec: TokenCodec;
  let storage: InMemoryAuditStorage;
  let handler: Mock<(ctx: VerifiedRequestContext) => void>;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    clock = new ManualClock();
    codec = new TokenCodec({ secret: TEST_TOKEN_SECRET, clock });
    storage = new InMemoryAuditStorage();
    handler = vi.fn<(ctx: VerifiedRequestContext) => void>();
  });

  const appFor = (requiredRole: RequiredRole) => {
    const app = express();
    app.get(
      '/protected',
      withAuth(
        codec,
        requiredRole,
        (_req, res, ctx) => {
          handler(ctx);
          res.json({ email: ctx.claims.email, allowed: ctx.decision.allowed });
        },
        { auditService: new AuditService({ enabled: true, storage }) }
      )
    );
    app.use(jsonErrorHandler('Test'));
    return app;
  };

  it('should hand the handler a verified context', async () => {
    const token = await codec.issue(createTestIdentity());

    const response = await request(appFor('authenticated'))
      .get('/protected')
      .set('Authorization', `Bearer ${token}`)
      .expect(200);

    expect(response.body).toEqual({ email: 'user1@example.com', allowed: true });
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0]).toBeInstanceOf(VerifiedRequestContext);
  });

  it('should answer 401 MISSING_TOKEN without a bearer credential', async () => {
    const response = await request(appFor('authenticated')).get('/protected').expect(401);

    expect(response.body).toEqual({ error: 'Missing or invalid token', code: 'MISSING_TOKEN' });
    expect(handler).not.toHaveBeenCalled();
  });

  it('should answer 401 INVALID_TOKEN for a token that fails verification', async () => {
    const response = await request(appFor('authenticated'))
      .get('/protected')
      .set('Authorization', 'Bearer not-a-jwt')
      .expect(401);

    expect(response.body).toEqual({ error: 'Invalid or expired token', code: 'INVALID_TOKEN' });
    expect(handler).not.toHaveBeenCalled();
  });

  it('should answer 403 and audit when the role is insufficient', async () => {
    const token = await codec.issue(createTestIdentity());

    const response = await request(appFor('admin'))
      .get('/protected')
      .set('Authorization', `Bearer ${token}`)
      .expect(403);

    expect(response.body).toEqual({ error: 'Admin access required', code: 'INSUFFICIENT_ROLE' });
    expect(handler).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledWith(
      '[ResourceGuard] Access denied: GET /protected requires admin, role=user'
    );
    expect(storage.getEntries()).toContainEqual(
      expect.objectContaining({
        source: 'resource:guard',
        userId: 'subject-123',
        action: 'access_denied',
        success: false,
        reason: 'requires_admin',
      })
    );
  });

  it('should never treat an unknown role as admin', async () => {
    const token = await codec.issue(createTestIdentity({ role: 'superuser' }));

    await request(appFor('admin')).get('/protected').set('Authorization', `Bearer ${token}`).expect(403);
    await request(appFor('authenticated'))
      .get('/protected')
      .set('Authorization', `Bearer ${token}`)
      .expect(200);
  });

  it('should pass handler failures to the error handler', async () => {
    const app = express();
    app.get(
      '/boom',
      withAuth(codec, 'authenticated', async () => {
        throw new Error('handler failed');
      })
    );
    app.use(jsonErrorHandler('Test'));
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const token = await codec.issue(createTestIdentity());

    const response = await request(app).get('/boom').set('Authorization', `Bearer ${token}`).expect(500);

    expect(response.body).toEqual({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });
});
