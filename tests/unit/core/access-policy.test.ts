import { describe, it, expect } from 'vitest';
import { authorize, decide } from '../../../src/core/access-policy.js';
import { createTestIdentity } from '../../../src/testing/index.js';

describe('AccessPolicy', () => {
  const user = createTestIdentity({ role: 'user' });
  const admin = createTestIdentity({ role: 'admin', email: 'admin@example.com' });

  describe('authorize', () => {
    it('should allow any verified claims for authenticated routes', () => {
      expect(authorize(user, 'authenticated')).toBe(true);
      expect(authorize(admin, 'authenticated')).toBe(true);
      expect(authorize(createTestIdentity({ role: 'auditor' }), 'authenticated')).toBe(true);
    });

    it('should allow admin routes only for the admin role', () => {
      expect(authorize(admin, 'admin')).toBe(true);
      expect(authorize(user, 'admin')).toBe(false);
    });

    it.each(['auditor', 'superuser', 'Admin', 'ADMIN', ' admin', ''])(
      'should not treat role %j as admin',
      (role) => {
        expect(authorize(createTestIdentity({ role }), 'admin')).toBe(false);
      }
    );
  });

  describe('decide', () => {
    it('should describe the decision', () => {
      expect(decide(user, 'admin')).toEqual({
        subjectClaims: user,
        requiredRole: 'admin',
        allowed: false,
      });
      expect(decide(admin, 'admin').allowed).toBe(true);
    });
  });
});
