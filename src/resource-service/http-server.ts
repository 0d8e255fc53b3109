/**
 * Resource Service HTTP Surface
 *
 * Every route except /health is wrapped in withAuth; handlers only run with a
 * VerifiedRequestContext. Successful responses share one envelope:
 * `{ status: 'success', message, data, timestamp }`.
 */

import express, { type Request, type Response } from 'express';
import type { AuditService } from '../core/audit-service.js';
import { systemClock, type Clock } from '../core/clock.js';
import type { TokenCodec } from '../core/token-codec.js';
import type { RequiredRole } from '../core/types.js';
import { corsHeaders, jsonErrorHandler } from '../utils/http-server.js';
import {
  accessibleResources,
  adminResources,
  managedUsers,
  systemStats,
  userProfile,
  userResources,
} from './catalog.js';
import { withAuth, type GuardedHandler } from './guards.js';

export interface ApiEnvelope<T> {
  status: 'success';
  message: string;
  data: T;
  timestamp: string;
}

export interface ResourceAppOptions {
  tokenCodec: TokenCodec;
  clock?: Clock;
  auditService?: AuditService;
}

export function createResourceApp(options: ResourceAppOptions): express.Application {
  const clock = options.clock ?? systemClock;
  const app = express();

  const envelope = <T>(data: T, message: string): ApiEnvelope<T> => ({
    status: 'success',
    message,
    data,
    timestamp: new Date(clock.now()).toISOString(),
  });

  const guard = (requiredRole: RequiredRole, handler: GuardedHandler) =>
    withAuth(options.tokenCodec, requiredRole, handler, { auditService: options.auditService });

  app.use(corsHeaders({ origin: '*' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', service: 'resource-service' });
  });

  app.get(
    '/resources/user',
    guard('authenticated', (_req, res, ctx) => {
      const resources = userResources(ctx.claims);
      res.json(envelope(resources, `Retrieved ${resources.length} user resources`));
    })
  );

  app.get(
    '/resources/admin',
    guard('admin', (_req, res, ctx) => {
      const resources = adminResources(ctx.claims);
      res.json(envelope(resources, `Retrieved ${resources.length} admin resources`));
    })
  );

  app.get(
    '/resources/all',
    guard('authenticated', (_req, res, ctx) => {
      const resources = accessibleResources(ctx.claims);
      res.json(envelope(resources, `Retrieved ${resources.length} accessible resources`));
    })
  );

  app.get(
    '/user/profile',
    guard('authenticated', (_req, res, ctx) => {
      res.json(envelope(userProfile(ctx.claims, new Date(clock.now())), 'Profile retrieved successfully'));
    })
  );

  app.get(
    '/admin/stats',
    guard('admin', (_req, res) => {
      res.json(envelope(systemStats(new Date(clock.now())), 'System statistics retrieved'));
    })
  );

  app.get(
    '/admin/users',
    guard('admin', (_req, res) => {
      res.json(envelope(managedUsers(), 'User list retrieved successfully'));
    })
  );

  app.use(jsonErrorHandler('ResourceService'));

  return app;
}
