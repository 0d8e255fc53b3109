#!/usr/bin/env node
import 'dotenv/config';
import type { Server } from 'http';
import { ConfigManager } from './config/manager.js';
import type { RelayConfig } from './config/schemas/index.js';
import { createAuthService } from './auth-service/index.js';
import { createResourceService } from './resource-service/index.js';
import { createGateway } from './gateway/index.js';
import { startHTTPServer } from './utils/http-server.js';

const SERVICES = ['auth', 'resource', 'gateway'] as const;
type ServiceName = (typeof SERVICES)[number];

function isServiceName(value: string | undefined): value is ServiceName {
  return SERVICES.some((service) => service === value);
}

async function startService(name: ServiceName, config: RelayConfig): Promise<Server> {
  switch (name) {
    case 'auth': {
      const { app } = createAuthService(config);
      return startHTTPServer(app, config.services.authServicePort, 'AuthService');
    }
    case 'resource': {
      const { app } = createResourceService(config);
      return startHTTPServer(app, config.services.resourceServicePort, 'ResourceService');
    }
    case 'gateway': {
      const { app } = createGateway(config);
      return startHTTPServer(app, config.services.gatewayPort, 'Gateway');
    }
  }
}

/**
 * Usage: start-server <auth|resource|gateway>  (or RELAY_SERVICE=<name>)
 */
async function main(): Promise<void> {
  const name = process.argv[2] ?? process.env.RELAY_SERVICE;
  if (!isServiceName(name)) {
    console.error(`Usage: start-server <${SERVICES.join('|')}>`);
    process.exit(1);
  }

  console.log(`Starting ${name} service...`);
  console.log(`Config: ${process.env.CONFIG_PATH || 'default'}`);

  // Missing secrets or invalid settings end the process here
  const config = await new ConfigManager().loadConfig();
  const server = await startService(name, config);

  const shutdown = (): void => {
    console.log('\n\nShutting down server...');
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
