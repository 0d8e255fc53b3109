// Main export file - re-exports the public API of every layer

// Protocol core
export * from './core/index.js';

// Identity provider flow
export * from './oauth/index.js';

// Services
export { createAuthService, createAuthApp, type AuthService, type AuthServiceOverrides } from './auth-service/index.js';
export { createResourceService, createResourceApp, withAuth, type ResourceService } from './resource-service/index.js';
export { createGateway, createGatewayApp, type Gateway } from './gateway/index.js';

// Configuration
export { ConfigManager, RelayConfigSchema, type RelayConfig } from './config/index.js';

// Utilities
export * from './utils/errors.js';
