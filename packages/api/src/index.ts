// Application
export { createApplication, type Application, type CreateApplicationOptions } from './application.js';
export {
  loadConfig,
  type AppConfig,
  type APNsConfig,
  type PushConfig,
  type RelayConfig,
} from './config.js';

// Server
export { createServer, type CreateServerOptions, type RelayFastifyInstance } from './server.js';

// Services
export { createServices, type CreateServicesOptions, type RelayServices } from './services/index.js';
export { ConnectionManager, type ConnectedClient, type ServerFrame } from './services/connection-manager.js';
export {
  ApnsPushProvider,
  RelayPushProvider,
  createPushProvider,
  type ApnsPushProviderOptions,
  type RelayPushProviderOptions,
} from './services/push/index.js';
