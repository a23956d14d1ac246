import type { RelayFastifyInstance } from '../server.js';
import type { RelayServices } from '../services/index.js';

export const VERSION = '0.1.0';

export function registerHealthRoutes(app: RelayFastifyInstance, services: RelayServices): void {
  // Basic health check
  app.get('/health', async () => {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: VERSION,
    };
  });

  // Detailed status for monitoring
  app.get('/health/details', async () => {
    const wsStats = services.connections.getStats();

    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: VERSION,
      services: {
        websocket: {
          status: 'up',
          connections: wsStats.totalConnections,
          onlineSessions: services.sessions.onlineCount(),
        },
        push: {
          provider: services.pushProvider.name,
          status: services.pushProvider.name === 'disabled' ? 'not_configured' : 'configured',
        },
        tokens: {
          registered: await services.tokens.count(),
        },
        sweeper: services.sweeper.getState(),
      },
    };
  });
}
