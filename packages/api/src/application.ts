import { createLogger, type RelayLogger } from '@keyrelay/core';
import { loadConfig, type AppConfig } from './config.js';
import { createServer, type RelayFastifyInstance } from './server.js';
import { createServices, type CreateServicesOptions, type RelayServices } from './services/index.js';

export interface Application {
  config: AppConfig;
  logger: RelayLogger;
  services: RelayServices;
  server: RelayFastifyInstance;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface CreateApplicationOptions extends CreateServicesOptions {
  config?: AppConfig;
  logger?: RelayLogger;
}

/**
 * Compose the relay: config, logger, services and the Fastify server.
 * start() also starts the expiry sweeper; stop() drains it before closing.
 */
export async function createApplication(options: CreateApplicationOptions = {}): Promise<Application> {
  const config = options.config ?? loadConfig();
  const logger =
    options.logger ??
    createLogger({
      level: config.logLevel,
      pretty: config.logPretty,
    });

  const services = createServices(config, logger, options);
  const server = await createServer({ config, logger, services });

  return {
    config,
    logger,
    services,
    server,
    start: async () => {
      await server.listen({ port: config.port, host: config.host });
      services.sweeper.start();
    },
    stop: async () => {
      await services.sweeper.stop();
      await server.close();
    },
  };
}
