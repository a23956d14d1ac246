import {
  fastify,
  type FastifyError,
  type FastifyInstance,
  type FastifyTypeProviderDefault,
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
} from 'fastify';
import websocket from '@fastify/websocket';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { RelayError } from '@keyrelay/shared';
import type { RelayLogger } from '@keyrelay/core';
import type { AppConfig } from './config.js';
import type { RelayServices } from './services/index.js';
import { registerWebSocketHandler } from './websocket/handler.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerTokenRoutes } from './routes/tokens.js';
import { registerKeyExchangeRoutes } from './routes/key-exchange.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type RelayFastifyInstance = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression<RawServerDefault>,
  RawReplyDefaultExpression<RawServerDefault>,
  RelayLogger,
  FastifyTypeProviderDefault
>;

export interface CreateServerOptions {
  config: AppConfig;
  logger: RelayLogger;
  services: RelayServices;
}

// -----------------------------------------------------------------------------
// Server Factory
// -----------------------------------------------------------------------------

export async function createServer({ config, logger, services }: CreateServerOptions): Promise<RelayFastifyInstance> {
  const app = fastify({ logger });

  await app.register(cors, {
    origin: config.corsOrigin ? config.corsOrigin.split(',').map((origin) => origin.trim()) : true,
    credentials: true,
  });

  await app.register(websocket);

  app.setErrorHandler((error: FastifyError | ZodError | RelayError, req, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({
        error: 'Invalid request',
        code: 'VALIDATION_ERROR',
        details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }

    if (error instanceof RelayError) {
      req.log.info({ code: error.code, details: error.details }, error.message);
      return reply.code(error.statusCode).send({
        error: error.message,
        code: error.code,
        ...(error.details ? { details: error.details } : {}),
      });
    }

    // Fastify's own client errors (malformed JSON, oversized body)
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.message, code: error.code });
    }

    req.log.error({ err: error }, 'Unhandled request error');
    return reply.code(500).send({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });

  registerWebSocketHandler(app, services);
  registerHealthRoutes(app, services);
  registerTokenRoutes(app, services);
  registerKeyExchangeRoutes(app, services);
  app.log.debug('Routes registered');

  return app;
}
