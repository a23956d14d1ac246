import { UnknownTokenError } from '@keyrelay/shared';
import type { RelayFastifyInstance } from '../server.js';
import type { RelayServices } from '../services/index.js';
import {
  linkTokenSchema,
  registerTokenSchema,
  sessionParamsSchema,
  tokenParamsSchema,
  unlinkTokenSchema,
} from './schemas.js';

// -----------------------------------------------------------------------------
// Routes
// -----------------------------------------------------------------------------

export function registerTokenRoutes(app: RelayFastifyInstance, { tokens, registry }: RelayServices): void {
  // Register (or refresh) a device token
  app.post('/api/v2/tokens', async (req, reply) => {
    const body = registerTokenSchema.parse(req.body);

    let record = await tokens.register({ token: body.token, platform: body.device, channel: body.channel });
    if (body.user_id) {
      record = await tokens.link(body.token, body.user_id);
    }

    reply.code(201);
    return record;
  });

  app.delete('/api/v2/tokens/:token', async (req) => {
    const { token } = tokenParamsSchema.parse(req.params);

    const removed = await tokens.remove(token);
    if (!removed) {
      throw new UnknownTokenError(token);
    }
    return { removed };
  });

  app.post('/api/v2/sessions/link', async (req) => {
    const body = linkTokenSchema.parse(req.body);
    return tokens.link(body.token, body.session_id);
  });

  app.post('/api/v2/sessions/unlink', async (req) => {
    const body = unlinkTokenSchema.parse(req.body);
    return tokens.unlink(body.token, body.session_id);
  });

  app.get('/api/v2/sessions/:sessionId/tokens', async (req) => {
    const { sessionId } = sessionParamsSchema.parse(req.params);
    return { session_id: sessionId, tokens: await tokens.tokensFor(sessionId) };
  });

  // Poll for requests a session may have missed while offline
  app.get('/api/v2/sessions/:sessionId/key-exchange/pending', async (req) => {
    const { sessionId } = sessionParamsSchema.parse(req.params);
    return { session_id: sessionId, requests: await registry.pendingFor(sessionId) };
  });
}
