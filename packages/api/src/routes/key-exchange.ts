import type { RelayFastifyInstance } from '../server.js';
import type { RelayServices } from '../services/index.js';
import { acceptSchema, initiateSchema, rejectSchema, requestParamsSchema } from './schemas.js';

export function registerKeyExchangeRoutes(app: RelayFastifyInstance, { registry }: RelayServices): void {
  app.post('/api/v2/key-exchange/request', async (req, reply) => {
    const body = initiateSchema.parse(req.body);

    const { requestId, request, delivery } = await registry.initiate(body);

    reply.code(201);
    return { requestId, status: request.status, delivery };
  });

  app.post('/api/v2/key-exchange/accept', async (req) => {
    const body = acceptSchema.parse(req.body);

    const { request, delivery } = await registry.accept(body);
    return { requestId: request.requestId, status: request.status, delivery };
  });

  app.post('/api/v2/key-exchange/reject', async (req) => {
    const body = rejectSchema.parse(req.body);

    const { request, delivery } = await registry.reject(body);
    return { requestId: request.requestId, status: request.status, delivery };
  });

  app.get('/api/v2/key-exchange/:requestId', async (req) => {
    const { requestId } = requestParamsSchema.parse(req.params);
    return registry.get(requestId);
  });
}
