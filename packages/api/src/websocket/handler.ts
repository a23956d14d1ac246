import type { SocketStream } from '@fastify/websocket';
import type { RawData } from 'ws';
import { ZodError } from 'zod';
import { RelayError, type ConnectionHandle, type SessionId } from '@keyrelay/shared';
import type { KeyExchangeResult } from '@keyrelay/core';
import type { RelayFastifyInstance } from '../server.js';
import type { RelayServices } from '../services/index.js';
import {
  socketAcceptSchema,
  socketFrameSchema,
  socketInitiateSchema,
  socketQuerySchema,
  socketRejectSchema,
} from '../routes/schemas.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

interface SocketContext {
  sessionId: SessionId;
  handle: ConnectionHandle;
  services: RelayServices;
}

type KeyExchangeOp = 'key_exchange:request' | 'key_exchange:accept' | 'key_exchange:reject';

// -----------------------------------------------------------------------------
// WebSocket Handler
// -----------------------------------------------------------------------------

export function registerWebSocketHandler(app: RelayFastifyInstance, services: RelayServices): void {
  const { connections, sessions } = services;

  app.get('/ws', { websocket: true }, (connection: SocketStream, req) => {
    const query = socketQuerySchema.safeParse(req.query);
    if (!query.success) {
      connection.socket.close(4001, 'Missing session_id');
      return;
    }

    const sessionId = query.data.session_id;
    const handle = connections.addConnection(sessionId, connection);
    const superseded = sessions.markOnline(sessionId, handle);
    if (superseded) {
      connections.closeSuperseded(superseded);
    }

    const ctx: SocketContext = { sessionId, handle, services };

    connection.socket.on('message', (data: RawData) => {
      handleMessage(ctx, data).catch((error: unknown) => {
        req.log.error({ err: error, sessionId, handle }, 'Unhandled WebSocket message failure');
      });
    });

    connection.socket.on('close', () => {
      connections.removeConnection(handle);
      sessions.markOffline(sessionId, handle);
    });

    connection.socket.on('error', (error: Error) => {
      req.log.warn({ err: error, sessionId, handle }, 'WebSocket error');
      connections.removeConnection(handle);
      sessions.markOffline(sessionId, handle);
    });

    connections.sendFrame(handle, {
      type: 'connected',
      payload: {
        sessionId,
        timestamp: new Date().toISOString(),
      },
    });
  });
}

// -----------------------------------------------------------------------------
// Message Handlers
// -----------------------------------------------------------------------------

async function handleMessage(ctx: SocketContext, data: RawData): Promise<void> {
  const { connections, sessions } = ctx.services;

  let parsed: unknown;
  try {
    parsed = JSON.parse(data.toString());
  } catch {
    sendError(ctx, 'INVALID_MESSAGE', 'Invalid message format');
    return;
  }

  const frame = socketFrameSchema.safeParse(parsed);
  if (!frame.success) {
    sendError(ctx, 'INVALID_MESSAGE', 'Invalid message format');
    return;
  }

  const { type, payload } = frame.data;

  switch (type) {
    case 'ping':
      sessions.touch(ctx.sessionId);
      connections.sendFrame(ctx.handle, { type: 'pong', payload: { timestamp: Date.now() } });
      return;

    case 'key_exchange:request':
    case 'key_exchange:accept':
    case 'key_exchange:reject':
      await handleKeyExchange(ctx, type, payload);
      return;

    default:
      sendError(ctx, 'UNKNOWN_TYPE', `Unknown message type: ${type}`);
  }
}

async function handleKeyExchange(ctx: SocketContext, op: KeyExchangeOp, payload: unknown): Promise<void> {
  const { registry } = ctx.services;

  try {
    let result: KeyExchangeResult;

    switch (op) {
      case 'key_exchange:request': {
        const input = socketInitiateSchema.parse(payload);
        result = await registry.initiate({ ...input, senderId: ctx.sessionId });
        break;
      }
      case 'key_exchange:accept': {
        const input = socketAcceptSchema.parse(payload);
        result = await registry.accept({ ...input, recipientId: ctx.sessionId });
        break;
      }
      case 'key_exchange:reject': {
        const input = socketRejectSchema.parse(payload);
        result = await registry.reject({ ...input, recipientId: ctx.sessionId });
        break;
      }
    }

    ctx.services.connections.sendFrame(ctx.handle, {
      type: 'ack',
      payload: {
        op,
        requestId: result.request.requestId,
        status: result.request.status,
        delivery: result.delivery,
      },
    });
  } catch (error) {
    if (error instanceof ZodError) {
      sendError(ctx, 'VALIDATION_ERROR', error.issues[0]?.message ?? 'Invalid payload', op);
      return;
    }
    if (error instanceof RelayError) {
      sendError(ctx, error.code, error.message, op);
      return;
    }
    throw error;
  }
}

function sendError(ctx: SocketContext, code: string, message: string, op?: KeyExchangeOp): void {
  ctx.services.connections.sendFrame(ctx.handle, {
    type: 'error',
    payload: op ? { op, code, message } : { code, message },
  });
}
