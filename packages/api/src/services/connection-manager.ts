import type { SocketStream } from '@fastify/websocket';
import { ulid } from 'ulid';
import type { ConnectionHandle, RelayEvent, SessionId } from '@keyrelay/shared';
import type { DirectTransport, RelayLogger } from '@keyrelay/core';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface ConnectedClient {
  handle: ConnectionHandle;
  sessionId: SessionId;
  socket: SocketStream;
}

export interface ServerFrame {
  type: string;
  payload: unknown;
}

const OPEN = 1; // WebSocket.OPEN

// -----------------------------------------------------------------------------
// Connection Manager
// -----------------------------------------------------------------------------

/**
 * Owns the live WebSocket connections, keyed by connection handle.
 * Acts as the direct transport for the notification dispatcher.
 */
export class ConnectionManager implements DirectTransport {
  private connections: Map<ConnectionHandle, ConnectedClient> = new Map();

  constructor(private readonly logger?: RelayLogger) {}

  /**
   * Register a new WebSocket connection for a session and return its handle
   */
  addConnection(sessionId: SessionId, socket: SocketStream): ConnectionHandle {
    const handle = ulid();
    this.connections.set(handle, { handle, sessionId, socket });

    this.logger?.info({ sessionId, handle, total: this.connections.size }, 'Connection opened');
    return handle;
  }

  /**
   * Close a connection that a newer one for the same session replaced
   */
  closeSuperseded(handle: ConnectionHandle): void {
    const client = this.connections.get(handle);
    if (!client) return;

    this.connections.delete(handle);
    try {
      client.socket.socket.close(1000, 'New connection established');
    } catch (error) {
      this.logger?.warn({ handle, err: error }, 'Failed to close superseded connection');
    }
  }

  /**
   * Forget a connection. Returns the session it belonged to, if it was known.
   */
  removeConnection(handle: ConnectionHandle): SessionId | undefined {
    const client = this.connections.get(handle);
    if (!client) return undefined;

    this.connections.delete(handle);
    this.logger?.info(
      { sessionId: client.sessionId, handle, total: this.connections.size },
      'Connection closed'
    );
    return client.sessionId;
  }

  /**
   * Push a relay event over a connection.
   * Returns false when the handle is unknown or its socket is no longer open.
   */
  send(handle: ConnectionHandle, event: RelayEvent): boolean {
    return this.sendFrame(handle, { type: event.kind, payload: event });
  }

  sendFrame(handle: ConnectionHandle, frame: ServerFrame): boolean {
    const client = this.connections.get(handle);
    if (!client || client.socket.socket.readyState !== OPEN) {
      return false;
    }

    try {
      client.socket.socket.send(JSON.stringify(frame));
      return true;
    } catch (error) {
      this.logger?.error({ handle, sessionId: client.sessionId, err: error }, 'Failed to send frame');
      this.removeConnection(handle);
      return false;
    }
  }

  getStats(): { totalConnections: number } {
    return { totalConnections: this.connections.size };
  }
}
