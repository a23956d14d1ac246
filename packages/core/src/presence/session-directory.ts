import { EventEmitter } from 'events';
import type { ConnectionHandle, SessionId, SessionPresence } from '@keyrelay/shared';
import type { RelayLogger } from '../telemetry/logger.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface SessionDirectoryOptions {
  logger?: RelayLogger;
  now?: () => number;
}

export type OnlineListener = (sessionId: SessionId, handle: ConnectionHandle) => void;

// -----------------------------------------------------------------------------
// Session Directory
// -----------------------------------------------------------------------------

/**
 * Tracks which sessions hold a live connection and through which handle.
 * The transport layer calls markOnline/markOffline on connect/disconnect;
 * the dispatcher reads it to choose between direct and push delivery.
 */
export class SessionDirectory {
  private presence = new Map<SessionId, SessionPresence>();
  private events = new EventEmitter();
  private readonly logger?: RelayLogger;
  private readonly now: () => number;

  constructor(options: SessionDirectoryOptions = {}) {
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record a live connection for a session.
   * Returns the superseded handle, if the session was already online.
   */
  markOnline(sessionId: SessionId, connectionHandle: ConnectionHandle): ConnectionHandle | null {
    const previous = this.presence.get(sessionId);

    this.presence.set(sessionId, {
      sessionId,
      connectionHandle,
      lastSeenAt: this.now(),
    });

    const superseded =
      previous && previous.connectionHandle !== connectionHandle ? previous.connectionHandle : null;

    this.logger?.debug({ sessionId, connectionHandle, superseded }, 'Session online');
    this.events.emit('online', sessionId, connectionHandle);

    return superseded;
  }

  /**
   * Clear the live connection for a session. With a handle, only clears when
   * that handle is still current, so a superseded socket closing late does not
   * take the newer connection offline.
   */
  markOffline(sessionId: SessionId, connectionHandle?: ConnectionHandle): boolean {
    const current = this.presence.get(sessionId);
    if (!current) return false;

    if (connectionHandle !== undefined && current.connectionHandle !== connectionHandle) {
      return false;
    }

    this.presence.delete(sessionId);
    this.logger?.debug({ sessionId, connectionHandle: current.connectionHandle }, 'Session offline');
    return true;
  }

  isOnline(sessionId: SessionId): boolean {
    return this.presence.has(sessionId);
  }

  handleFor(sessionId: SessionId): ConnectionHandle | undefined {
    return this.presence.get(sessionId)?.connectionHandle;
  }

  presenceFor(sessionId: SessionId): SessionPresence | undefined {
    const entry = this.presence.get(sessionId);
    return entry ? { ...entry } : undefined;
  }

  /**
   * Refresh lastSeenAt (heartbeat)
   */
  touch(sessionId: SessionId): void {
    const entry = this.presence.get(sessionId);
    if (entry) {
      entry.lastSeenAt = this.now();
    }
  }

  onlineCount(): number {
    return this.presence.size;
  }

  /**
   * Subscribe to sessions coming online. Returns an unsubscribe function.
   */
  onOnline(listener: OnlineListener): () => void {
    this.events.on('online', listener);
    return () => {
      this.events.off('online', listener);
    };
  }
}
