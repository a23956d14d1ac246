import type { ConnectionHandle, RelayEvent } from '@keyrelay/shared';

/**
 * Direct-send primitive supplied by whatever owns the live connections.
 * Resolves false when the handle is stale or the write failed.
 */
export interface DirectTransport {
  send(handle: ConnectionHandle, event: RelayEvent): Promise<boolean> | boolean;
}
