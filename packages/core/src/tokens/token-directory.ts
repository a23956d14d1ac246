import {
  UnknownTokenError,
  type DeviceTokenRecord,
  type PushRejectionReason,
  type RegisterTokenInput,
  type SessionId,
} from '@keyrelay/shared';
import { KeyedLock } from '../concurrency/keyed-lock.js';
import type { RelayLogger } from '../telemetry/logger.js';
import { InMemoryTokenStore, type TokenStore } from './token-store.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface TokenDirectoryOptions {
  store?: TokenStore;
  logger?: RelayLogger;
  now?: () => number;
}

/** Read side used by the push delivery stage */
export interface TokenLookup {
  tokensFor(sessionId: SessionId): Promise<DeviceTokenRecord[]>;
  prune(token: string, reason: PushRejectionReason): Promise<boolean>;
}

// -----------------------------------------------------------------------------
// Token Directory
// -----------------------------------------------------------------------------

/**
 * Maps sessions to the device tokens that can wake them. A token belongs to
 * at most one session at a time; a session may hold several tokens.
 * Mutations are serialized per token.
 */
export class TokenDirectory implements TokenLookup {
  private readonly store: TokenStore;
  private readonly locks = new KeyedLock();
  private readonly logger?: RelayLogger;
  private readonly now: () => number;

  constructor(options: TokenDirectoryOptions = {}) {
    this.store = options.store ?? new InMemoryTokenStore();
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Upsert a token. Re-registering keeps the existing session link.
   */
  async register(input: RegisterTokenInput): Promise<DeviceTokenRecord> {
    const channel = input.channel ?? 'default';

    return this.locks.run(input.token, async () => {
      const existing = await this.store.get(input.token);

      if (existing && existing.platform === input.platform && existing.channel === channel) {
        return existing;
      }

      const now = this.now();
      const record: DeviceTokenRecord = {
        token: input.token,
        sessionId: existing?.sessionId ?? null,
        platform: input.platform,
        channel,
        registeredAt: existing?.registeredAt ?? now,
        updatedAt: now,
      };

      await this.store.put(record);
      this.logger?.info(
        { platform: record.platform, channel: record.channel, updated: existing !== undefined },
        'Device token registered'
      );
      return record;
    });
  }

  /**
   * Link a registered token to a session, moving it away from any previous
   * session. Other tokens of the target session are left untouched.
   */
  async link(token: string, sessionId: SessionId): Promise<DeviceTokenRecord> {
    return this.locks.run(token, async () => {
      const existing = await this.store.get(token);
      if (!existing) {
        throw new UnknownTokenError(token);
      }

      if (existing.sessionId === sessionId) {
        return existing;
      }

      const record: DeviceTokenRecord = { ...existing, sessionId, updatedAt: this.now() };
      await this.store.put(record);

      this.logger?.info(
        { sessionId, previousSessionId: existing.sessionId },
        existing.sessionId ? 'Device token moved to session' : 'Device token linked to session'
      );
      return record;
    });
  }

  /**
   * Clear a token's session link. When sessionId is given the link is only
   * cleared if it still points at that session.
   */
  async unlink(token: string, sessionId?: SessionId): Promise<DeviceTokenRecord> {
    return this.locks.run(token, async () => {
      const existing = await this.store.get(token);
      if (!existing) {
        throw new UnknownTokenError(token);
      }

      if (existing.sessionId === null) {
        return existing;
      }
      if (sessionId !== undefined && existing.sessionId !== sessionId) {
        return existing;
      }

      const record: DeviceTokenRecord = { ...existing, sessionId: null, updatedAt: this.now() };
      await this.store.put(record);
      this.logger?.info({ sessionId: existing.sessionId }, 'Device token unlinked');
      return record;
    });
  }

  async remove(token: string): Promise<boolean> {
    return this.locks.run(token, () => this.store.delete(token));
  }

  async get(token: string): Promise<DeviceTokenRecord | undefined> {
    return this.store.get(token);
  }

  /**
   * Tokens currently linked to a session. Empty means not reachable by push.
   */
  async tokensFor(sessionId: SessionId): Promise<DeviceTokenRecord[]> {
    return this.store.listBySession(sessionId);
  }

  /**
   * Drop a token the push provider reported as no longer valid.
   */
  async prune(token: string, reason: PushRejectionReason): Promise<boolean> {
    const removed = await this.remove(token);
    if (removed) {
      this.logger?.warn({ reason }, 'Pruned device token rejected by push provider');
    }
    return removed;
  }

  async count(): Promise<number> {
    return this.store.count();
  }
}
