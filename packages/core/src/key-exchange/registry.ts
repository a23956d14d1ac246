import { ulid } from 'ulid';
import {
  DuplicatePendingError,
  InvalidParticipantsError,
  InvalidStateError,
  NotFoundError,
  NotRecipientError,
  RequestIdConflictError,
  type AcceptKeyExchangeInput,
  type DeliveryOutcome,
  type InitiateKeyExchangeInput,
  type KeyExchangeRequest,
  type RejectKeyExchangeInput,
  type RelayEvent,
  type SessionId,
  type TerminalKeyExchangeStatus,
} from '@keyrelay/shared';
import { KeyedLock } from '../concurrency/keyed-lock.js';
import type { EventDeliverer } from '../delivery/notification-dispatcher.js';
import type { RelayLogger } from '../telemetry/logger.js';
import { InMemoryKeyExchangeStore, pairKey, type KeyExchangeStore } from './request-store.js';

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export interface KeyExchangeRegistryConfig {
  /** Pending requests older than this are expired by the sweep */
  ttlMs: number;
  /** Terminal requests are purged this long after they were resolved */
  retentionMs: number;
}

const DEFAULT_CONFIG: KeyExchangeRegistryConfig = {
  ttlMs: 5 * 60 * 1000,
  retentionMs: 24 * 60 * 60 * 1000,
};

export interface KeyExchangeRegistryOptions {
  deliverer: EventDeliverer;
  store?: KeyExchangeStore;
  config?: Partial<KeyExchangeRegistryConfig>;
  logger?: RelayLogger;
  now?: () => number;
  generateId?: () => string;
}

export interface KeyExchangeResult {
  request: KeyExchangeRequest;
  delivery: DeliveryOutcome;
}

export interface InitiateResult extends KeyExchangeResult {
  requestId: string;
}

export interface ExpiryReport {
  expired: string[];
  purged: number;
}

// -----------------------------------------------------------------------------
// Key Exchange Registry
// -----------------------------------------------------------------------------

/**
 * Owns the request/accept/reject lifecycle of key-exchange handshakes.
 *
 * Every mutation of a request runs under a lock keyed by its participant
 * pair, so the duplicate check in initiate and the pending check in
 * accept/reject are each one indivisible read-check-write. Delivery to the
 * other party happens after the lock is released and never affects the
 * stored state.
 */
export class KeyExchangeRegistry {
  private readonly store: KeyExchangeStore;
  private readonly deliverer: EventDeliverer;
  private readonly config: KeyExchangeRegistryConfig;
  private readonly pairLocks = new KeyedLock();
  private readonly idLocks = new KeyedLock();
  private readonly logger?: RelayLogger;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: KeyExchangeRegistryOptions) {
    this.deliverer = options.deliverer;
    this.store = options.store ?? new InMemoryKeyExchangeStore();
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? (() => ulid());
  }

  /**
   * Record a new pending handshake and deliver it to the recipient.
   */
  async initiate(input: InitiateKeyExchangeInput): Promise<InitiateResult> {
    const { senderId, recipientId } = input;

    if (senderId === recipientId) {
      throw new InvalidParticipantsError(senderId);
    }

    const request = await this.pairLocks.run(pairKey(senderId, recipientId), async () => {
      const existing = await this.store.findPendingForPair(senderId, recipientId);
      if (existing) {
        throw new DuplicatePendingError(existing.requestId);
      }

      const requestId = input.requestId ?? this.generateId();

      return this.idLocks.run(requestId, async () => {
        if (await this.store.get(requestId)) {
          throw new RequestIdConflictError(requestId);
        }

        const created: KeyExchangeRequest = {
          requestId,
          senderId,
          recipientId,
          publicKey: input.publicKey,
          encryptedUserData: input.encryptedUserData,
          status: 'pending',
          createdAt: this.now(),
          respondedAt: null,
        };

        await this.store.put(created);
        return created;
      });
    });

    this.logger?.info({ requestId: request.requestId, senderId, recipientId }, 'Key exchange initiated');

    const delivery = await this.dispatch(recipientId, requestEvent(request, this.now()));
    return { requestId: request.requestId, request, delivery };
  }

  /**
   * Accept a pending handshake as its recipient, storing the recipient's
   * reciprocal payload and delivering it to the sender.
   */
  async accept(input: AcceptKeyExchangeInput): Promise<KeyExchangeResult> {
    const request = await this.transition(input.requestId, input.recipientId, 'accepted', (current) => ({
      ...current,
      encryptedUserData: input.encryptedUserData,
    }));

    const event: RelayEvent = {
      kind: 'key_exchange_accepted',
      requestId: request.requestId,
      senderId: request.recipientId,
      recipientId: request.senderId,
      payload: { encryptedUserData: request.encryptedUserData },
      sentAt: this.now(),
    };

    const delivery = await this.dispatch(request.senderId, event);
    return { request, delivery };
  }

  /**
   * Reject a pending handshake as its recipient and inform the sender.
   */
  async reject(input: RejectKeyExchangeInput): Promise<KeyExchangeResult> {
    const request = await this.transition(input.requestId, input.recipientId, 'rejected', (current) => current);

    const event: RelayEvent = {
      kind: 'key_exchange_rejected',
      requestId: request.requestId,
      senderId: request.recipientId,
      recipientId: request.senderId,
      payload: {},
      sentAt: this.now(),
    };

    const delivery = await this.dispatch(request.senderId, event);
    return { request, delivery };
  }

  /**
   * Expire pending requests older than the TTL (silently; nobody is
   * notified) and purge terminal requests past the retention window.
   * A request aged exactly the TTL is still pending.
   * Safe to call repeatedly.
   */
  async expire(now: number = this.now()): Promise<ExpiryReport> {
    const expired: string[] = [];

    for (const candidate of await this.store.listPending()) {
      if (now - candidate.createdAt <= this.config.ttlMs) continue;

      const key = pairKey(candidate.senderId, candidate.recipientId);
      await this.pairLocks.run(key, async () => {
        const current = await this.store.get(candidate.requestId);
        if (current?.status !== 'pending') return;

        await this.store.put({ ...current, status: 'expired', respondedAt: now });
        expired.push(current.requestId);
      });
    }

    let purged = 0;
    for (const stale of await this.store.listTerminal(now - this.config.retentionMs)) {
      if (await this.store.delete(stale.requestId)) {
        purged++;
      }
    }

    if (expired.length > 0 || purged > 0) {
      this.logger?.info({ expired: expired.length, purged }, 'Key exchange sweep finished');
    }

    return { expired, purged };
  }

  async get(requestId: string): Promise<KeyExchangeRequest> {
    const request = await this.store.get(requestId);
    if (!request) {
      throw new NotFoundError(requestId);
    }
    return request;
  }

  async pendingFor(sessionId: SessionId): Promise<KeyExchangeRequest[]> {
    const requests = await this.store.listPendingFor(sessionId);
    return requests.sort((a, b) => a.createdAt - b.createdAt);
  }

  /**
   * Re-deliver every pending request addressed to a session, e.g. when it
   * reconnects after a push-only delivery. Returns how many were sent.
   */
  async replayPending(sessionId: SessionId): Promise<number> {
    const pending = await this.pendingFor(sessionId);

    for (const request of pending) {
      await this.dispatch(sessionId, requestEvent(request, this.now()));
    }

    if (pending.length > 0) {
      this.logger?.info({ sessionId, count: pending.length }, 'Replayed pending key exchange requests');
    }
    return pending.length;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async transition(
    requestId: string,
    recipientId: SessionId,
    status: TerminalKeyExchangeStatus,
    apply: (current: KeyExchangeRequest) => KeyExchangeRequest
  ): Promise<KeyExchangeRequest> {
    const located = await this.store.get(requestId);
    if (!located) {
      throw new NotFoundError(requestId);
    }

    const updated = await this.pairLocks.run(pairKey(located.senderId, located.recipientId), async () => {
      const current = await this.store.get(requestId);
      if (!current) {
        throw new NotFoundError(requestId);
      }
      if (current.recipientId !== recipientId) {
        throw new NotRecipientError(requestId);
      }
      if (current.status !== 'pending') {
        throw new InvalidStateError(requestId, current.status);
      }

      const next: KeyExchangeRequest = { ...apply(current), status, respondedAt: this.now() };
      await this.store.put(next);
      return next;
    });

    this.logger?.info(
      { requestId, senderId: updated.senderId, recipientId: updated.recipientId, status },
      'Key exchange resolved'
    );
    return updated;
  }

  private async dispatch(sessionId: SessionId, event: RelayEvent): Promise<DeliveryOutcome> {
    try {
      return await this.deliverer.deliver(sessionId, event);
    } catch (error) {
      this.logger?.error({ err: error, sessionId, requestId: event.requestId }, 'Event delivery failed');
      return { sessionId, kind: event.kind, status: 'failed', via: 'none', attempts: [] };
    }
  }
}

function requestEvent(request: KeyExchangeRequest, sentAt: number): RelayEvent {
  return {
    kind: 'key_exchange_request',
    requestId: request.requestId,
    senderId: request.senderId,
    recipientId: request.recipientId,
    payload: {
      publicKey: request.publicKey,
      encryptedUserData: request.encryptedUserData,
    },
    sentAt,
  };
}
