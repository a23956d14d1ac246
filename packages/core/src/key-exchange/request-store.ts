import type { KeyExchangeRequest, SessionId } from '@keyrelay/shared';

// -----------------------------------------------------------------------------
// Key Exchange Store
// -----------------------------------------------------------------------------

export interface KeyExchangeStore {
  get(requestId: string): Promise<KeyExchangeRequest | undefined>;
  /** Insert or replace */
  put(request: KeyExchangeRequest): Promise<void>;
  delete(requestId: string): Promise<boolean>;
  /** The pending request between two sessions, in either direction */
  findPendingForPair(a: SessionId, b: SessionId): Promise<KeyExchangeRequest | undefined>;
  listPending(): Promise<KeyExchangeRequest[]>;
  listPendingFor(recipientId: SessionId): Promise<KeyExchangeRequest[]>;
  /** Terminal requests that were resolved at or before the cutoff */
  listTerminal(respondedAtOrBefore: number): Promise<KeyExchangeRequest[]>;
}

/** Order-independent key for a pair of sessions */
export function pairKey(a: SessionId, b: SessionId): string {
  return JSON.stringify(a < b ? [a, b] : [b, a]);
}

export class InMemoryKeyExchangeStore implements KeyExchangeStore {
  private requests = new Map<string, KeyExchangeRequest>();
  private pendingByPair = new Map<string, string>(); // pairKey -> requestId

  async get(requestId: string): Promise<KeyExchangeRequest | undefined> {
    const request = this.requests.get(requestId);
    return request ? { ...request } : undefined;
  }

  async put(request: KeyExchangeRequest): Promise<void> {
    this.requests.set(request.requestId, { ...request });

    const key = pairKey(request.senderId, request.recipientId);
    if (request.status === 'pending') {
      this.pendingByPair.set(key, request.requestId);
    } else if (this.pendingByPair.get(key) === request.requestId) {
      this.pendingByPair.delete(key);
    }
  }

  async delete(requestId: string): Promise<boolean> {
    const request = this.requests.get(requestId);
    if (!request) return false;

    const key = pairKey(request.senderId, request.recipientId);
    if (this.pendingByPair.get(key) === requestId) {
      this.pendingByPair.delete(key);
    }
    return this.requests.delete(requestId);
  }

  async findPendingForPair(a: SessionId, b: SessionId): Promise<KeyExchangeRequest | undefined> {
    const requestId = this.pendingByPair.get(pairKey(a, b));
    return requestId ? this.get(requestId) : undefined;
  }

  async listPending(): Promise<KeyExchangeRequest[]> {
    return this.filter((request) => request.status === 'pending');
  }

  async listPendingFor(recipientId: SessionId): Promise<KeyExchangeRequest[]> {
    return this.filter(
      (request) => request.status === 'pending' && request.recipientId === recipientId
    );
  }

  async listTerminal(respondedAtOrBefore: number): Promise<KeyExchangeRequest[]> {
    return this.filter(
      (request) =>
        request.status !== 'pending' &&
        request.respondedAt !== null &&
        request.respondedAt <= respondedAtOrBefore
    );
  }

  private filter(predicate: (request: KeyExchangeRequest) => boolean): KeyExchangeRequest[] {
    return Array.from(this.requests.values())
      .filter(predicate)
      .map((request) => ({ ...request }));
  }
}
