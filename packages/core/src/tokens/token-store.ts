import type { DeviceTokenRecord, SessionId } from '@keyrelay/shared';

// -----------------------------------------------------------------------------
// Token Store
// -----------------------------------------------------------------------------

/**
 * Persistence seam for device token records. Implementations return copies;
 * callers never mutate stored records in place.
 */
export interface TokenStore {
  get(token: string): Promise<DeviceTokenRecord | undefined>;
  put(record: DeviceTokenRecord): Promise<void>;
  delete(token: string): Promise<boolean>;
  listBySession(sessionId: SessionId): Promise<DeviceTokenRecord[]>;
  count(): Promise<number>;
}

export class InMemoryTokenStore implements TokenStore {
  private records = new Map<string, DeviceTokenRecord>();
  private sessionTokens = new Map<SessionId, Set<string>>(); // sessionId -> tokens

  async get(token: string): Promise<DeviceTokenRecord | undefined> {
    const record = this.records.get(token);
    return record ? { ...record } : undefined;
  }

  async put(record: DeviceTokenRecord): Promise<void> {
    const previous = this.records.get(record.token);
    if (previous?.sessionId && previous.sessionId !== record.sessionId) {
      this.removeFromIndex(previous.sessionId, record.token);
    }

    this.records.set(record.token, { ...record });

    if (record.sessionId) {
      let tokens = this.sessionTokens.get(record.sessionId);
      if (!tokens) {
        tokens = new Set();
        this.sessionTokens.set(record.sessionId, tokens);
      }
      tokens.add(record.token);
    }
  }

  async delete(token: string): Promise<boolean> {
    const record = this.records.get(token);
    if (!record) return false;

    if (record.sessionId) {
      this.removeFromIndex(record.sessionId, token);
    }
    return this.records.delete(token);
  }

  async listBySession(sessionId: SessionId): Promise<DeviceTokenRecord[]> {
    const tokens = this.sessionTokens.get(sessionId);
    if (!tokens) return [];

    return Array.from(tokens)
      .map((token) => this.records.get(token))
      .filter((record): record is DeviceTokenRecord => record !== undefined)
      .map((record) => ({ ...record }));
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  private removeFromIndex(sessionId: SessionId, token: string): void {
    const tokens = this.sessionTokens.get(sessionId);
    if (!tokens) return;

    tokens.delete(token);
    if (tokens.size === 0) {
      this.sessionTokens.delete(sessionId);
    }
  }
}
