import type {
  DeliveryOutcome,
  DeliveryStatus,
  DeviceTokenRecord,
  PushResult,
  RelayEvent,
  SessionId,
  TokenAttempt,
} from '@keyrelay/shared';
import type { SessionDirectory } from '../presence/session-directory.js';
import type { TokenLookup } from '../tokens/token-directory.js';
import type { RelayLogger } from '../telemetry/logger.js';
import type { PushProvider } from './push-provider.js';
import type { DirectTransport } from './transport.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

/**
 * One way of reaching a session. Returns an outcome when the stage is
 * conclusive, or null to let the next stage try.
 */
export interface DeliveryStage {
  readonly name: string;
  attempt(sessionId: SessionId, event: RelayEvent): Promise<DeliveryOutcome | null>;
}

export interface PushStageConfig {
  timeoutMs: number;
  pruneInvalidTokens: boolean;
  batchSize: number;
}

const DEFAULT_PUSH_CONFIG: PushStageConfig = {
  timeoutMs: 5000,
  pruneInvalidTokens: true,
  batchSize: 10,
};

// -----------------------------------------------------------------------------
// Direct Stage
// -----------------------------------------------------------------------------

/**
 * Sends over the session's live connection. A failed send means the handle
 * went stale: the session is marked offline for that handle and the next
 * stage takes over.
 */
export class DirectDeliveryStage implements DeliveryStage {
  readonly name = 'direct';

  constructor(
    private sessions: SessionDirectory,
    private transport: DirectTransport,
    private logger?: RelayLogger
  ) {}

  async attempt(sessionId: SessionId, event: RelayEvent): Promise<DeliveryOutcome | null> {
    const handle = this.sessions.handleFor(sessionId);
    if (!handle) {
      return null;
    }

    let sent = false;
    try {
      sent = await this.transport.send(handle, event);
    } catch (error) {
      this.logger?.warn({ sessionId, err: error }, 'Direct send threw, falling back to push');
    }

    if (!sent) {
      this.sessions.markOffline(sessionId, handle);
      this.logger?.info({ sessionId, kind: event.kind }, 'Stale connection, falling back to push');
      return null;
    }

    return { sessionId, kind: event.kind, status: 'delivered', via: 'direct', attempts: [] };
  }
}

// -----------------------------------------------------------------------------
// Push Stage
// -----------------------------------------------------------------------------

/**
 * Hands the event to the push provider once per linked token and aggregates
 * the per-token results. Provider errors and timeouts are reported as token
 * rejections, never thrown.
 */
export class PushDeliveryStage implements DeliveryStage {
  readonly name = 'push';
  private config: PushStageConfig;

  constructor(
    private tokens: TokenLookup,
    private provider: PushProvider,
    config: Partial<PushStageConfig> = {},
    private logger?: RelayLogger
  ) {
    this.config = { ...DEFAULT_PUSH_CONFIG, ...config };
  }

  async attempt(sessionId: SessionId, event: RelayEvent): Promise<DeliveryOutcome> {
    const records = await this.tokens.tokensFor(sessionId);

    if (records.length === 0) {
      return { sessionId, kind: event.kind, status: 'undeliverable', via: 'none', attempts: [] };
    }

    const attempts: TokenAttempt[] = [];

    // Send in batches to bound concurrent provider requests
    for (let i = 0; i < records.length; i += this.config.batchSize) {
      const batch = records.slice(i, i + this.config.batchSize);
      const results = await Promise.all(batch.map((record) => this.sendOne(record, event)));
      attempts.push(...results);
    }

    await this.pruneRejected(attempts);

    const status = aggregate(attempts);
    this.logger?.info(
      { sessionId, kind: event.kind, status, tokens: attempts.length, provider: this.provider.name },
      'Push delivery finished'
    );

    return { sessionId, kind: event.kind, status, via: 'push', attempts };
  }

  private async sendOne(record: DeviceTokenRecord, event: RelayEvent): Promise<TokenAttempt> {
    const result = await withTimeout(
      this.provider.send({
        token: record.token,
        platform: record.platform,
        channel: record.channel,
        event,
      }),
      this.config.timeoutMs
    ).catch((error: unknown): PushResult => ({
      accepted: false,
      reason: 'provider_error',
      detail: error instanceof Error ? error.message : String(error),
    }));

    return { token: record.token, platform: record.platform, result };
  }

  private async pruneRejected(attempts: TokenAttempt[]): Promise<void> {
    if (!this.config.pruneInvalidTokens) return;

    for (const { token, result } of attempts) {
      if (result.accepted) continue;
      if (result.reason !== 'invalid_token' && result.reason !== 'expired_token') continue;

      try {
        await this.tokens.prune(token, result.reason);
      } catch (error) {
        this.logger?.error({ err: error }, 'Failed to prune rejected device token');
      }
    }
  }
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

export function aggregate(attempts: TokenAttempt[]): DeliveryStatus {
  const accepted = attempts.filter((attempt) => attempt.result.accepted).length;

  if (attempts.length === 0) return 'undeliverable';
  if (accepted === attempts.length) return 'delivered';
  if (accepted === 0) return 'failed';
  return 'partial_failure';
}

function withTimeout(promise: Promise<PushResult>, timeoutMs: number): Promise<PushResult> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<PushResult>((resolve) => {
    timer = setTimeout(() => {
      resolve({ accepted: false, reason: 'timeout', detail: `No response after ${timeoutMs}ms` });
    }, timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => {
    clearTimeout(timer);
  });
}
