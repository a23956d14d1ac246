import {
  ExpirySweeper,
  KeyExchangeRegistry,
  SessionDirectory,
  TokenDirectory,
  createNotificationDispatcher,
  type PushProvider,
  type RelayLogger,
} from '@keyrelay/core';
import type { AppConfig } from '../config.js';
import { ConnectionManager } from './connection-manager.js';
import { createPushProvider } from './push/index.js';

// -----------------------------------------------------------------------------
// Service Container
// -----------------------------------------------------------------------------

export interface RelayServices {
  sessions: SessionDirectory;
  tokens: TokenDirectory;
  connections: ConnectionManager;
  registry: KeyExchangeRegistry;
  sweeper: ExpirySweeper;
  pushProvider: PushProvider;
}

export interface CreateServicesOptions {
  /** Replaces the provider selected by config */
  pushProvider?: PushProvider;
  now?: () => number;
}

/**
 * Wire the relay's components together from config.
 */
export function createServices(
  config: AppConfig,
  logger: RelayLogger,
  options: CreateServicesOptions = {}
): RelayServices {
  const now = options.now ?? Date.now;
  const sessions = new SessionDirectory({ logger: logger.child({ component: 'sessions' }), now });
  const tokens = new TokenDirectory({ logger: logger.child({ component: 'tokens' }), now });
  const connections = new ConnectionManager(logger.child({ component: 'connections' }));
  const pushProvider = options.pushProvider ?? createPushProvider(config.push, logger.child({ component: 'push' }));

  const dispatcher = createNotificationDispatcher({
    sessions,
    tokens,
    transport: connections,
    provider: pushProvider,
    push: { timeoutMs: config.push.timeoutMs, pruneInvalidTokens: config.push.pruneInvalidTokens },
    logger: logger.child({ component: 'dispatcher' }),
  });

  const registry = new KeyExchangeRegistry({
    deliverer: dispatcher,
    config: { ttlMs: config.keyExchange.ttlMs, retentionMs: config.keyExchange.retentionMs },
    logger: logger.child({ component: 'key-exchange' }),
    now,
  });

  const sweeper = new ExpirySweeper(registry, {
    intervalMs: config.keyExchange.sweepIntervalMs,
    logger: logger.child({ component: 'sweeper' }),
    now,
  });

  if (config.keyExchange.replayOnConnect) {
    sessions.onOnline((sessionId) => {
      registry.replayPending(sessionId).catch((error: unknown) => {
        logger.error({ sessionId, err: error }, 'Failed to replay pending requests');
      });
    });
  }

  return { sessions, tokens, connections, registry, sweeper, pushProvider };
}
