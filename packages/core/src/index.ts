// Key exchange
export {
  KeyExchangeRegistry,
  type KeyExchangeRegistryConfig,
  type KeyExchangeRegistryOptions,
  type KeyExchangeResult,
  type InitiateResult,
  type ExpiryReport,
} from './key-exchange/registry.js';
export { InMemoryKeyExchangeStore, pairKey, type KeyExchangeStore } from './key-exchange/request-store.js';
export { ExpirySweeper, type ExpirySweeperOptions, type SweeperState } from './key-exchange/expiry-sweeper.js';

// Tokens
export { TokenDirectory, type TokenDirectoryOptions, type TokenLookup } from './tokens/token-directory.js';
export { InMemoryTokenStore, type TokenStore } from './tokens/token-store.js';

// Presence
export { SessionDirectory, type SessionDirectoryOptions, type OnlineListener } from './presence/session-directory.js';

// Delivery
export {
  NotificationDispatcher,
  createNotificationDispatcher,
  type EventDeliverer,
  type NotificationDispatcherOptions,
} from './delivery/notification-dispatcher.js';
export {
  DirectDeliveryStage,
  PushDeliveryStage,
  aggregate,
  type DeliveryStage,
  type PushStageConfig,
} from './delivery/stages.js';
export {
  DisabledPushProvider,
  alertFor,
  toPushData,
  type PushAlert,
  type PushData,
  type PushMessage,
  type PushProvider,
} from './delivery/push-provider.js';
export type { DirectTransport } from './delivery/transport.js';

// Concurrency
export { KeyedLock } from './concurrency/keyed-lock.js';

// Telemetry
export { createLogger, type LoggerConfig, type RelayLogger } from './telemetry/logger.js';
