import { DisabledPushProvider, type PushProvider, type RelayLogger } from '@keyrelay/core';
import type { PushConfig } from '../../config.js';
import { ApnsPushProvider } from './apns-provider.js';
import { RelayPushProvider } from './relay-provider.js';

export { ApnsPushProvider, type ApnsPushProviderOptions } from './apns-provider.js';
export { RelayPushProvider, type RelayPushProviderOptions } from './relay-provider.js';

export function createPushProvider(config: PushConfig, logger?: RelayLogger): PushProvider {
  switch (config.provider) {
    case 'apns':
      return new ApnsPushProvider({ config: config.apns, timeoutMs: config.timeoutMs, logger });
    case 'relay':
      return new RelayPushProvider({ config: config.relay, timeoutMs: config.timeoutMs, logger });
    case 'none':
      logger?.warn('Push not configured - offline sessions will not be notified');
      return new DisabledPushProvider();
  }
}
