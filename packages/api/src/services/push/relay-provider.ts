import type { PushResult } from '@keyrelay/shared';
import { alertFor, toPushData, type PushMessage, type PushProvider, type RelayLogger } from '@keyrelay/core';
import type { RelayConfig } from '../../config.js';

export interface RelayPushProviderOptions {
  config: RelayConfig;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: RelayLogger;
}

/**
 * Hands pushes to an AirNotifier-style relay, which holds the APNs and FCM
 * credentials and serves both platforms.
 */
export class RelayPushProvider implements PushProvider {
  readonly name = 'relay';

  private readonly endpoint: string;
  private readonly config: RelayConfig;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: RelayPushProviderOptions) {
    this.config = options.config;
    this.endpoint = `${options.config.baseUrl.replace(/\/+$/, '')}/api/v2/push`;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    options.logger?.info({ endpoint: this.endpoint }, 'Push relay configured');
  }

  async send(message: PushMessage): Promise<PushResult> {
    const silent = message.channel === 'silent';
    const body = {
      device: message.platform,
      token: message.token,
      ...(silent ? { 'content-available': 1 } : { alert: alertFor(message.event.kind), sound: 'default', badge: 1 }),
      extra: toPushData(message.event),
    };

    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          'x-an-app-name': this.config.appName,
          'x-an-app-key': this.config.appKey,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (response.ok) {
        return { accepted: true };
      }
      if (response.status === 404) {
        return { accepted: false, reason: 'invalid_token', detail: 'Relay does not know this token' };
      }
      return { accepted: false, reason: 'provider_error', detail: `Relay error: ${response.status}` };
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        return { accepted: false, reason: 'timeout', detail: `No response after ${this.timeoutMs}ms` };
      }
      return {
        accepted: false,
        reason: 'provider_error',
        detail: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}
