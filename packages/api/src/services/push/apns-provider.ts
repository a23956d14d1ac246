import { SignJWT, importPKCS8 } from 'jose';
import type { PushResult } from '@keyrelay/shared';
import { alertFor, toPushData, type PushMessage, type PushProvider, type RelayLogger } from '@keyrelay/core';
import type { APNsConfig } from '../../config.js';
import { createHttp2Fetch } from './http2-fetch.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface ApnsRequestInit {
  method: string;
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

export interface ApnsResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
}

/** APNs only accepts HTTP/2, so the default goes through an h2-enabled undici agent */
export type ApnsFetch = (url: string, init: ApnsRequestInit) => Promise<ApnsResponse>;

export interface ApnsPushProviderOptions {
  config: APNsConfig;
  timeoutMs?: number;
  fetchImpl?: ApnsFetch;
  logger?: RelayLogger;
}

// -----------------------------------------------------------------------------
// APNs Provider
// -----------------------------------------------------------------------------

/**
 * Sends push notifications via Apple Push Notification service (APNs).
 * Uses the token-based authentication (JWT).
 */
export class ApnsPushProvider implements PushProvider {
  readonly name = 'apns';

  private readonly config: APNsConfig;
  private readonly timeoutMs: number;
  private readonly fetchImpl: ApnsFetch;
  private readonly logger?: RelayLogger;
  private jwtToken: string | null = null;
  private jwtExpiresAt = 0;

  constructor(options: ApnsPushProviderOptions) {
    this.config = options.config;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.fetchImpl = options.fetchImpl ?? createHttp2Fetch();
    this.logger = options.logger;
    this.logger?.info({ production: this.config.production }, 'APNs provider configured');
  }

  async send(message: PushMessage): Promise<PushResult> {
    if (message.platform !== 'ios') {
      return { accepted: false, reason: 'unsupported_platform', detail: `APNs cannot reach ${message.platform} devices` };
    }

    const silent = message.channel === 'silent';
    const aps = silent
      ? { 'content-available': 1 }
      : { alert: alertFor(message.event.kind), sound: 'default', badge: 1 };

    const apnsHost = this.config.production ? 'api.push.apple.com' : 'api.sandbox.push.apple.com';

    try {
      const jwt = await this.getJWT();

      const response = await this.fetchImpl(`https://${apnsHost}/3/device/${encodeURIComponent(message.token)}`, {
        method: 'POST',
        headers: {
          authorization: `bearer ${jwt}`,
          'apns-topic': this.config.bundleId,
          'apns-push-type': silent ? 'background' : 'alert',
          'apns-priority': silent ? '5' : '10',
          'apns-expiration': '0',
          'content-type': 'application/json',
        },
        body: JSON.stringify({ aps, ...toPushData(message.event) }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      const apnsId = response.headers.get('apns-id') ?? undefined;

      if (response.ok) {
        return apnsId ? { accepted: true, providerId: apnsId } : { accepted: true };
      }

      const reason = await readReason(response);

      if (response.status === 410 || reason === 'Unregistered' || reason === 'ExpiredToken') {
        return { accepted: false, reason: 'expired_token', detail: reason };
      }
      if (reason === 'BadDeviceToken' || reason === 'DeviceTokenNotForTopic') {
        return { accepted: false, reason: 'invalid_token', detail: reason };
      }

      return {
        accepted: false,
        reason: 'provider_error',
        detail: reason ? `APNs error: ${response.status} ${reason}` : `APNs error: ${response.status}`,
      };
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

  /**
   * Get or refresh JWT for APNs authentication
   */
  private async getJWT(): Promise<string> {
    // Tokens last 1 hour, refresh at 50 min
    const now = Math.floor(Date.now() / 1000);
    if (this.jwtToken && this.jwtExpiresAt > now + 600) {
      return this.jwtToken;
    }

    const privateKey = await importPKCS8(this.config.privateKey, 'ES256');

    this.jwtToken = await new SignJWT({})
      .setProtectedHeader({ alg: 'ES256', kid: this.config.keyId })
      .setIssuer(this.config.teamId)
      .setIssuedAt(now)
      .sign(privateKey);

    this.jwtExpiresAt = now + 3600;

    return this.jwtToken;
  }
}

async function readReason(response: ApnsResponse): Promise<string | undefined> {
  try {
    const body: unknown = await response.json();
    if (typeof body === 'object' && body !== null && 'reason' in body) {
      return typeof body.reason === 'string' ? body.reason : undefined;
    }
  } catch {
    return undefined;
  }
  return undefined;
}
