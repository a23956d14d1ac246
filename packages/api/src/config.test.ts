import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      env: 'development',
      port: 3000,
      host: '0.0.0.0',
      logPretty: false,
      keyExchange: {
        ttlMs: 300_000,
        retentionMs: 86_400_000,
        sweepIntervalMs: 30_000,
        replayOnConnect: false,
      },
      push: { provider: 'none', timeoutMs: 5000, pruneInvalidTokens: true },
    });
  });

  it('should parse numbers and flags', () => {
    const config = loadConfig({
      PORT: '8080',
      KEY_EXCHANGE_TTL_MS: '60000',
      KEY_EXCHANGE_REPLAY_ON_CONNECT: 'true',
      PUSH_PRUNE_INVALID_TOKENS: 'false',
      LOG_PRETTY: '1',
    });

    expect(config.port).toBe(8080);
    expect(config.keyExchange.ttlMs).toBe(60_000);
    expect(config.keyExchange.replayOnConnect).toBe(true);
    expect(config.push.pruneInvalidTokens).toBe(false);
    expect(config.logPretty).toBe(true);
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(
      "Invalid environment variable PORT: Expected a positive integer, got 'abc'"
    );
  });

  it('should reject an unknown push provider', () => {
    expect(() => loadConfig({ PUSH_PROVIDER: 'carrier-pigeon' })).toThrow(
      /^Invalid environment variable PUSH_PROVIDER/
    );
  });

  it('should require APNs credentials when APNs is selected', () => {
    expect(() => loadConfig({ PUSH_PROVIDER: 'apns', APNS_TEAM_ID: 'TEAM123' })).toThrow(
      'PUSH_PROVIDER=apns requires APNS_TEAM_ID, APNS_KEY_ID, APNS_PRIVATE_KEY and APNS_BUNDLE_ID'
    );
  });

  it('should build the APNs config and unescape the key', () => {
    const config = loadConfig({
      PUSH_PROVIDER: 'APNS',
      APNS_TEAM_ID: 'TEAM123',
      APNS_KEY_ID: 'KEY123',
      APNS_PRIVATE_KEY: 'line-one\\nline-two',
      APNS_BUNDLE_ID: 'com.example.relay',
      APNS_PRODUCTION: 'true',
    });

    expect(config.push).toEqual({
      provider: 'apns',
      timeoutMs: 5000,
      pruneInvalidTokens: true,
      apns: {
        teamId: 'TEAM123',
        keyId: 'KEY123',
        privateKey: 'line-one\nline-two',
        bundleId: 'com.example.relay',
        production: true,
      },
    });
  });

  it('should build the relay config', () => {
    const config = loadConfig({
      PUSH_PROVIDER: 'relay',
      RELAY_BASE_URL: 'https://push.example.test',
      RELAY_APP_NAME: 'relay-test',
      RELAY_APP_KEY: 'test-secret',
    });

    expect(config.push).toEqual({
      provider: 'relay',
      timeoutMs: 5000,
      pruneInvalidTokens: true,
      relay: { baseUrl: 'https://push.example.test', appName: 'relay-test', appKey: 'test-secret' },
    });
  });

  it('should reject a relay URL that does not parse', () => {
    expect(() => loadConfig({ PUSH_PROVIDER: 'relay', RELAY_BASE_URL: 'not a url' })).toThrow(
      'Invalid environment variable RELAY_BASE_URL: RELAY_BASE_URL must be a valid URL'
    );
  });
});
