import { describe, it, expect, vi } from 'vitest';
import type { RelayEvent } from '@keyrelay/shared';
import { RelayPushProvider } from './relay-provider.js';

const event: RelayEvent = {
  kind: 'key_exchange_accepted',
  requestId: 'req1',
  senderId: 'S-bob',
  recipientId: 'S-alice',
  payload: { encryptedUserData: 'edata2' },
  sentAt: 2_000,
};

function createFetch(status = 202) {
  return vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit) => new Response(null, { status })
  );
}

function createProvider(fetchImpl: ReturnType<typeof createFetch>) {
  return new RelayPushProvider({
    config: { baseUrl: 'https://push.example.test/', appName: 'relay-test', appKey: 'test-secret' },
    fetchImpl,
  });
}

describe('RelayPushProvider', () => {
  it('should post to the relay with app credentials', async () => {
    const fetchImpl = createFetch();

    const result = await createProvider(fetchImpl).send({
      token: 'android-token',
      platform: 'android',
      channel: 'default',
      event,
    });

    expect(result).toEqual({ accepted: true });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://push.example.test/api/v2/push');
    expect(init?.method).toBe('POST');

    const headers = new Headers(init?.headers);
    expect(headers.get('x-an-app-name')).toBe('relay-test');
    expect(headers.get('x-an-app-key')).toBe('test-secret');

    expect(JSON.parse(String(init?.body))).toEqual({
      device: 'android',
      token: 'android-token',
      alert: { title: 'Request Accepted', body: 'Your secure conversation request was accepted' },
      sound: 'default',
      badge: 1,
      extra: {
        type: 'key_exchange_accepted',
        requestId: 'req1',
        senderId: 'S-bob',
        recipientId: 'S-alice',
      },
    });
  });

  it('should send silent pushes without an alert', async () => {
    const fetchImpl = createFetch();

    await createProvider(fetchImpl).send({ token: 'ios-token', platform: 'ios', channel: 'silent', event });

    const body: unknown = JSON.parse(String(fetchImpl.mock.calls[0]?.[1]?.body));
    expect(body).toMatchObject({ device: 'ios', 'content-available': 1 });
    expect(body).not.toHaveProperty('alert');
  });

  it('should report unknown tokens as invalid', async () => {
    const result = await createProvider(createFetch(404)).send({
      token: 'gone',
      platform: 'ios',
      channel: 'default',
      event,
    });

    expect(result).toEqual({ accepted: false, reason: 'invalid_token', detail: 'Relay does not know this token' });
  });

  it('should report server errors as provider errors', async () => {
    const result = await createProvider(createFetch(503)).send({
      token: 'tok',
      platform: 'ios',
      channel: 'default',
      event,
    });

    expect(result).toEqual({ accepted: false, reason: 'provider_error', detail: 'Relay error: 503' });
  });
});
