import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CircuitBreakerRegistry } from '@lastcup/platform-core';
import { ExpoPushTransport, DEFAULT_EXPO_PUSH_URL } from '../../infrastructure/notification/ExpoPushTransport';
import { PushTransportError } from '../../domains/notifications/errors';

const TITLE = '기록 알림';
const BODY = '오늘의 기록을 남겨보세요.';

function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), { status, headers: { 'Content-Type': 'application/json' } });
}

function ticketsFor(init: RequestInit | undefined, status: 'ok' | 'error' = 'ok'): Response {
  const messages: unknown[] = JSON.parse(String(init?.body));
  return jsonResponse({
    data: messages.map((_, index) =>
      status === 'ok' ? { status: 'ok', id: `ticket-${index}` } : { status: 'error', message: 'DeviceNotRegistered' }
    ),
  });
}

describe('ExpoPushTransport', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let registry: CircuitBreakerRegistry;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    registry = new CircuitBreakerRegistry();
  });

  afterEach(() => {
    registry.shutdownAll();
    vi.unstubAllGlobals();
  });

  it('should post one message per token', async () => {
    fetchMock.mockImplementation(async (_url, init) => ticketsFor(init));
    const transport = new ExpoPushTransport({ accessToken: 'test-secret', circuitBreakerRegistry: registry });

    await transport.sendToTokens(['ExponentPushToken[aaa]', 'ExponentPushToken[bbb]'], TITLE, BODY);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(DEFAULT_EXPO_PUSH_URL);
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual([
      { to: 'ExponentPushToken[aaa]', title: TITLE, body: BODY, sound: 'default', priority: 'high', channelId: 'default' },
      { to: 'ExponentPushToken[bbb]', title: TITLE, body: BODY, sound: 'default', priority: 'high', channelId: 'default' },
    ]);
  });

  it('should split large sends into batches of 100', async () => {
    fetchMock.mockImplementation(async (_url, init) => ticketsFor(init));
    const transport = new ExpoPushTransport({ circuitBreakerRegistry: registry });
    const tokens = Array.from({ length: 250 }, (_, i) => `ExponentPushToken[t${i}]`);

    await transport.sendToTokens(tokens, TITLE, BODY);

    const batchSizes = fetchMock.mock.calls.map(([, init]) => {
      const messages: unknown[] = JSON.parse(String(init?.body));
      return messages.length;
    });
    expect(batchSizes).toEqual([100, 100, 50]);
  });

  it('should skip the network for an empty token list', async () => {
    const transport = new ExpoPushTransport({ circuitBreakerRegistry: registry });

    await transport.sendToTokens([], TITLE, BODY);

    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should throw a PushTransportError on an HTTP failure', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ errors: [{ code: 'INTERNAL' }] }, 500));
    const transport = new ExpoPushTransport({ circuitBreakerRegistry: registry });

    await expect(transport.sendToTokens(['ExponentPushToken[aaa]'], TITLE, BODY)).rejects.toBeInstanceOf(
      PushTransportError
    );
  });

  it('should wrap network errors', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const transport = new ExpoPushTransport({ circuitBreakerRegistry: registry });

    await expect(transport.sendToTokens(['ExponentPushToken[aaa]'], TITLE, BODY)).rejects.toThrow(
      'push-transport request failed: fetch failed'
    );
  });

  it('should throw when every ticket is an error', async () => {
    fetchMock.mockImplementation(async (_url, init) => ticketsFor(init, 'error'));
    const transport = new ExpoPushTransport({ circuitBreakerRegistry: registry });

    await expect(transport.sendToTokens(['ExponentPushToken[aaa]'], TITLE, BODY)).rejects.toThrow(
      'Every push ticket was rejected'
    );
  });

  it('should resolve when only some tickets fail', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ data: [{ status: 'ok', id: 'ticket-1' }, { status: 'error', message: 'DeviceNotRegistered' }] })
    );
    const transport = new ExpoPushTransport({ circuitBreakerRegistry: registry });

    await expect(
      transport.sendToTokens(['ExponentPushToken[aaa]', 'ExponentPushToken[bbb]'], TITLE, BODY)
    ).resolves.toBeUndefined();
  });

  it('should reject malformed responses', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ unexpected: true }));
    const transport = new ExpoPushTransport({ circuitBreakerRegistry: registry });

    await expect(transport.sendToTokens(['ExponentPushToken[aaa]'], TITLE, BODY)).rejects.toThrow(
      'Malformed Expo API response'
    );
  });

  it('should stop calling Expo once the circuit opens', async () => {
    registry.configure('expo-push-api', {
      volumeThreshold: 2,
      errorThresholdPercentage: 50,
      resetTimeout: 60000,
      timeout: 5000,
    });
    fetchMock.mockImplementation(async () => jsonResponse({}, 503));
    const transport = new ExpoPushTransport({ circuitBreakerRegistry: registry });

    for (let i = 0; i < 2; i++) {
      await expect(transport.sendToTokens(['ExponentPushToken[aaa]'], TITLE, BODY)).rejects.toBeInstanceOf(
        PushTransportError
      );
    }
    await expect(transport.sendToTokens(['ExponentPushToken[aaa]'], TITLE, BODY)).rejects.toBeInstanceOf(
      PushTransportError
    );

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(registry.isOpen('expo-push-api')).toBe(true);
  });
});
