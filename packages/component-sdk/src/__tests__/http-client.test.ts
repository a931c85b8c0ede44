import { describe, it, expect, vi } from 'vitest';

import { createHttpClient } from '../http/client';
import { NetworkError, TimeoutError } from '../errors';

describe('createHttpClient', () => {
  it('passes requests through with an abort signal attached', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => new Response('{"ok":true}', { status: 200 }));
    const client = createHttpClient({ fetchImpl, timeoutMs: 1_000 });

    const response = await client.fetch('http://agents.test/chat', { method: 'POST', body: '{}' });

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ ok: true });
    const init = fetchImpl.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('raises a TimeoutError once the deadline passes', async () => {
    const fetchImpl = vi.fn(
      (_url: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const client = createHttpClient({ fetchImpl, timeoutMs: 20 });

    const request = client.fetch('http://slow.test/chat');

    await expect(request).rejects.toBeInstanceOf(TimeoutError);
    await expect(request).rejects.toThrow('Request to http://slow.test/chat timed out after 20ms');
  });

  it('wraps transport failures in a NetworkError', async () => {
    const fetchImpl = vi.fn(async () => {
      throw new Error('connect ECONNREFUSED');
    });
    const client = createHttpClient({ fetchImpl });

    const request = client.fetch('http://down.test/chat');

    await expect(request).rejects.toBeInstanceOf(NetworkError);
    await expect(request).rejects.toThrow('Request to http://down.test/chat failed: connect ECONNREFUSED');
  });

  it('reads the body of a text request', async () => {
    const fetchImpl = vi.fn(async () => new Response('upstream down', { status: 503, statusText: 'Service Unavailable' }));
    const client = createHttpClient({ fetchImpl });

    const response = await client.fetchText('http://agents.test/chat');

    expect(response).toEqual({
      ok: false,
      status: 503,
      statusText: 'Service Unavailable',
      url: '',
      body: 'upstream down',
    });
  });

  it('raises a TimeoutError when the body stalls past the deadline', async () => {
    const fetchImpl = vi.fn(
      async (_url: string, init?: RequestInit) =>
        new Response(
          new ReadableStream<Uint8Array>({
            start(controller) {
              controller.enqueue(new TextEncoder().encode('{"message":'));
              init?.signal?.addEventListener('abort', () => controller.error(new Error('body aborted')));
            },
          }),
        ),
    );
    const client = createHttpClient({ fetchImpl, timeoutMs: 20 });

    const request = client.fetchText('http://slow.test/chat');

    await expect(request).rejects.toBeInstanceOf(TimeoutError);
    await expect(request).rejects.toThrow('Request to http://slow.test/chat timed out after 20ms');
  });
});
