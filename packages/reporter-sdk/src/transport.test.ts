import { describe, it, expect, afterEach, vi } from 'vitest';
import { FetchTransport } from './transport.js';

describe('FetchTransport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should post a JSON body with the given headers', async () => {
    const mockedFetch = vi
      .spyOn(global, 'fetch')
      .mockImplementation(async () => new Response(JSON.stringify({ status: 'ok' }), { status: 200 }));
    const transport = new FetchTransport();

    const response = await transport.post(
      'https://cloud.test/api/v1/update',
      { 'X-AUTH': 'test-secret' },
      { type: 'status', data: {} }
    );

    expect(response.ok).toBe(true);
    expect(response.status).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
    expect(mockedFetch).toHaveBeenCalledWith('https://cloud.test/api/v1/update', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-AUTH': 'test-secret' },
      body: '{"type":"status","data":{}}',
    });
  });

  it('should omit the body and content type when there is no payload', async () => {
    const mockedFetch = vi
      .spyOn(global, 'fetch')
      .mockImplementation(async () => new Response(null, { status: 204 }));
    const transport = new FetchTransport();

    await transport.post('https://cloud.test/api/v1/check-access', { 'X-AUTH': 'test-secret' });

    expect(mockedFetch).toHaveBeenCalledWith('https://cloud.test/api/v1/check-access', {
      method: 'POST',
      headers: { 'X-AUTH': 'test-secret' },
    });
  });

  it('should expose an error body as text and fail to parse it as JSON', async () => {
    vi.spyOn(global, 'fetch').mockImplementation(
      async () => new Response('Internal Server Error', { status: 500 })
    );
    const transport = new FetchTransport();

    const response = await transport.post('https://cloud.test/api/v1/update', {}, {});

    expect(response.ok).toBe(false);
    expect(response.text).toBe('Internal Server Error');
    expect(() => response.json()).toThrow(SyntaxError);
  });

  it('should attach an abort signal when a timeout is set', async () => {
    const mockedFetch = vi
      .spyOn(global, 'fetch')
      .mockImplementation(async () => new Response('{}', { status: 200 }));
    const transport = new FetchTransport({ timeout: 1000 });

    await transport.post('https://cloud.test/api/v1/update', {}, {});

    const init = mockedFetch.mock.calls[0]?.[1];
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('should propagate network errors to the caller', async () => {
    vi.spyOn(global, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
    const transport = new FetchTransport();

    await expect(transport.post('https://cloud.test/api/v1/update', {}, {})).rejects.toThrow(
      'fetch failed'
    );
  });
});
