/**
 * テスト用ユーティリティ
 */

import { createLogger } from './logger.js';
import type { Transport, TransportResponse } from './transport.js';

export interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

export type Responder = (request: RecordedRequest) => TransportResponse | Promise<TransportResponse>;

export function jsonResponse(status: number, body: unknown): TransportResponse {
  const text = JSON.stringify(body);
  return {
    ok: status >= 200 && status < 300,
    status,
    text,
    json: (): unknown => JSON.parse(text),
  };
}

export function textResponse(status: number, text: string): TransportResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    text,
    json: (): unknown => JSON.parse(text),
  };
}

/**
 * リクエストを記録するインメモリの Transport
 */
export class FakeTransport implements Transport {
  readonly requests: RecordedRequest[] = [];

  constructor(private responder: Responder = () => jsonResponse(200, { status: 'ok' })) {}

  respondWith(responder: Responder): void {
    this.responder = responder;
  }

  async post(url: string, headers: Record<string, string>, body?: unknown): Promise<TransportResponse> {
    const request = { url, headers, body };
    this.requests.push(request);
    return this.responder(request);
  }
}

export const createSilentLogger = () => createLogger({ silent: true });

/**
 * 外部から解決できる Promise
 */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
