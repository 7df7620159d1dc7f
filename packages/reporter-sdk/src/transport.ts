/**
 * HTTP送信の抽象化
 * @module transport
 */

/**
 * 送信結果のレスポンス
 */
export interface TransportResponse {
  ok: boolean;
  status: number;
  text: string;
  /**
   * ボディをJSONとして解釈する。解釈できなければ例外を投げる
   */
  json(): unknown;
}

export interface Transport {
  post(url: string, headers: Record<string, string>, body?: unknown): Promise<TransportResponse>;
}

export interface FetchTransportOptions {
  /** リクエストごとのタイムアウト（ミリ秒） */
  timeout?: number;
}

/**
 * グローバル fetch を使った Transport 実装
 */
export class FetchTransport implements Transport {
  private readonly timeout?: number;

  constructor(options: FetchTransportOptions = {}) {
    this.timeout = options.timeout;
  }

  async post(
    url: string,
    headers: Record<string, string>,
    body?: unknown
  ): Promise<TransportResponse> {
    const init: RequestInit = {
      method: 'POST',
      headers: {
        ...(body !== undefined && { 'Content-Type': 'application/json' }),
        ...headers,
      },
    };

    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }
    if (this.timeout !== undefined) {
      init.signal = AbortSignal.timeout(this.timeout);
    }

    const response = await fetch(url, init);
    const text = await response.text();

    return {
      ok: response.ok,
      status: response.status,
      text,
      json: (): unknown => JSON.parse(text),
    };
  }
}
