import type { Logger } from 'winston';
import { z } from 'zod';
import type {
  InfoType,
  Outcome,
  Payload,
  ReportingConfigSnapshot,
  SendDisposition,
} from '@tuner-cloud/shared-types';
import { parseSettings, type ReportingSettingsInput } from './config.js';
import { ENDPOINTS, OUTCOME } from './constants.js';
import {
  HttpCredentialValidator,
  TestCredentialValidator,
  type CredentialValidator,
} from './credential-validator.js';
import { AsyncDispatcher } from './dispatcher.js';
import { createChildLogger } from './logger.js';
import { sanitizePayload } from './sanitize.js';
import { renderSummary } from './summary.js';
import { Transmitter } from './transmitter.js';
import { FetchTransport, type Transport } from './transport.js';
import { urlJoin } from './url.js';

export interface ReportingClientOptions extends ReportingSettingsInput {
  transport?: Transport;
  validator?: CredentialValidator;
  logger?: Logger;
  /** 現在時刻（epochミリ秒）。テストで時計を差し替える */
  now?: () => number;
}

const UrlSchema = z.string().url();

/**
 * クラウドサービスへのレポーティングクライアント
 *
 * `status` は同期送信（sendBlocking）の結果だけを記録する。
 * sendStatus / sendResults の非同期送信は結果を返さず、`status` も更新しない。
 * テスト用キーは allowTestCredentials: true を渡したときだけ受け付ける。
 */
export class ReportingClient {
  private enabled = false;
  private currentStatus: Outcome = OUTCOME.DISABLED;
  private url: string;
  private credential?: string;
  private lastSendTimestamp: number | null = null;

  private readonly debounce: number;
  private readonly transmitter: Transmitter;
  private readonly validator: CredentialValidator;
  private readonly dispatcher: AsyncDispatcher;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ReportingClientOptions = {}) {
    const { transport: customTransport, validator, logger, now, ...settingsInput } = options;
    const settings = parseSettings(settingsInput);

    this.logger = logger ?? createChildLogger('ReportingClient');
    this.url = settings.baseUrl;
    this.debounce = settings.debounceInterval;
    this.now = now ?? Date.now;

    const transport = customTransport ?? new FetchTransport({ timeout: settings.requestTimeout });
    this.transmitter = new Transmitter({ transport, logger: this.logger });

    const httpValidator = new HttpCredentialValidator(transport, this.logger);
    this.validator =
      validator ??
      (settings.allowTestCredentials ? new TestCredentialValidator(httpValidator) : httpValidator);

    this.dispatcher = new AsyncDispatcher({
      concurrency: settings.concurrency,
      logger: this.logger,
    });
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * 最後に記録された送信結果。非同期送信とは競合するため参考値
   */
  get status(): Outcome {
    return this.currentStatus;
  }

  get baseUrl(): string {
    return this.url;
  }

  get lastUpdate(): number | null {
    return this.lastSendTimestamp;
  }

  get debounceInterval(): number {
    return this.debounce;
  }

  /**
   * APIキーを設定してクラウドサービスを有効化する
   */
  async enable(credential: string, url?: string): Promise<void> {
    this.credential = credential;
    if (url) {
      if (!UrlSchema.safeParse(url).success) {
        this.logger.warn('Invalid cloud service URL', { url });
        this.enabled = false;
        this.currentStatus = OUTCOME.AUTH_ERROR;
        return;
      }
      this.url = url;
    }

    let accepted: boolean;
    try {
      accepted = await this.validator.check(this.url, credential);
    } catch (error) {
      this.logger.warn('Access check raised an error', {
        error: error instanceof Error ? error.message : String(error),
      });
      accepted = false;
    }

    if (accepted) {
      this.enabled = true;
      this.currentStatus = OUTCOME.OK;
      this.logger.info('Cloud service enabled - tuning results are now tracked in realtime');
    } else {
      this.enabled = false;
      this.currentStatus = OUTCOME.AUTH_ERROR;
      this.logger.warn('Invalid cloud API key');
    }
  }

  /**
   * チューナーの状態を送信する（デバウンスあり）
   */
  sendStatus(payload: Payload): SendDisposition {
    if (!this.enabled) {
      return 'disabled';
    }

    const timestamp = this.now();
    if (this.lastSendTimestamp !== null && timestamp - this.lastSendTimestamp <= this.debounce) {
      return 'debounced';
    }

    this.lastSendTimestamp = timestamp;
    return this.dispatch('status', payload);
  }

  /**
   * 試行結果を送信する（デバウンスなし）
   */
  sendResults(payload: Payload): SendDisposition {
    return this.dispatch('results', payload);
  }

  /**
   * 送信完了まで待ち、結果を status に記録する
   */
  async sendBlocking(infoType: InfoType | string, payload: Payload): Promise<Outcome> {
    const credential = this.activeCredential();
    if (credential === undefined) {
      return OUTCOME.DISABLED;
    }

    const outcome = await this.transmitter.send(this.updateUrl(), credential, infoType, payload);
    this.currentStatus = outcome;
    return outcome;
  }

  /**
   * 送信中のリクエストがすべて完了するまで待つ
   * 完了後も同じクライアントで送信を続けられる
   */
  async complete(): Promise<void> {
    await this.dispatcher.drain();
  }

  /**
   * ステータス概要を描画してログに出力する
   */
  summary(extended = false): string {
    const rendered = renderSummary(
      {
        status: this.currentStatus,
        lastUpdate: this.lastSendTimestamp,
        baseUrl: this.url,
        debounceInterval: this.debounce,
        pendingTasks: this.dispatcher.pending,
      },
      extended
    );
    this.logger.info(`Cloud service status\n${rendered}`);
    return rendered;
  }

  /**
   * 設定スナップショット。APIキーは含めない
   */
  getConfig(): ReportingConfigSnapshot {
    return {
      enabled: this.enabled,
      status: this.currentStatus,
      lastUpdate: this.lastSendTimestamp,
    };
  }

  private dispatch(infoType: InfoType, payload: Payload): SendDisposition {
    const credential = this.activeCredential();
    if (credential === undefined) {
      return 'disabled';
    }

    const url = this.updateUrl();
    // 投入時点の内容を送る
    const data = sanitizePayload(payload);
    this.dispatcher.submit(() => this.transmitter.send(url, credential, infoType, data));
    return 'dispatched';
  }

  private activeCredential(): string | undefined {
    return this.enabled ? this.credential : undefined;
  }

  private updateUrl(): string {
    return urlJoin(this.url, ENDPOINTS.UPDATE);
  }
}
