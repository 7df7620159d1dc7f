/**
 * APIキーの検証
 */

import type { Logger } from 'winston';
import { AUTH_HEADER, ENDPOINTS, TEST_CREDENTIALS } from './constants.js';
import { createChildLogger } from './logger.js';
import type { Transport } from './transport.js';
import { urlJoin } from './url.js';

export interface CredentialValidator {
  check(baseUrl: string, credential: string): Promise<boolean>;
}

/**
 * v1/check-access に問い合わせる検証器
 */
export class HttpCredentialValidator implements CredentialValidator {
  private readonly transport: Transport;
  private readonly logger: Logger;

  constructor(transport: Transport, logger?: Logger) {
    this.transport = transport;
    this.logger = logger ?? createChildLogger('CredentialValidator');
  }

  async check(baseUrl: string, credential: string): Promise<boolean> {
    const url = urlJoin(baseUrl, ENDPOINTS.CHECK_ACCESS);
    try {
      const response = await this.transport.post(url, { [AUTH_HEADER]: credential });
      return response.ok;
    } catch (error) {
      this.logger.warn('Access check failed', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}

/**
 * テストハーネス用の検証器
 *
 * TEST_CREDENTIALS の2つのキーはネットワークに触れず固定の結果を返し、
 * それ以外は委譲先に渡す。ReportingClient では allowTestCredentials: true のときだけ使う。
 */
export class TestCredentialValidator implements CredentialValidator {
  constructor(private readonly delegate: CredentialValidator) {}

  async check(baseUrl: string, credential: string): Promise<boolean> {
    if (credential === TEST_CREDENTIALS.ACCEPTED) {
      return true;
    }
    if (credential === TEST_CREDENTIALS.REJECTED) {
      return false;
    }
    return this.delegate.check(baseUrl, credential);
  }
}
