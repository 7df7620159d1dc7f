/**
 * Transmitter - 1回分の送信と結果の分類
 */

import type { Logger } from 'winston';
import { z } from 'zod';
import type {
  InfoType,
  Outcome,
  Payload,
  UpdateErrorResponse,
  UpdateRequestBody,
} from '@tuner-cloud/shared-types';
import { AUTH_HEADER, OUTCOME } from './constants.js';
import { createChildLogger } from './logger.js';
import { sanitizePayload } from './sanitize.js';
import type { Transport, TransportResponse } from './transport.js';

/**
 * 失敗レスポンスとして期待する形式
 */
export const UpdateErrorResponseSchema = z
  .object({
    status: z.unknown().optional(),
  })
  .passthrough();

function parseErrorBody(response: TransportResponse): UpdateErrorResponse | undefined {
  let body: unknown;
  try {
    body = response.json();
  } catch {
    return undefined;
  }
  const result = UpdateErrorResponseSchema.safeParse(body);
  return result.success ? result.data : undefined;
}

/**
 * 失敗レスポンスを分類する
 */
export function classifyResponse(response: TransportResponse): Outcome {
  if (response.ok) {
    return OUTCOME.OK;
  }

  const body = parseErrorBody(response);
  if (!body) {
    return OUTCOME.CONNECT_ERROR;
  }
  if (body.status === 'Unauthorized') {
    return OUTCOME.AUTH_ERROR;
  }
  return OUTCOME.UPLOAD_ERROR;
}

export interface TransmitterOptions {
  transport: Transport;
  logger?: Logger;
}

export class Transmitter {
  private readonly transport: Transport;
  private readonly logger: Logger;

  constructor(options: TransmitterOptions) {
    this.transport = options.transport;
    this.logger = options.logger ?? createChildLogger('Transmitter');
  }

  /**
   * ペイロードを送信して結果を分類する。例外は投げない
   */
  async send(
    url: string,
    credential: string,
    infoType: InfoType | string,
    payload: Payload
  ): Promise<Outcome> {
    const body: UpdateRequestBody = {
      type: infoType,
      data: sanitizePayload(payload),
    };

    let response: TransportResponse;
    try {
      response = await this.transport.post(url, { [AUTH_HEADER]: credential }, body);
    } catch (error) {
      this.logger.warn('Cloud service unreachable -- data not uploaded', {
        infoType,
        error: error instanceof Error ? error.message : String(error),
      });
      return OUTCOME.CONNECT_ERROR;
    }

    const outcome = classifyResponse(response);

    switch (outcome) {
      case OUTCOME.CONNECT_ERROR:
        this.logger.warn(`Cloud service down -- data not uploaded: ${response.text}`, { infoType });
        break;
      case OUTCOME.AUTH_ERROR:
        this.logger.warn('Invalid backend API key', { infoType });
        break;
      case OUTCOME.UPLOAD_ERROR:
        this.logger.warn(`Cloud service upload failed: ${response.text}`, {
          infoType,
          httpStatus: response.status,
        });
        break;
      default:
        this.logger.debug('Cloud service update sent', { infoType });
    }

    return outcome;
  }
}
