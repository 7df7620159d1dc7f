import type { Outcome } from '@tuner-cloud/shared-types';

/**
 * 送信結果の定数
 */
export const OUTCOME = {
  OK: 'ok',
  AUTH_ERROR: 'authentication error',
  CONNECT_ERROR: 'connection error',
  UPLOAD_ERROR: 'upload error',
  DISABLED: 'disable',
} as const satisfies Record<string, Outcome>;

export const DEFAULT_BASE_URL = 'https://us-central1-kerastuner-prod.cloudfunctions.net/api/';

export const ENDPOINTS = {
  CHECK_ACCESS: 'v1/check-access',
  UPDATE: 'v1/update',
} as const;

/** ステータス送信の最小間隔（ミリ秒） */
export const DEFAULT_DEBOUNCE_INTERVAL = 5000;

export const AUTH_HEADER = 'X-AUTH';

/**
 * サイズが上限なく大きくなるため送信しないキー
 */
export const EXCLUDED_FIELDS: readonly string[] = ['model_config', 'epoch_history'];

/**
 * テストハーネス専用の認証情報
 * ネットワークに触れずに enable() の結果を固定する
 */
export const TEST_CREDENTIALS = {
  ACCEPTED: 'test_key_true',
  REJECTED: 'test_key_false',
} as const;
