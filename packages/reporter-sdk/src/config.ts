/**
 * レポーティングクライアントの設定
 * @module config
 */

import { z } from 'zod';
import { DEFAULT_BASE_URL, DEFAULT_DEBOUNCE_INTERVAL } from './constants.js';
import { ReporterConfigError } from './errors.js';

/**
 * 設定値のZodスキーマ
 */
export const ReportingClientOptionsSchema = z.object({
  baseUrl: z.string().url('baseUrl must be a valid URL').default(DEFAULT_BASE_URL),
  debounceInterval: z.number().int().min(0).default(DEFAULT_DEBOUNCE_INTERVAL),
  concurrency: z.number().int().positive().optional(),
  requestTimeout: z.number().int().positive().optional(),
  allowTestCredentials: z.boolean().default(false),
});

export type ReportingSettings = z.infer<typeof ReportingClientOptionsSchema>;
export type ReportingSettingsInput = z.input<typeof ReportingClientOptionsSchema>;

/**
 * 設定値を検証してデフォルトを補完する
 */
export function parseSettings(input: ReportingSettingsInput = {}): ReportingSettings {
  const result = ReportingClientOptionsSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ReporterConfigError(`Invalid reporting configuration: ${details}`, result.error.issues);
  }
  return result.data;
}

/**
 * 環境変数から読み込む設定
 */
export interface EnvConfig extends ReportingSettings {
  apiKey?: string;
}

const EnvSchema = z.object({
  TUNER_CLOUD_URL: z.string().optional(),
  TUNER_CLOUD_API_KEY: z.string().min(1).optional(),
  TUNER_CLOUD_DEBOUNCE_MS: z.coerce.number().optional(),
  TUNER_CLOUD_CONCURRENCY: z.coerce.number().optional(),
  TUNER_CLOUD_TIMEOUT_MS: z.coerce.number().optional(),
});

/**
 * 環境変数から設定を構築
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ReporterConfigError('Invalid reporting environment', parsed.error.issues);
  }

  const vars = parsed.data;
  const settings = parseSettings({
    baseUrl: vars.TUNER_CLOUD_URL,
    debounceInterval: vars.TUNER_CLOUD_DEBOUNCE_MS,
    concurrency: vars.TUNER_CLOUD_CONCURRENCY,
    requestTimeout: vars.TUNER_CLOUD_TIMEOUT_MS,
  });

  return { ...settings, apiKey: vars.TUNER_CLOUD_API_KEY };
}
