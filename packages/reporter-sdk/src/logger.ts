/**
 * ロギング
 * @module logger
 */

import winston, { type Logger } from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'verbose';

export interface LoggerConfig {
  level?: LogLevel;
  format?: 'json' | 'simple';
  silent?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'verbose'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.LOG_LEVEL;

const defaultConfig: Required<LoggerConfig> = {
  level: isLogLevel(envLevel) ? envLevel : 'info',
  format: process.env.NODE_ENV === 'production' ? 'json' : 'simple',
  silent: false,
};

/**
 * ロガーインスタンスの作成
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const mergedConfig = { ...defaultConfig, ...config };

  const formats = [winston.format.timestamp(), winston.format.errors({ stack: true })];

  if (mergedConfig.format === 'json') {
    formats.push(winston.format.json());
  } else {
    formats.push(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...rest }) => {
        const extra = Object.keys(rest).length > 0 ? JSON.stringify(rest) : '';
        return `${timestamp} [${level}]: ${message} ${extra}`.trimEnd();
      })
    );
  }

  return winston.createLogger({
    level: mergedConfig.level,
    format: winston.format.combine(...formats),
    transports: [new winston.transports.Console({ level: mergedConfig.level })],
    silent: mergedConfig.silent,
    exitOnError: false,
  });
}

/**
 * デフォルトロガーインスタンス
 */
export const logger = createLogger();

/**
 * コンポーネント名付きの子ロガー
 */
export function createChildLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

/**
 * ログレベルの動的変更
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  logger.transports.forEach((transport) => {
    transport.level = level;
  });
}
