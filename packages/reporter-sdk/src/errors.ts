import type { ZodIssue } from 'zod';

/**
 * レポーター設定の検証エラー
 *
 * ネットワーク起因の失敗は例外にせず Outcome として扱うため、
 * 呼び出し側に投げられるのはこのエラーのみ。
 */
export class ReporterConfigError extends Error {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = 'ReporterConfigError';
    this.issues = issues;
  }
}
