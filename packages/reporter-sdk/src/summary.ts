import Table from 'cli-table3';
import type { Outcome } from '@tuner-cloud/shared-types';

export interface SummaryInfo {
  status: Outcome;
  lastUpdate: number | null;
  baseUrl: string;
  debounceInterval: number;
  pendingTasks: number;
}

/**
 * epochミリ秒を YYYY-MM-DDTHH:mm:ssZ に整形
 */
export function formatTimestamp(timestamp: number | null): string {
  if (timestamp === null) {
    return 'never';
  }
  return new Date(timestamp).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * ステータス概要をテーブル形式で描画
 */
export function renderSummary(info: SummaryInfo, extended = false): string {
  const table = new Table({
    head: ['Cloud service status', ''],
    style: { head: [], border: [] },
  });

  table.push(['status', info.status], ['last update', formatTimestamp(info.lastUpdate)]);

  if (extended) {
    table.push(
      ['endpoint', info.baseUrl],
      ['debounce interval', `${info.debounceInterval}ms`],
      ['pending tasks', String(info.pendingTasks)]
    );
  }

  return table.toString();
}
