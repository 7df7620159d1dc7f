/**
 * クラウドレポーティングの共有型定義
 */

/**
 * 送信結果の分類
 *
 * 値はログと設定スナップショットにそのまま出力される。
 */
export type Outcome =
  | 'ok'
  | 'authentication error'
  | 'connection error'
  | 'upload error'
  | 'disable';

/**
 * 送信する情報の種別
 */
export type InfoType = 'status' | 'results';

/**
 * 送信ペイロード（JSONとして直列化可能な値）
 */
export type Payload = Record<string, unknown>;

/**
 * v1/update エンドポイントのリクエストボディ
 */
export interface UpdateRequestBody {
  type: InfoType | string;
  data: Payload;
}

/**
 * v1/update の失敗時レスポンス
 * "Unauthorized" は認証エラーを示す
 */
export interface UpdateErrorResponse {
  status?: unknown;
  [key: string]: unknown;
}

/**
 * ノンブロッキング送信の受付結果
 */
export type SendDisposition = 'dispatched' | 'debounced' | 'disabled';

/**
 * getConfig() が返す設定スナップショット
 * 認証情報は含めない
 */
export interface ReportingConfigSnapshot {
  enabled: boolean;
  status: Outcome;
  /** 最後にステータスを送信した時刻（epochミリ秒）。未送信ならnull */
  lastUpdate: number | null;
}
