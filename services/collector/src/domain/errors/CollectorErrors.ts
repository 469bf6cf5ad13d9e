/**
 * ドメイン層: コレクター全体で使うエラー分類
 *
 * - ConfigError: 設定ファイルの不正・取引所変更（回復可能、直前の設定を維持）
 * - FeedError: 接続断・プロトコル違反（再接続 / 再同期で回復、試行回数に上限あり）
 * - BookConsistencyError: 板の交差・シーケンス欠落（強制再同期）
 * - PersistenceError: スナップショット書き込み失敗（ログのみ、収集は継続）
 * - FatalStartupError: 起動時の設定不正（プロセスを非ゼロで終了）
 */
export class CollectorServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends CollectorServiceError {}

export class FeedError extends CollectorServiceError {}

/**
 * 板の整合性違反の種別
 */
export type BookConsistencyReason = 'crossed' | 'sequence-gap' | 'unknown-symbol' | 'invalid-level' | 'rejected';

export class BookConsistencyError extends CollectorServiceError {
  constructor(
    readonly reason: BookConsistencyReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class PersistenceError extends CollectorServiceError {}

export class FatalStartupError extends CollectorServiceError {}

/**
 * キャンセル（AbortSignal）による中断
 */
export class AbortError extends CollectorServiceError {
  constructor(message = 'operation aborted') {
    super(message);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * catch した値を Error に揃える。
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
