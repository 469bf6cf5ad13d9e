export type RetryDecision = 'retry' | 'exhausted' | 'aborted';

/**
 * 再接続の可否と待機を決める（インフラ層の ReconnectManager が実装する）。
 */
export interface RetryPolicy {
  /**
   * 失敗を1回記録し、再試行してよければ待機してから 'retry' を返す。
   */
  waitBeforeRetry(signal: AbortSignal): Promise<RetryDecision>;

  /**
   * 正常に同期できたときに待機時間を初期値へ戻す。
   */
  reset(): void;
}
