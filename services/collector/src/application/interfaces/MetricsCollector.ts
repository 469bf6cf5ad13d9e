/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

export type ConfigReloadResult = 'applied' | 'unchanged' | 'rejected';

/**
 * メトリクス収集インターフェース
 *
 * 責務: メトリクスの収集・保持・公開を抽象化
 */
export interface MetricsCollector {
  /**
   * 稼働中の Collector 数を設定
   */
  setActiveCollectors(count: number): void;

  /**
   * 板に適用した更新数をカウント
   * @param symbol シンボル（BTC_USDT など）
   */
  incrementUpdatesApplied(symbol: string): void;

  /**
   * 再同期回数をカウント
   * @param reason 再同期のきっかけ（initial, crossed, sequence-gap など）
   */
  incrementResync(symbol: string, reason: string): void;

  /**
   * 永続化したスナップショット数をカウント
   * @param target 書き込み先（file, redis）
   */
  incrementSnapshotsPersisted(symbol: string, target: string): void;

  /**
   * 再接続回数をカウント
   */
  incrementReconnect(symbol: string): void;

  /**
   * エラー数をカウント
   * @param errorType エラータイプ（feed_error, persistence_error, config_error, collector_failed）
   */
  incrementError(errorType: string, symbol?: string): void;

  /**
   * 設定の再読み込み結果をカウント
   */
  incrementConfigReload(result: ConfigReloadResult): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
