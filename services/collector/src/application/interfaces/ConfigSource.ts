import type { CollectorConfig } from '@/domain/models/CollectorConfig';

/**
 * 収集対象設定の供給元（インフラ層で実装される）。
 */
export interface ConfigSource {
  /**
   * 起動時の設定を読み込む。
   * @throws {FatalStartupError} 設定が読めない・不正な場合
   */
  load(): Promise<CollectorConfig>;

  /**
   * 初期設定を最初に返し、その後は実質的な変更があるたびに1回ずつ返す。
   * signal が中断されると終了する。
   */
  watch(signal: AbortSignal): AsyncIterable<CollectorConfig>;
}
