/**
 * インフラ層: 指数バックオフ戦略の実装
 *
 * 再接続時の遅延を指数関数的に増加させる戦略を実装する。
 */
export class BackoffStrategy {
  private attempt = 0;
  private readonly baseDelay: number;
  private readonly maxDelay: number;

  /**
   * @param options.baseDelay 初回の遅延（デフォルト 1秒）
   * @param options.maxDelay 遅延の上限（デフォルト 30秒）
   */
  constructor(options: { baseDelay?: number; maxDelay?: number } = {}) {
    this.baseDelay = options.baseDelay ?? 1000;
    this.maxDelay = options.maxDelay ?? 30000;
  }

  /**
   * 次の再接続までの遅延時間（ミリ秒）を取得する。
   */
  getNextDelay(): number {
    const delay = Math.min(this.baseDelay * 2 ** this.attempt, this.maxDelay);
    this.attempt += 1;
    return delay;
  }

  /**
   * バックオフカウンターをリセットする。
   * 接続成功時に呼び出される。
   */
  reset(): void {
    this.attempt = 0;
  }
}
