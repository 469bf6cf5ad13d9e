/**
 * インフラ層: 一定時間あたりの失敗回数の上限
 *
 * 直近 windowMs の間に記録された失敗が maxFailures を超えたら予算切れとする。
 */
export class RetryBudget {
  private failures: number[] = [];

  constructor(
    private readonly maxFailures = 5,
    private readonly windowMs = 60000,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * 失敗を1回記録する。
   * @returns まだ再試行してよい場合 true
   */
  tryConsume(): boolean {
    const now = this.now();
    this.failures = this.failures.filter((at) => now - at < this.windowMs);
    this.failures.push(now);
    return this.failures.length <= this.maxFailures;
  }

  /**
   * 直近の窓内に記録されている失敗回数
   */
  get recentFailures(): number {
    const now = this.now();
    return this.failures.filter((at) => now - at < this.windowMs).length;
  }
}
