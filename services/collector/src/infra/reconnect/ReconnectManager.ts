import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { RetryDecision, RetryPolicy } from '@/application/interfaces/RetryPolicy';
import { isAbortError } from '@/domain/errors/CollectorErrors';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';
import { RetryBudget } from '@/infra/reconnect/RetryBudget';
import { sleep } from '@/shared/sleep';

export interface ReconnectManagerOptions {
  symbol: string;
  backoff?: BackoffStrategy;
  budget?: RetryBudget;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * インフラ層: 再接続の待機と試行回数の管理
 *
 * 責務: 失敗ごとに予算を消費し、バックオフ遅延だけ待ってから再試行を許可する。
 * 待機は signal の中断で即座に終わる。
 */
export class ReconnectManager implements RetryPolicy {
  private readonly symbol: string;
  private readonly backoff: BackoffStrategy;
  private readonly budget: RetryBudget;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;

  constructor(options: ReconnectManagerOptions) {
    this.symbol = options.symbol;
    this.backoff = options.backoff ?? new BackoffStrategy();
    this.budget = options.budget ?? new RetryBudget();
    this.logger = options.logger ?? LoggerFactory.forComponent('ReconnectManager', { symbol: options.symbol });
    this.metricsCollector = options.metricsCollector;
  }

  /**
   * 失敗を記録し、再接続してよいかを判断する。
   * 予算が残っていればバックオフ遅延だけ待機してから 'retry' を返す。
   */
  async waitBeforeRetry(signal: AbortSignal): Promise<RetryDecision> {
    if (!this.budget.tryConsume()) {
      return 'exhausted';
    }

    const delay = this.backoff.getNextDelay();
    this.logger.info('Reconnect scheduled', { delayMs: delay });

    // メトリクス収集: 再接続回数
    this.metricsCollector?.incrementReconnect(this.symbol);

    try {
      await sleep(delay, signal);
    } catch (error) {
      if (isAbortError(error)) {
        return 'aborted';
      }
      throw error;
    }
    return 'retry';
  }

  /**
   * 接続成功時にバックオフを初期値へ戻す。
   */
  reset(): void {
    this.backoff.reset();
  }
}
