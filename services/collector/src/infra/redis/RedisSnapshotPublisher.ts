import Redis from 'ioredis';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { PersistenceError } from '@/domain/errors/CollectorErrors';
import type { OrderBookSnapshot } from '@/domain/models/OrderBookSnapshot';
import type { SnapshotPersister } from '@/domain/repositories/SnapshotPersister';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export const ORDERBOOK_STREAM = 'md:orderbook';

/**
 * インフラ層: Redis Stream へのスナップショット配信
 *
 * 責務: スナップショットを md:orderbook に XADD する（ファイル出力の補助的な写し）。
 * Stream の長さは MAXLEN ~ で概ね上限に保つ。
 */
export class RedisSnapshotPublisher implements SnapshotPersister {
  private readonly redis: Redis;
  private readonly logger: Logger;

  /**
   * @param redisUrl Redis 接続 URL
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   * @param maxLen Stream の概算上限
   */
  constructor(
    redisUrl: string,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector,
    private readonly maxLen = 10000
  ) {
    this.redis = new Redis(redisUrl);
    this.logger = logger ?? LoggerFactory.forComponent('RedisSnapshotPublisher');
  }

  async persist(snapshot: OrderBookSnapshot): Promise<void> {
    const payload = {
      exchange: snapshot.exchange,
      symbol: snapshot.symbol,
      ts: snapshot.capturedAt.toString(),
      data: JSON.stringify({
        sequence: snapshot.sequence,
        state: snapshot.state,
        bids: snapshot.bids,
        asks: snapshot.asks,
      }),
    };

    try {
      await this.redis.xadd(ORDERBOOK_STREAM, 'MAXLEN', '~', this.maxLen, '*', ...Object.entries(payload).flat());
    } catch (error) {
      // メトリクス収集: 配信エラー
      this.metricsCollector?.incrementError('persistence_error', snapshot.symbol);
      throw new PersistenceError(`failed to publish ${snapshot.symbol} snapshot to ${ORDERBOOK_STREAM}`, {
        cause: error,
      });
    }

    this.metricsCollector?.incrementSnapshotsPersisted(snapshot.symbol, 'redis');
  }

  /**
   * Redis 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.redis.quit();
    this.logger.info('Redis connection closed');
  }
}
