import 'dotenv/config';
import process from 'node:process';
import { Collector } from '@/application/services/Collector';
import { Orchestrator } from '@/application/services/Orchestrator';
import { CollectOrderBooksUsecase } from '@/application/usecases/CollectOrderBooksUsecase';
import { FatalStartupError } from '@/domain/errors/CollectorErrors';
import type { SnapshotPersister } from '@/domain/repositories/SnapshotPersister';
import { createExchangeFeed } from '@/infra/adapters/createExchangeFeed';
import { loadAppEnv } from '@/infra/config/AppEnv';
import { ConfigWatcher } from '@/infra/config/ConfigWatcher';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { ReconnectManager } from '@/infra/reconnect/ReconnectManager';
import { RetryBudget } from '@/infra/reconnect/RetryBudget';
import { RedisSnapshotPublisher } from '@/infra/redis/RedisSnapshotPublisher';
import { CompositeSnapshotPersister } from '@/infra/storage/CompositeSnapshotPersister';
import { FileSnapshotPersister } from '@/infra/storage/FileSnapshotPersister';

/**
 * エントリーポイント: 環境変数の検証、依存関係の注入、シグナルハンドリング
 *
 * 収集の挙動は Collector / Orchestrator に任せ、ここでは配線するだけにする。
 */
async function bootstrap(): Promise<void> {
  const env = loadAppEnv();
  const logger = LoggerFactory.configure({ level: env.LOG_LEVEL, pretty: env.NODE_ENV !== 'production' });
  const metricsCollector = new PrometheusMetricsCollector();

  const configWatcher = new ConfigWatcher({
    path: env.CONFIG_PATH,
    pollIntervalMs: env.CONFIG_POLL_INTERVAL_MS,
    logger: LoggerFactory.forComponent('ConfigWatcher'),
    metricsCollector,
  });
  // 取引所は起動時の設定で固定する
  const initial = await configWatcher.load();
  const exchange = initial.exchange;
  const feed = createExchangeFeed(exchange, logger.child({ exchange }));

  const filePersister = new FileSnapshotPersister(
    env.DATA_DIR,
    LoggerFactory.forComponent('FileSnapshotPersister'),
    metricsCollector
  );
  // REDIS_URL があればファイル出力と並行して Redis Stream にも配信する
  const redis = env.REDIS_URL
    ? new RedisSnapshotPublisher(env.REDIS_URL, LoggerFactory.forComponent('RedisSnapshotPublisher'), metricsCollector)
    : null;
  const persister: SnapshotPersister = redis ? new CompositeSnapshotPersister([filePersister, redis]) : filePersister;

  const orchestrator = new Orchestrator({
    exchange,
    logger: LoggerFactory.forComponent('Orchestrator', { exchange }),
    metricsCollector,
    restartDelayMs: env.RESTART_DELAY_MS,
    createCollector: (symbol) => {
      const collectorLogger = LoggerFactory.forComponent('Collector', { exchange, symbol: symbol.value });
      return new Collector(
        {
          symbol,
          feed,
          persister,
          logger: collectorLogger,
          metricsCollector,
          retryPolicy: new ReconnectManager({
            symbol: symbol.value,
            budget: new RetryBudget(env.RETRY_MAX_FAILURES, env.RETRY_WINDOW_MS),
            logger: collectorLogger,
            metricsCollector,
          }),
        },
        { snapshotIntervalMs: env.SNAPSHOT_INTERVAL_MS, snapshotDepth: env.SNAPSHOT_DEPTH }
      );
    },
  });

  const metricsServer =
    env.METRICS_PORT === undefined
      ? null
      : new MetricsServer(metricsCollector, env.METRICS_PORT, LoggerFactory.forComponent('MetricsServer'), () =>
          orchestrator.statuses()
        );
  metricsServer?.start();

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      return;
    }
    logger.info('Shutting down collector...', { signal });
    controller.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const usecase = new CollectOrderBooksUsecase(configWatcher, orchestrator, logger.child({ exchange }));
  try {
    await usecase.execute(controller.signal);
  } finally {
    await metricsServer?.stop();
    await redis?.close();
  }
}

bootstrap()
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    const logger = LoggerFactory.create();
    if (error instanceof FatalStartupError) {
      logger.error('Startup failed', { err: error });
    } else {
      logger.error('Collector crashed', { err: error });
    }
    process.exit(1);
  });
