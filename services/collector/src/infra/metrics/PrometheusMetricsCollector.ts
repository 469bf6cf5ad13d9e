import { Counter, Gauge, Registry } from 'prom-client';
import type { ConfigReloadResult, MetricsCollector } from '@/application/interfaces/MetricsCollector';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンパターンの実装にはしていない。
 *
 * 責務: prom-client を使用してメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly activeCollectorsGauge: Gauge;
  private readonly updatesCounter: Counter;
  private readonly resyncCounter: Counter;
  private readonly persistedCounter: Counter;
  private readonly reconnectCounter: Counter;
  private readonly errorCounter: Counter;
  private readonly configReloadCounter: Counter;

  constructor() {
    this.register = new Registry();

    this.activeCollectorsGauge = new Gauge({
      name: 'collector_active_collectors',
      help: 'Number of running per-symbol collectors',
      registers: [this.register],
    });

    this.updatesCounter = new Counter({
      name: 'collector_book_updates_applied_total',
      help: 'Total number of order book updates applied',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    this.resyncCounter = new Counter({
      name: 'collector_book_resyncs_total',
      help: 'Total number of full snapshot resyncs',
      labelNames: ['symbol', 'reason'],
      registers: [this.register],
    });

    this.persistedCounter = new Counter({
      name: 'collector_snapshots_persisted_total',
      help: 'Total number of snapshots written',
      labelNames: ['symbol', 'target'],
      registers: [this.register],
    });

    this.reconnectCounter = new Counter({
      name: 'collector_reconnects_total',
      help: 'Total number of feed reconnections',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'collector_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type', 'symbol'],
      registers: [this.register],
    });

    this.configReloadCounter = new Counter({
      name: 'collector_config_reloads_total',
      help: 'Total number of configuration reloads by result',
      labelNames: ['result'],
      registers: [this.register],
    });
  }

  setActiveCollectors(count: number): void {
    this.activeCollectorsGauge.set(count);
  }

  incrementUpdatesApplied(symbol: string): void {
    this.updatesCounter.inc({ symbol });
  }

  incrementResync(symbol: string, reason: string): void {
    this.resyncCounter.inc({ symbol, reason });
  }

  incrementSnapshotsPersisted(symbol: string, target: string): void {
    this.persistedCounter.inc({ symbol, target });
  }

  incrementReconnect(symbol: string): void {
    this.reconnectCounter.inc({ symbol });
  }

  incrementError(errorType: string, symbol = 'none'): void {
    this.errorCounter.inc({ error_type: errorType, symbol });
  }

  incrementConfigReload(result: ConfigReloadResult): void {
    this.configReloadCounter.inc({ result });
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): Registry {
    return this.register;
  }
}
