import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { ConfigError, toError } from '@/domain/errors/CollectorErrors';
import type { CollectorConfig } from '@/domain/models/CollectorConfig';
import type { ExchangeName } from '@/domain/models/Exchange';
import { parseTickerSymbol, type TickerSymbol } from '@/domain/models/TickerSymbol';
import type { Collector, CollectorExit, CollectorStatus } from './Collector';

export type ManagedCollector = Pick<Collector, 'run' | 'status'>;

export type CollectorFactory = (symbol: TickerSymbol) => ManagedCollector;

export interface OrchestratorOptions {
  exchange: ExchangeName;
  createCollector: CollectorFactory;
  logger: Logger;
  metricsCollector?: MetricsCollector;
  /** 失敗した Collector を再起動するまでの待ち時間。0 で再起動しない */
  restartDelayMs?: number;
}

export interface ReconcileResult {
  added: string[];
  removed: string[];
  unchanged: string[];
}

interface CollectorHandle {
  readonly symbol: string;
  readonly collector: ManagedCollector;
  readonly controller: AbortController;
  readonly done: Promise<CollectorExit>;
}

/**
 * アプリケーション層: Collector 群の管理
 *
 * 責務: 設定の収集対象と稼働中の Collector を突き合わせ、差分だけを起動・停止する。
 *
 * - 突き合わせと Collector の終了処理は直列のキューで1件ずつ処理する（handles を触るのはキュー内のみ）
 * - 停止は中断を通知して停止中に移すだけで、完了は待たない
 * - 停止中のシンボルが再追加された場合は停止完了を待ってから起動する（同一シンボルの Collector は常に1つ）
 * - 自分から終了した Collector の最後の状態は、起動し直すか設定から外れるまで statuses() に残す
 */
export class Orchestrator {
  private readonly handles = new Map<string, CollectorHandle>();
  private readonly stopping = new Map<string, Promise<CollectorExit>>();
  private readonly restartTimers = new Map<string, NodeJS.Timeout>();
  private readonly exited = new Map<string, CollectorStatus>();
  private readonly logger: Logger;
  private readonly restartDelayMs: number;
  private target: ReadonlySet<string> = new Set();
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(private readonly options: OrchestratorOptions) {
    this.logger = options.logger;
    this.restartDelayMs = options.restartDelayMs ?? 60000;
  }

  get activeSymbols(): string[] {
    return [...this.handles.keys()].sort();
  }

  get stoppingSymbols(): string[] {
    return [...this.stopping.keys()].sort();
  }

  /**
   * 稼働中の Collector と、終了したまま再起動を待っている Collector の状態
   */
  statuses(): CollectorStatus[] {
    return [...[...this.handles.values()].map((handle) => handle.collector.status), ...this.exited.values()].sort(
      (a, b) => a.symbol.localeCompare(b.symbol)
    );
  }

  /**
   * 設定を反映する。前に受け付けた設定の反映が終わってから処理される。
   */
  apply(config: CollectorConfig): Promise<ReconcileResult> {
    return this.enqueue(() => this.reconcile(config));
  }

  /**
   * 設定の列を順に反映し、列が終わったら（signal の中断を含む）すべて停止する。
   */
  async run(configs: AsyncIterable<CollectorConfig>, signal: AbortSignal): Promise<void> {
    try {
      for await (const config of configs) {
        if (signal.aborted) {
          break;
        }
        await this.apply(config);
      }
    } finally {
      await this.shutdown();
    }
  }

  /**
   * すべての Collector に停止を通知し、停止中のものも含めて完了を待つ。
   */
  shutdown(): Promise<void> {
    return this.enqueue(async () => {
      this.closed = true;
      for (const timer of this.restartTimers.values()) {
        clearTimeout(timer);
      }
      this.restartTimers.clear();

      for (const symbol of [...this.handles.keys()]) {
        this.stop(symbol);
      }
      this.options.metricsCollector?.setActiveCollectors(0);

      await Promise.all([...this.stopping.values()]);
      this.logger.info('All collectors stopped');
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    // 失敗は result を受け取った呼び出し元に伝わる。キューは次のタスクへ進める
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async reconcile(config: CollectorConfig): Promise<ReconcileResult> {
    const current = [...this.handles.keys()];

    if (this.closed) {
      this.logger.warn('Config ignored after shutdown');
      return { added: [], removed: [], unchanged: current };
    }

    if (config.exchange !== this.options.exchange) {
      const error = new ConfigError(
        `exchange cannot change while running (${this.options.exchange} -> ${config.exchange})`
      );
      this.logger.error('Config rejected', { err: error });
      this.options.metricsCollector?.incrementError('config_error');
      return { added: [], removed: [], unchanged: current };
    }

    this.target = new Set(config.symbols);
    const removed = current.filter((symbol) => !config.symbols.has(symbol));
    const unchanged = current.filter((symbol) => config.symbols.has(symbol));
    const added = [...config.symbols].filter((symbol) => !this.handles.has(symbol));

    for (const symbol of removed) {
      this.stop(symbol);
    }
    for (const symbol of [...this.exited.keys()]) {
      if (!config.symbols.has(symbol)) {
        this.exited.delete(symbol);
      }
    }
    for (const [symbol, timer] of this.restartTimers) {
      if (!config.symbols.has(symbol) || added.includes(symbol)) {
        clearTimeout(timer);
        this.restartTimers.delete(symbol);
      }
    }

    // 停止待ちのないシンボルを先に起動する
    const ready = added.filter((symbol) => !this.stopping.has(symbol));
    const waiting = added.filter((symbol) => this.stopping.has(symbol));
    for (const symbol of ready) {
      this.start(symbol);
    }
    for (const symbol of waiting) {
      await this.stopping.get(symbol);
      this.start(symbol);
    }

    this.options.metricsCollector?.setActiveCollectors(this.handles.size);
    this.logger.info('Collectors reconciled', { added, removed, unchanged });
    return { added, removed, unchanged };
  }

  private start(symbol: string): void {
    const ticker = parseTickerSymbol(symbol);
    if (!ticker) {
      this.logger.warn('Invalid symbol format; skipped', { symbol });
      return;
    }

    let collector: ManagedCollector;
    try {
      collector = this.options.createCollector(ticker);
    } catch (error) {
      this.logger.error('Failed to create collector', { symbol, err: error });
      this.options.metricsCollector?.incrementError('collector_failed', symbol);
      return;
    }

    const controller = new AbortController();
    const done = collector.run(controller.signal).catch(
      (error: unknown): CollectorExit => ({ status: 'failed', error: toError(error) })
    );
    const handle: CollectorHandle = { symbol, collector, controller, done };
    this.handles.set(symbol, handle);
    this.exited.delete(symbol);

    void done.then((exit) => this.enqueue(async () => this.onExit(handle, exit)));
  }

  /**
   * 中断を通知して停止中に移す。完了は stopping 経由で待てる。
   */
  private stop(symbol: string): void {
    const handle = this.handles.get(symbol);
    if (!handle) {
      return;
    }
    this.handles.delete(symbol);
    handle.controller.abort();

    const stopped: Promise<CollectorExit> = handle.done.then((exit) => {
      if (this.stopping.get(symbol) === stopped) {
        this.stopping.delete(symbol);
      }
      this.logger.info('Collector stop acknowledged', { symbol, status: exit.status });
      return exit;
    });
    this.stopping.set(symbol, stopped);
  }

  /**
   * Collector が自分から終了した場合の後始末。
   */
  private onExit(handle: CollectorHandle, exit: CollectorExit): void {
    // 停止を通知済みのもの（stop() で handles から外したもの）は stopping 側で扱う
    if (this.handles.get(handle.symbol) !== handle) {
      return;
    }
    this.handles.delete(handle.symbol);
    this.exited.set(handle.symbol, handle.collector.status);
    this.options.metricsCollector?.setActiveCollectors(this.handles.size);

    if (exit.status === 'failed') {
      this.logger.error('Collector terminated', { symbol: handle.symbol, err: exit.error });
      this.options.metricsCollector?.incrementError('collector_failed', handle.symbol);
    } else {
      this.logger.warn('Collector exited without being stopped', { symbol: handle.symbol });
    }
    this.scheduleRestart(handle.symbol);
  }

  private scheduleRestart(symbol: string): void {
    if (this.closed || this.restartDelayMs <= 0 || this.restartTimers.has(symbol)) {
      return;
    }

    this.logger.info('Collector restart scheduled', { symbol, delayMs: this.restartDelayMs });
    const timer = setTimeout(() => {
      this.restartTimers.delete(symbol);
      this.enqueue(async () => this.restart(symbol)).catch((error: unknown) => {
        this.logger.error('Collector restart failed', { symbol, err: error });
      });
    }, this.restartDelayMs);
    this.restartTimers.set(symbol, timer);
  }

  private restart(symbol: string): void {
    if (this.closed || !this.target.has(symbol) || this.handles.has(symbol)) {
      return;
    }
    this.start(symbol);
    this.options.metricsCollector?.setActiveCollectors(this.handles.size);
    this.logger.info('Collector restarted', { symbol });
  }
}
