import type { ExchangeFeed, FeedConnection } from '@/application/interfaces/ExchangeFeed';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { RetryPolicy } from '@/application/interfaces/RetryPolicy';
import {
  BookConsistencyError,
  CollectorServiceError,
  FeedError,
  isAbortError,
  toError,
} from '@/domain/errors/CollectorErrors';
import { OrderBook } from '@/domain/models/OrderBook';
import type { OrderBookSnapshot, OrderBookState } from '@/domain/models/OrderBookSnapshot';
import type { TickerSymbol } from '@/domain/models/TickerSymbol';
import type { SnapshotPersister } from '@/domain/repositories/SnapshotPersister';

export type CollectorHealth =
  | 'idle'
  | 'connecting'
  | 'resyncing'
  | 'streaming'
  | 'reconnecting'
  | 'stopped'
  | 'failed';

export type CollectorExit = { status: 'stopped' } | { status: 'failed'; error: Error };

export interface CollectorStatus {
  symbol: string;
  health: CollectorHealth;
  bookState: OrderBookState;
  sequence: number | null;
  lastError: string | null;
  updatesApplied: number;
  snapshotsWritten: number;
  lastSnapshotAt: number | null;
}

export interface CollectorDeps {
  symbol: TickerSymbol;
  feed: ExchangeFeed;
  persister: SnapshotPersister;
  retryPolicy: RetryPolicy;
  logger: Logger;
  metricsCollector?: MetricsCollector;
  now?: () => number;
}

export interface CollectorOptions {
  snapshotIntervalMs?: number;
  /** 書き込む板の片側あたりの最大レベル数（未指定なら全件） */
  snapshotDepth?: number;
  /** 停止時に最後のスナップショットを書き込むか */
  flushOnStop?: boolean;
  /** resyncWindowMs の間に許す、板の不整合による再同期の回数。超えたらフィードの失敗として再接続する */
  maxResyncs?: number;
  resyncWindowMs?: number;
}

/**
 * アプリケーション層: 1シンボル分の板収集
 *
 * 責務:
 * - フィードに接続し、全量スナップショットで板を初期化してから差分を到着順に適用する
 * - 板の不整合は同じ接続のまま再同期、フィードの失敗はバックオフ後に再接続する
 * - 一定間隔で板のスナップショットを書き込む（書き込みは重ならない）
 *
 * run() は reject しない。終了理由は CollectorExit で返す。
 */
export class Collector {
  private readonly book: OrderBook;
  private readonly now: () => number;
  private readonly snapshotIntervalMs: number;
  private readonly flushOnStop: boolean;
  private readonly maxResyncs: number;
  private readonly resyncWindowMs: number;

  private health: CollectorHealth = 'idle';
  private lastError: Error | null = null;
  private updatesApplied = 0;
  private snapshotsWritten = 0;
  private lastSnapshotAt: number | null = null;
  private pendingWrite: Promise<void> | null = null;
  /** 不整合による再同期の時刻（resyncWindowMs より古いものは捨てる） */
  private resyncTimes: number[] = [];
  private started = false;

  constructor(
    private readonly deps: CollectorDeps,
    private readonly options: CollectorOptions = {}
  ) {
    this.book = new OrderBook(deps.feed.exchange, deps.symbol.value);
    this.now = deps.now ?? Date.now;
    this.snapshotIntervalMs = options.snapshotIntervalMs ?? 1000;
    this.flushOnStop = options.flushOnStop ?? true;
    this.maxResyncs = options.maxResyncs ?? 5;
    this.resyncWindowMs = options.resyncWindowMs ?? 60000;
  }

  get symbol(): string {
    return this.deps.symbol.value;
  }

  get status(): CollectorStatus {
    return {
      symbol: this.symbol,
      health: this.health,
      bookState: this.book.state,
      sequence: this.book.sequence,
      lastError: this.lastError?.message ?? null,
      updatesApplied: this.updatesApplied,
      snapshotsWritten: this.snapshotsWritten,
      lastSnapshotAt: this.lastSnapshotAt,
    };
  }

  async run(signal: AbortSignal): Promise<CollectorExit> {
    if (this.started) {
      return { status: 'failed', error: new CollectorServiceError(`collector for ${this.symbol} already started`) };
    }
    this.started = true;
    this.deps.logger.info('Collector started');

    const timer = setInterval(() => {
      void this.flush();
    }, this.snapshotIntervalMs);

    let exit: CollectorExit;
    try {
      exit = await this.supervise(signal);
    } catch (error) {
      exit = { status: 'failed', error: toError(error) };
    } finally {
      clearInterval(timer);
    }

    await this.pendingWrite;
    if (exit.status === 'stopped' && this.flushOnStop) {
      await this.flush();
    }

    this.health = exit.status;
    if (exit.status === 'failed') {
      this.lastError = exit.error;
      this.deps.logger.error('Collector failed', { err: exit.error });
    } else {
      this.deps.logger.info('Collector stopped');
    }
    return exit;
  }

  /**
   * 現在の板を1回書き込む。書き込み中、または書き込める状態でなければ何もしない。
   */
  async flush(): Promise<void> {
    if (this.pendingWrite) {
      return;
    }
    const state = this.book.state;
    if (state !== 'PARTIAL' && state !== 'CONSISTENT') {
      return;
    }

    const snapshot = this.book.snapshot({ depth: this.options.snapshotDepth, capturedAt: this.now() });
    const write = this.write(snapshot);
    this.pendingWrite = write;
    try {
      await write;
    } finally {
      if (this.pendingWrite === write) {
        this.pendingWrite = null;
      }
    }
  }

  private async supervise(signal: AbortSignal): Promise<CollectorExit> {
    while (!signal.aborted) {
      const failure = await this.attempt(signal);
      if (!failure) {
        break;
      }

      this.recordFailure(failure);
      this.health = 'reconnecting';
      const decision = await this.deps.retryPolicy.waitBeforeRetry(signal);
      if (decision === 'aborted') {
        break;
      }
      if (decision === 'exhausted') {
        return {
          status: 'failed',
          error: new FeedError(`${this.symbol} gave up after repeated feed failures`, { cause: failure }),
        };
      }
    }

    return { status: 'stopped' };
  }

  /**
   * 接続1回分。中断で終わった場合は null、失敗した場合はその原因を返す。
   */
  private async attempt(signal: AbortSignal): Promise<Error | null> {
    let connection: FeedConnection | null = null;
    try {
      this.health = 'connecting';
      connection = await this.deps.feed.connect(this.deps.symbol, signal);
      await this.stream(connection, signal);
      return null;
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        return null;
      }
      return toError(error);
    } finally {
      connection?.close();
    }
  }

  /**
   * 接続が使えなくなる（例外）まで差分を適用し続ける。
   */
  private async stream(connection: FeedConnection, signal: AbortSignal): Promise<void> {
    await this.resync(connection, 'initial', signal);
    // 直近に不整合が続いている間はバックオフと再試行の予算を持ち越す
    if (this.recentResyncs().length === 0) {
      this.deps.retryPolicy.reset();
    }

    for (;;) {
      const update = await connection.next(signal);
      try {
        if (this.book.apply(update) === 'applied') {
          this.updatesApplied += 1;
          this.deps.metricsCollector?.incrementUpdatesApplied(this.symbol);
        }
      } catch (error) {
        if (!(error instanceof BookConsistencyError)) {
          throw error;
        }
        this.admitResync(error);
        this.deps.logger.warn('Book inconsistent; resyncing', { reason: error.reason, err: error });
        await this.resync(connection, error.reason, signal);
      }
    }
  }

  private recentResyncs(): number[] {
    const now = this.now();
    this.resyncTimes = this.resyncTimes.filter((at) => now - at < this.resyncWindowMs);
    return this.resyncTimes;
  }

  /**
   * 不整合による再同期を1回記録する。
   * @throws {FeedError} resyncWindowMs の間に maxResyncs 回を超えた場合
   */
  private admitResync(cause: BookConsistencyError): void {
    const recent = this.recentResyncs();
    if (recent.length >= this.maxResyncs) {
      throw new FeedError(
        `${this.symbol} book went inconsistent more than ${this.maxResyncs} times within ${this.resyncWindowMs}ms`,
        { cause }
      );
    }
    recent.push(this.now());
  }

  private async resync(connection: FeedConnection, reason: string, signal: AbortSignal): Promise<void> {
    this.health = 'resyncing';
    // メトリクス収集: 再同期回数
    this.deps.metricsCollector?.incrementResync(this.symbol, reason);

    const snapshot = await connection.resync(signal);
    this.book.reset();
    this.book.apply(snapshot);

    this.health = 'streaming';
    this.deps.logger.info('Book synchronized', {
      reason,
      sequence: snapshot.sequence,
      bids: this.book.depth('bid'),
      asks: this.book.depth('ask'),
    });
  }

  private recordFailure(error: Error): void {
    this.lastError = error;
    this.deps.logger.warn('Feed failure', { err: error });
    // メトリクス収集: フィードエラー
    this.deps.metricsCollector?.incrementError('feed_error', this.symbol);
  }

  private async write(snapshot: OrderBookSnapshot): Promise<void> {
    try {
      await this.deps.persister.persist(snapshot);
      this.snapshotsWritten += 1;
      this.lastSnapshotAt = snapshot.capturedAt;
    } catch (error) {
      this.deps.logger.error('Snapshot write failed', { err: error });
    }
  }
}
