import { BookConsistencyError } from '@/domain/errors/CollectorErrors';
import type { ExchangeName } from './Exchange';
import type { OrderBookSnapshot, OrderBookState, PriceLevelTuple } from './OrderBookSnapshot';
import type { BookSide, DeltaUpdate, OrderBookUpdate, PriceLevel, SnapshotUpdate } from './OrderBookUpdate';

export type ApplyOutcome = 'applied' | 'stale';

/**
 * 板の片側。価格 → 数量の Map と、優先順に並べた価格配列を同期して持つ。
 * bids は降順、asks は昇順。
 */
class PriceLevels {
  private readonly quantities = new Map<number, number>();
  private readonly prices: number[] = [];

  constructor(private readonly order: 'asc' | 'desc') {}

  get size(): number {
    return this.prices.length;
  }

  best(): number | null {
    return this.prices.length > 0 ? this.prices[0] : null;
  }

  upsert(price: number, quantity: number): void {
    if (!this.quantities.has(price)) {
      this.prices.splice(this.lowerBound(price), 0, price);
    }
    this.quantities.set(price, quantity);
  }

  /**
   * 存在しない価格の削除は何もしない。
   */
  remove(price: number): void {
    if (!this.quantities.delete(price)) {
      return;
    }
    this.prices.splice(this.lowerBound(price), 1);
  }

  clear(): void {
    this.quantities.clear();
    this.prices.length = 0;
  }

  levels(depth?: number): PriceLevelTuple[] {
    const prices = depth === undefined ? this.prices : this.prices.slice(0, depth);
    return prices.map((price) => Object.freeze([price, this.quantities.get(price) ?? 0] as const));
  }

  private lowerBound(price: number): number {
    let lo = 0;
    let hi = this.prices.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.precedes(this.prices[mid], price)) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  private precedes(a: number, b: number): boolean {
    return this.order === 'asc' ? a < b : a > b;
  }
}

function isValidLevel(level: PriceLevel): boolean {
  return (
    Number.isFinite(level.price) && level.price > 0 && Number.isFinite(level.quantity) && level.quantity >= 0
  );
}

/**
 * ドメイン層: 1シンボル分の板（状態機械）
 *
 * 状態: EMPTY → PARTIAL（片側のみ）→ CONSISTENT（両側、非交差）
 * 交差・シーケンス欠落・別シンボルの更新を検知すると ANOMALOUS になる。
 * ANOMALOUS では reset() まですべての apply を拒否する。
 * 回復は取引所からの全量スナップショット（再同期）でのみ行う。
 */
export class OrderBook {
  private readonly bids = new PriceLevels('desc');
  private readonly asks = new PriceLevels('asc');
  private current: OrderBookState = 'EMPTY';
  private lastSequence: number | null = null;
  private lastUpdateTs: number | null = null;
  private anomaly: BookConsistencyError | null = null;

  constructor(
    readonly exchange: ExchangeName,
    readonly symbol: string
  ) {}

  get state(): OrderBookState {
    return this.current;
  }

  get sequence(): number | null {
    return this.lastSequence;
  }

  /**
   * ANOMALOUS に遷移した原因。それ以外の状態では null。
   */
  get lastAnomaly(): BookConsistencyError | null {
    return this.anomaly;
  }

  bestBid(): number | null {
    return this.bids.best();
  }

  bestAsk(): number | null {
    return this.asks.best();
  }

  depth(side: BookSide): number {
    return side === 'bid' ? this.bids.size : this.asks.size;
  }

  /**
   * 更新を到着順に適用する。
   * @returns 'applied' または既知のシーケンス以前の差分だった場合 'stale'
   * @throws {BookConsistencyError} ANOMALOUS への遷移時、または ANOMALOUS 中の適用
   */
  apply(update: OrderBookUpdate): ApplyOutcome {
    if (this.current === 'ANOMALOUS') {
      throw new BookConsistencyError('rejected', `${this.symbol} book is anomalous; resync required`, {
        cause: this.anomaly,
      });
    }
    if (update.symbol !== this.symbol) {
      this.flag('unknown-symbol', `update for ${update.symbol} applied to ${this.symbol} book`);
    }

    if (update.kind === 'snapshot') {
      this.applySnapshot(update);
    } else {
      if (this.isStale(update)) {
        return 'stale';
      }
      this.applyDelta(update);
    }

    this.lastUpdateTs = update.ts;
    this.settle();
    return 'applied';
  }

  /**
   * 再同期のために EMPTY へ戻す。
   */
  reset(): void {
    this.bids.clear();
    this.asks.clear();
    this.current = 'EMPTY';
    this.lastSequence = null;
    this.lastUpdateTs = null;
    this.anomaly = null;
  }

  /**
   * 現在の板のコピーを返す。状態は変更しない。
   * @param options.depth 片側あたりの最大レベル数（未指定なら全件）
   */
  snapshot(options: { depth?: number; capturedAt?: number } = {}): OrderBookSnapshot {
    return Object.freeze({
      exchange: this.exchange,
      symbol: this.symbol,
      capturedAt: options.capturedAt ?? Date.now(),
      updatedAt: this.lastUpdateTs,
      sequence: this.lastSequence,
      state: this.current,
      bids: Object.freeze(this.bids.levels(options.depth)),
      asks: Object.freeze(this.asks.levels(options.depth)),
    });
  }

  private applySnapshot(update: SnapshotUpdate): void {
    this.assertLevels([...update.bids, ...update.asks]);

    this.bids.clear();
    this.asks.clear();
    for (const level of update.bids) {
      if (level.quantity > 0) {
        this.bids.upsert(level.price, level.quantity);
      }
    }
    for (const level of update.asks) {
      if (level.quantity > 0) {
        this.asks.upsert(level.price, level.quantity);
      }
    }
    this.lastSequence = update.sequence;
  }

  private applyDelta(update: DeltaUpdate): void {
    const first = update.firstSequence ?? update.sequence;
    if (this.lastSequence !== null && first > this.lastSequence + 1) {
      this.flag('sequence-gap', `${this.symbol} expected sequence ${this.lastSequence + 1} but received ${first}`);
    }
    this.assertLevels(update.changes);

    for (const change of update.changes) {
      const side = change.side === 'bid' ? this.bids : this.asks;
      if (change.quantity === 0) {
        side.remove(change.price);
      } else {
        side.upsert(change.price, change.quantity);
      }
    }
    this.lastSequence = update.sequence;
  }

  private isStale(update: DeltaUpdate): boolean {
    return this.lastSequence !== null && update.sequence <= this.lastSequence;
  }

  private assertLevels(levels: readonly PriceLevel[]): void {
    const invalid = levels.find((level) => !isValidLevel(level));
    if (invalid) {
      this.flag('invalid-level', `${this.symbol} received invalid level ${invalid.price}@${invalid.quantity}`);
    }
  }

  private settle(): void {
    const bid = this.bids.best();
    const ask = this.asks.best();

    if (bid !== null && ask !== null) {
      if (bid >= ask) {
        this.flag('crossed', `${this.symbol} book crossed: best bid ${bid} >= best ask ${ask}`);
      }
      this.current = 'CONSISTENT';
    } else if (bid !== null || ask !== null) {
      this.current = 'PARTIAL';
    } else {
      this.current = 'EMPTY';
    }
  }

  private flag(reason: BookConsistencyError['reason'], message: string): never {
    const error = new BookConsistencyError(reason, message);
    this.current = 'ANOMALOUS';
    this.anomaly = error;
    throw error;
  }
}
