import type { ExchangeName } from './Exchange';

export type OrderBookState = 'EMPTY' | 'PARTIAL' | 'CONSISTENT' | 'ANOMALOUS';

/** [価格, 数量] */
export type PriceLevelTuple = readonly [price: number, quantity: number];

/**
 * ある時点の板のコピー。Collector が生成し、Persister が書き込んだら破棄する。
 */
export interface OrderBookSnapshot {
  readonly exchange: ExchangeName;
  readonly symbol: string;
  /** スナップショット取得時刻（エポックミリ秒） */
  readonly capturedAt: number;
  /** 最後に適用した更新のタイムスタンプ */
  readonly updatedAt: number | null;
  readonly sequence: number | null;
  readonly state: OrderBookState;
  /** 価格の高い順 */
  readonly bids: readonly PriceLevelTuple[];
  /** 価格の安い順 */
  readonly asks: readonly PriceLevelTuple[];
}
