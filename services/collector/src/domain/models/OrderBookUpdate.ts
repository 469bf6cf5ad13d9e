/**
 * 板の片側
 */
export type BookSide = 'bid' | 'ask';

export interface PriceLevel {
  readonly price: number;
  readonly quantity: number;
}

/**
 * 差分更新の1件。quantity が 0 の場合はその価格帯を削除する。
 */
export interface LevelChange extends PriceLevel {
  readonly side: BookSide;
}

/**
 * 全量スナップショット。適用すると両サイドを置き換える。
 * sequence を持たない取引所（REST ポーリング）は null。
 */
export interface SnapshotUpdate {
  readonly kind: 'snapshot';
  readonly symbol: string;
  readonly sequence: number | null;
  /** 取引所側のタイムスタンプ（エポックミリ秒） */
  readonly ts: number;
  readonly bids: readonly PriceLevel[];
  readonly asks: readonly PriceLevel[];
}

/**
 * 差分更新。firstSequence..sequence の範囲をまとめて運ぶ取引所（Binance の U..u）に対応する。
 */
export interface DeltaUpdate {
  readonly kind: 'delta';
  readonly symbol: string;
  readonly firstSequence?: number;
  readonly sequence: number;
  readonly ts: number;
  readonly changes: readonly LevelChange[];
}

export type OrderBookUpdate = SnapshotUpdate | DeltaUpdate;
