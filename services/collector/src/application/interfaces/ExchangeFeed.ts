import type { ExchangeName } from '@/domain/models/Exchange';
import type { OrderBookUpdate, SnapshotUpdate } from '@/domain/models/OrderBookUpdate';
import type { TickerSymbol } from '@/domain/models/TickerSymbol';

/**
 * 1シンボル分の取引所接続。
 */
export interface FeedConnection {
  /**
   * 次の更新を到着順に取り出す。
   * @throws {FeedError} 接続断・不正メッセージなど、この接続が使えなくなった場合
   * @throws {AbortError} signal が中断された場合
   */
  next(signal: AbortSignal): Promise<OrderBookUpdate>;

  /**
   * 全量スナップショットを取得する（ANOMALOUS からの回復、および接続直後の初期化）。
   * @throws {FeedError}
   * @throws {AbortError} 取得中に signal が中断された場合
   */
  resync(signal: AbortSignal): Promise<SnapshotUpdate>;

  /**
   * 接続を解放する。複数回呼んでもよい。
   */
  close(): void;
}

/**
 * アプリケーション層: 取引所フィードの共通インターフェイス
 *
 * 取引所ごとの実装（Binance, Bitkub）は起動時に一度だけ選ばれる。
 */
export interface ExchangeFeed {
  readonly exchange: ExchangeName;

  /**
   * シンボルの更新ストリームに接続する。
   * @throws {FeedError} 接続できなかった場合
   */
  connect(symbol: TickerSymbol, signal: AbortSignal): Promise<FeedConnection>;
}
