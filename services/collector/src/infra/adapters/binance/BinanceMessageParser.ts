import { FeedError } from '@/domain/errors/CollectorErrors';
import type { DeltaUpdate, LevelChange, SnapshotUpdate } from '@/domain/models/OrderBookUpdate';
import { describeZodError } from '@/shared/zod';
import { BinanceDepthSnapshotSchema, BinanceDepthUpdateSchema } from './types/BinanceRawMessage';

/**
 * インフラ層: Binance メッセージ形式のパース処理
 *
 * 責務: Binance の生メッセージ → OrderBookUpdate への変換。
 * 形式が不正なメッセージは FeedError にする（接続をやり直して再同期する）。
 */
export class BinanceMessageParser {
  /**
   * 差分板イベントを DeltaUpdate に変換する。
   * @param text WebSocket で受信したテキスト
   * @param pair 購読中のペア（例: 'BTCUSDT'）
   * @param symbol 設定上のシンボル（例: 'BTC_USDT'）
   * @returns 購読応答など板と無関係のメッセージは null
   */
  parseDepthUpdate(text: string, pair: string, symbol: string): DeltaUpdate | null {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new FeedError(`Binance message is not valid JSON: ${text.slice(0, 200)}`, { cause: error });
    }

    // {"result":null,"id":1} のような購読応答は無視する
    if (typeof json === 'object' && json !== null && 'id' in json && 'result' in json) {
      return null;
    }

    const parsed = BinanceDepthUpdateSchema.safeParse(json);
    if (!parsed.success) {
      throw new FeedError(`malformed Binance depth update: ${describeZodError(parsed.error)}`);
    }

    const event = parsed.data;
    const changes: LevelChange[] = [
      ...event.b.map((level) => ({ side: 'bid' as const, ...level })),
      ...event.a.map((level) => ({ side: 'ask' as const, ...level })),
    ];

    return {
      kind: 'delta',
      // 別ペアのイベントはそのまま渡し、板側で unknown-symbol として検知させる
      symbol: event.s.toUpperCase() === pair ? symbol : event.s,
      firstSequence: event.U,
      sequence: event.u,
      ts: event.E,
      changes,
    };
  }

  /**
   * REST の板スナップショットを SnapshotUpdate に変換する。
   * @param ts 取得時刻（レスポンスにタイムスタンプが含まれないため）
   */
  parseDepthSnapshot(body: unknown, symbol: string, ts: number): SnapshotUpdate {
    const parsed = BinanceDepthSnapshotSchema.safeParse(body);
    if (!parsed.success) {
      throw new FeedError(`malformed Binance depth snapshot: ${describeZodError(parsed.error)}`);
    }

    return {
      kind: 'snapshot',
      symbol,
      sequence: parsed.data.lastUpdateId,
      ts,
      bids: parsed.data.bids,
      asks: parsed.data.asks,
    };
  }
}
