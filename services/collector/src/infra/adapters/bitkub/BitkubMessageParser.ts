import { FeedError } from '@/domain/errors/CollectorErrors';
import type { SnapshotUpdate } from '@/domain/models/OrderBookUpdate';
import { describeZodError } from '@/shared/zod';
import { BitkubDepthSchema } from './types/BitkubRawMessage';

/**
 * インフラ層: Bitkub の板レスポンスのパース処理
 */
export class BitkubMessageParser {
  /**
   * 板レスポンスを SnapshotUpdate に変換する。Bitkub の板にはシーケンス番号がない。
   * @throws {FeedError} エラーコード付きのレスポンス、または形式不正
   */
  parseDepth(body: unknown, symbol: string, ts: number): SnapshotUpdate {
    if (typeof body === 'object' && body !== null && 'error' in body && body.error !== 0) {
      throw new FeedError(`Bitkub depth request for ${symbol} returned error code ${String(body.error)}`);
    }

    const parsed = BitkubDepthSchema.safeParse(body);
    if (!parsed.success) {
      throw new FeedError(`malformed Bitkub depth response: ${describeZodError(parsed.error)}`);
    }

    return {
      kind: 'snapshot',
      symbol,
      sequence: null,
      ts,
      bids: parsed.data.bids,
      asks: parsed.data.asks,
    };
  }
}
