import { z } from 'zod';

/**
 * [価格, 数量]。数値でも数値文字列でも受け付ける。
 */
const BitkubLevelSchema = z
  .tuple([z.coerce.number().positive(), z.coerce.number().nonnegative()])
  .rest(z.unknown())
  .transform(([price, quantity]) => ({ price, quantity }));

/**
 * GET /api/market/depth のレスポンス
 * シンボルが不正な場合は {"error": 11, "result": null} が返る。
 */
export const BitkubDepthSchema = z.object({
  error: z.number().optional(),
  asks: z.array(BitkubLevelSchema),
  bids: z.array(BitkubLevelSchema),
});
