import { z } from 'zod';

/**
 * Binance は価格・数量を10進文字列で返す。
 */
const DecimalString = z
  .string()
  .regex(/^\d+(\.\d+)?$/, 'expected a decimal string')
  .transform(Number);

/**
 * ["価格", "数量"]
 */
const BinanceLevelSchema = z
  .tuple([DecimalString, DecimalString])
  .transform(([price, quantity]) => ({ price, quantity }));

/**
 * 差分板イベント（<symbol>@depth@100ms）
 * U: このイベントに含まれる最初の更新 ID、u: 最後の更新 ID
 */
export const BinanceDepthUpdateSchema = z.object({
  e: z.literal('depthUpdate'),
  E: z.number(),
  s: z.string(),
  U: z.number().int(),
  u: z.number().int(),
  b: z.array(BinanceLevelSchema),
  a: z.array(BinanceLevelSchema),
});

/**
 * REST /api/v3/depth のレスポンス
 */
export const BinanceDepthSnapshotSchema = z.object({
  lastUpdateId: z.number().int(),
  bids: z.array(BinanceLevelSchema),
  asks: z.array(BinanceLevelSchema),
});
