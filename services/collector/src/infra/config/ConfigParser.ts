import { z } from 'zod';
import { ConfigError } from '@/domain/errors/CollectorErrors';
import type { CollectorConfig } from '@/domain/models/CollectorConfig';
import { EXCHANGES, isExchangeName } from '@/domain/models/Exchange';
import { parseTickerSymbol } from '@/domain/models/TickerSymbol';
import { describeZodError } from '@/shared/zod';

/**
 * 設定ファイルの形式: { "cex": "BINANCE", "tickers": ["BTC_USDT", ...] }
 */
const ConfigFileSchema = z.object({
  cex: z.string().transform((value) => value.trim().toUpperCase()),
  tickers: z.array(z.string().transform((value) => value.trim().toUpperCase())),
});

export type ConfigParseResult =
  | { ok: true; config: CollectorConfig; skipped: string[] }
  | { ok: false; error: ConfigError };

/**
 * 設定ファイルの内容をパースする。
 * 形式が不正なティッカーは読み飛ばし、skipped に入れて返す。
 */
export function parseCollectorConfig(raw: string): ConfigParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return { ok: false, error: new ConfigError('config file is not valid JSON', { cause: error }) };
  }

  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: new ConfigError(`config file is malformed: ${describeZodError(parsed.error)}`) };
  }

  const { cex, tickers } = parsed.data;
  if (!isExchangeName(cex)) {
    return {
      ok: false,
      error: new ConfigError(`unsupported exchange "${cex}" (expected one of ${EXCHANGES.join(', ')})`),
    };
  }

  const symbols = new Set<string>();
  const skipped: string[] = [];
  for (const ticker of tickers) {
    if (parseTickerSymbol(ticker)) {
      symbols.add(ticker);
    } else {
      skipped.push(ticker);
    }
  }

  return { ok: true, config: { exchange: cex, symbols }, skipped };
}
