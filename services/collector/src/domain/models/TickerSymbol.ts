/**
 * 取引ペア（例: 'BTC_USDT'）。base と quote に分解して保持する。
 * 取引所ごとの表記（BTCUSDT, THB_BTC など）はアダプタ側で組み立てる。
 */
export interface TickerSymbol {
  readonly base: string;
  readonly quote: string;
  /** 設定ファイル上の表記（'BASE_QUOTE'） */
  readonly value: string;
}

const SYMBOL_PATTERN = /^([A-Za-z0-9]+)_([A-Za-z0-9]+)$/;

/**
 * 'BASE_QUOTE' 形式の文字列をパースする。
 * @returns 形式が不正な場合は null
 */
export function parseTickerSymbol(value: string): TickerSymbol | null {
  const match = SYMBOL_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const [, base, quote] = match;
  return { base, quote, value };
}
