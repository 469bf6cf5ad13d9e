/**
 * 対応取引所の列挙。プロセス起動時に一度だけ選ばれ、実行中は切り替えない。
 */
export const EXCHANGES = ['BINANCE', 'BITKUB'] as const;

export type ExchangeName = (typeof EXCHANGES)[number];

export function isExchangeName(value: string): value is ExchangeName {
  return (EXCHANGES as readonly string[]).includes(value);
}
