import type { ExchangeName } from './Exchange';

/**
 * 収集対象の設定。exchange はプロセス生存中固定、symbols は再読み込みで変化する。
 */
export interface CollectorConfig {
  readonly exchange: ExchangeName;
  readonly symbols: ReadonlySet<string>;
}

export function sameSymbols(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const symbol of a) {
    if (!b.has(symbol)) {
      return false;
    }
  }
  return true;
}
