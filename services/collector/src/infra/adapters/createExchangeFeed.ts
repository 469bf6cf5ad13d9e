import type { ExchangeFeed } from '@/application/interfaces/ExchangeFeed';
import type { Logger } from '@/application/interfaces/Logger';
import type { ExchangeName } from '@/domain/models/Exchange';
import { BinanceFeed } from './binance/BinanceFeed';
import { BitkubFeed } from './bitkub/BitkubFeed';

/**
 * 取引所名からフィード実装を選ぶ。起動時に一度だけ呼ばれる。
 */
export function createExchangeFeed(exchange: ExchangeName, logger: Logger): ExchangeFeed {
  switch (exchange) {
    case 'BINANCE':
      return new BinanceFeed({ logger: logger.child({ component: 'BinanceFeed' }) });
    case 'BITKUB':
      return new BitkubFeed({ logger: logger.child({ component: 'BitkubFeed' }) });
  }
}
