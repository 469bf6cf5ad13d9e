import type { AxiosInstance } from 'axios';
import axios from 'axios';
import type { ExchangeFeed, FeedConnection } from '@/application/interfaces/ExchangeFeed';
import type { Logger } from '@/application/interfaces/Logger';
import { AbortError, FeedError } from '@/domain/errors/CollectorErrors';
import type { SnapshotUpdate } from '@/domain/models/OrderBookUpdate';
import type { TickerSymbol } from '@/domain/models/TickerSymbol';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { sleep } from '@/shared/sleep';
import { BitkubMessageParser } from './BitkubMessageParser';

export const BITKUB_REST_URL = 'https://api.bitkub.com';

export interface BitkubFeedOptions {
  restUrl?: string;
  /** 取得する板の深さ（lmt） */
  depth?: number;
  /** ポーリング間隔。壁時計の境界に揃えて取得する */
  pollIntervalMs?: number;
  http?: Pick<AxiosInstance, 'get'>;
  logger?: Logger;
  now?: () => number;
}

/**
 * 'BTC_THB' → 'THB_BTC'
 */
export function toBitkubPair(symbol: TickerSymbol): string {
  return `${symbol.quote}_${symbol.base}`.toUpperCase();
}

/**
 * 次のポーリング境界までの待ち時間
 */
export function delayUntilNextTick(now: number, intervalMs: number): number {
  const remainder = now % intervalMs;
  return remainder === 0 ? intervalMs : intervalMs - remainder;
}

interface BitkubConnectionDeps {
  symbol: string;
  pair: string;
  http: Pick<AxiosInstance, 'get'>;
  restUrl: string;
  depth: number;
  pollIntervalMs: number;
  parser: BitkubMessageParser;
  now: () => number;
}

/**
 * インフラ層: ExchangeFeed 実装（Bitkub）
 *
 * 責務: REST の板エンドポイントを一定間隔でポーリングし、毎回全量スナップショットとして返す。
 */
export class BitkubFeed implements ExchangeFeed {
  readonly exchange = 'BITKUB' as const;

  private readonly http: Pick<AxiosInstance, 'get'>;
  private readonly parser = new BitkubMessageParser();
  private readonly logger: Logger;

  constructor(private readonly options: BitkubFeedOptions = {}) {
    this.http = options.http ?? axios.create({ timeout: 10000 });
    this.logger = options.logger ?? LoggerFactory.forComponent('BitkubFeed');
  }

  async connect(symbol: TickerSymbol, signal: AbortSignal): Promise<FeedConnection> {
    if (signal.aborted) {
      throw new AbortError();
    }

    const pair = toBitkubPair(symbol);
    this.logger.info('Depth polling started', { symbol: symbol.value, pair });

    return new BitkubFeedConnection({
      symbol: symbol.value,
      pair,
      http: this.http,
      restUrl: this.options.restUrl ?? BITKUB_REST_URL,
      depth: this.options.depth ?? 10,
      pollIntervalMs: this.options.pollIntervalMs ?? 2000,
      parser: this.parser,
      now: this.options.now ?? Date.now,
    });
  }
}

class BitkubFeedConnection implements FeedConnection {
  private closed = false;

  constructor(private readonly deps: BitkubConnectionDeps) {}

  async next(signal: AbortSignal): Promise<SnapshotUpdate> {
    await sleep(delayUntilNextTick(this.deps.now(), this.deps.pollIntervalMs), signal);
    return await this.fetchDepth(signal);
  }

  resync(signal: AbortSignal): Promise<SnapshotUpdate> {
    return this.fetchDepth(signal);
  }

  close(): void {
    this.closed = true;
  }

  private async fetchDepth(signal: AbortSignal): Promise<SnapshotUpdate> {
    if (this.closed) {
      throw new FeedError(`Bitkub connection for ${this.deps.pair} closed`);
    }
    if (signal.aborted) {
      throw new AbortError();
    }

    const { http, restUrl, pair, depth, parser, symbol, now } = this.deps;
    let body: unknown;
    try {
      const response = await http.get<unknown>(`${restUrl}/api/market/depth`, {
        params: { sym: pair, lmt: depth },
        signal,
      });
      body = response.data;
    } catch (error) {
      if (signal.aborted) {
        throw new AbortError();
      }
      throw new FeedError(`Bitkub depth request failed for ${pair}`, { cause: error });
    }
    return parser.parseDepth(body, symbol, now());
  }
}
