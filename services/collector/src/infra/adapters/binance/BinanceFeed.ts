import type { AxiosInstance } from 'axios';
import axios from 'axios';
import type { ExchangeFeed, FeedConnection } from '@/application/interfaces/ExchangeFeed';
import type { Logger } from '@/application/interfaces/Logger';
import { AbortError, FeedError, toError } from '@/domain/errors/CollectorErrors';
import type { OrderBookUpdate, SnapshotUpdate } from '@/domain/models/OrderBookUpdate';
import type { TickerSymbol } from '@/domain/models/TickerSymbol';
import { UpdateQueue } from '@/infra/adapters/UpdateQueue';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { WebSocketConnection } from '@/infra/websocket/interfaces/WebSocketConnection';
import { WebSocketClient } from '@/infra/websocket/WebSocketClient';
import { BinanceMessageParser } from './BinanceMessageParser';

export const BINANCE_WS_URL = 'wss://stream.binance.com:9443/ws';
export const BINANCE_REST_URL = 'https://api.binance.com';

/**
 * BinanceFeed の初期化オプション
 */
export interface BinanceFeedOptions {
  wsUrl?: string;
  restUrl?: string;
  /** 再同期時に取得する板の深さ（Binance 推奨は 1000） */
  snapshotLimit?: number;
  /** この時間メッセージが届かなければ接続を失敗扱いにする */
  staleTimeoutMs?: number;
  /** 再同期中に溜められる差分の上限 */
  bufferCapacity?: number;
  http?: Pick<AxiosInstance, 'get'>;
  client?: Pick<WebSocketClient, 'connect'>;
  logger?: Logger;
  now?: () => number;
}

/**
 * 'BTC_USDT' → 'BTCUSDT'
 */
export function toBinancePair(symbol: TickerSymbol): string {
  return `${symbol.base}${symbol.quote}`.toUpperCase();
}

interface BinanceConnectionDeps {
  symbol: string;
  pair: string;
  socket: WebSocketConnection;
  http: Pick<AxiosInstance, 'get'>;
  restUrl: string;
  snapshotLimit: number;
  staleTimeoutMs: number;
  bufferCapacity: number;
  parser: BinanceMessageParser;
  logger: Logger;
  now: () => number;
}

/**
 * インフラ層: ExchangeFeed 実装（Binance 現物）
 *
 * 責務: 差分板ストリーム（WebSocket）を購読し、再同期は REST の板スナップショットで行う。
 * スナップショット取得中に届いた差分はバッファに残り、古いものは板側で読み捨てられる。
 */
export class BinanceFeed implements ExchangeFeed {
  readonly exchange = 'BINANCE' as const;

  private readonly wsUrl: string;
  private readonly restUrl: string;
  private readonly http: Pick<AxiosInstance, 'get'>;
  private readonly client: Pick<WebSocketClient, 'connect'>;
  private readonly parser = new BinanceMessageParser();
  private readonly logger: Logger;

  constructor(private readonly options: BinanceFeedOptions = {}) {
    this.wsUrl = options.wsUrl ?? BINANCE_WS_URL;
    this.restUrl = options.restUrl ?? BINANCE_REST_URL;
    this.http = options.http ?? axios.create({ timeout: 10000 });
    this.client = options.client ?? new WebSocketClient();
    this.logger = options.logger ?? LoggerFactory.forComponent('BinanceFeed');
  }

  async connect(symbol: TickerSymbol, signal: AbortSignal): Promise<FeedConnection> {
    if (signal.aborted) {
      throw new AbortError();
    }

    const pair = toBinancePair(symbol);
    const socket = await this.client.connect(`${this.wsUrl}/${pair.toLowerCase()}@depth@100ms`);
    const logger = this.logger.child({ symbol: symbol.value });
    logger.info('Depth stream connected', { pair });

    if (signal.aborted) {
      socket.close();
      throw new AbortError();
    }

    return new BinanceFeedConnection({
      symbol: symbol.value,
      pair,
      socket,
      http: this.http,
      restUrl: this.restUrl,
      snapshotLimit: this.options.snapshotLimit ?? 1000,
      staleTimeoutMs: this.options.staleTimeoutMs ?? 60000,
      bufferCapacity: this.options.bufferCapacity ?? 10000,
      parser: this.parser,
      logger,
      now: this.options.now ?? Date.now,
    });
  }
}

class BinanceFeedConnection implements FeedConnection {
  private readonly queue: UpdateQueue<OrderBookUpdate>;
  private readonly staleTimer: NodeJS.Timeout;
  private lastMessageAt: number;
  private closed = false;

  constructor(private readonly deps: BinanceConnectionDeps) {
    this.queue = new UpdateQueue(deps.bufferCapacity);
    this.lastMessageAt = deps.now();

    deps.socket.onMessage((data) => {
      this.handleMessage(data);
    });

    deps.socket.onClose((code, reason) => {
      deps.logger.warn('socket closed', { code, reason });
      this.queue.fail(new FeedError(`Binance stream closed for ${deps.pair} (code ${code})`));
    });

    deps.socket.onError((error) => {
      deps.logger.error('socket error', { err: error });
      this.queue.fail(new FeedError(`Binance stream error for ${deps.pair}`, { cause: error }));
    });

    this.staleTimer = setInterval(() => {
      this.checkStale();
    }, Math.min(deps.staleTimeoutMs, 10000));
  }

  next(signal: AbortSignal): Promise<OrderBookUpdate> {
    return this.queue.next(signal);
  }

  async resync(signal: AbortSignal): Promise<SnapshotUpdate> {
    if (signal.aborted) {
      throw new AbortError();
    }
    const { http, restUrl, pair, snapshotLimit, parser, symbol, now } = this.deps;
    let body: unknown;
    try {
      const response = await http.get<unknown>(`${restUrl}/api/v3/depth`, {
        params: { symbol: pair, limit: snapshotLimit },
        signal,
      });
      body = response.data;
    } catch (error) {
      if (signal.aborted) {
        throw new AbortError();
      }
      throw new FeedError(`Binance depth snapshot request failed for ${pair}`, { cause: error });
    }
    return parser.parseDepthSnapshot(body, symbol, now());
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    clearInterval(this.staleTimer);
    this.deps.socket.removeAllListeners();
    this.deps.socket.close();
    this.queue.fail(new FeedError(`Binance connection for ${this.deps.pair} closed`));
  }

  private handleMessage(data: string): void {
    this.lastMessageAt = this.deps.now();
    try {
      const update = this.deps.parser.parseDepthUpdate(data, this.deps.pair, this.deps.symbol);
      if (update) {
        this.queue.push(update);
      }
    } catch (error) {
      this.queue.fail(toError(error));
    }
  }

  private checkStale(): void {
    const silentFor = this.deps.now() - this.lastMessageAt;
    if (silentFor > this.deps.staleTimeoutMs) {
      this.queue.fail(new FeedError(`Binance stream for ${this.deps.pair} silent for ${silentFor}ms`));
    }
  }
}
