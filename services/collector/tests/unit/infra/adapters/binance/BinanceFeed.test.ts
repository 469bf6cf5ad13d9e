import { FakeWebSocketConnection } from '@test/unit/helpers/fakes/FakeWebSocketConnection';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { FeedConnection } from '@/application/interfaces/ExchangeFeed';
import { AbortError, FeedError } from '@/domain/errors/CollectorErrors';
import { parseTickerSymbol, type TickerSymbol } from '@/domain/models/TickerSymbol';
import { BinanceFeed, toBinancePair } from '@/infra/adapters/binance/BinanceFeed';

function ticker(value: string): TickerSymbol {
  const symbol = parseTickerSymbol(value);
  if (!symbol) {
    throw new Error(`invalid test symbol ${value}`);
  }
  return symbol;
}

function depthUpdate(U: number, u: number) {
  return { e: 'depthUpdate', E: 1_700_000_000_000 + u, s: 'BTCUSDT', U, u, b: [['100.0', '1.0']], a: [] };
}

/**
 * 単体テスト: BinanceFeed
 *
 * WebSocket は FakeWebSocketConnection、REST は get のモックで置き換える。
 */
describe('BinanceFeed', () => {
  let socket: FakeWebSocketConnection;
  let connect: ReturnType<typeof vi.fn>;
  let get: ReturnType<typeof vi.fn>;
  let loggerMock: LoggerMock;
  let feed: BinanceFeed;
  let controller: AbortController;

  beforeEach(() => {
    socket = new FakeWebSocketConnection();
    connect = vi.fn().mockResolvedValue(socket);
    get = vi.fn();
    loggerMock = new LoggerMock();
    controller = new AbortController();
    feed = new BinanceFeed({ client: { connect }, http: { get }, logger: loggerMock });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('BASE と QUOTE を連結したペア名を使う', () => {
    expect(toBinancePair(ticker('btc_usdt'))).toBe('BTCUSDT');
  });

  describe('connect()', () => {
    it('差分板ストリームの URL に接続する', async () => {
      const connection = await feed.connect(ticker('BTC_USDT'), controller.signal);

      expect(connect).toHaveBeenCalledWith('wss://stream.binance.com:9443/ws/btcusdt@depth@100ms');
      connection.close();
    });

    it('中断済みなら接続しない', async () => {
      controller.abort();

      await expect(feed.connect(ticker('BTC_USDT'), controller.signal)).rejects.toBeInstanceOf(AbortError);
      expect(connect).not.toHaveBeenCalled();
    });

    it('接続失敗はそのまま伝える', async () => {
      connect.mockRejectedValue(new FeedError('WebSocket connection failed'));

      await expect(feed.connect(ticker('BTC_USDT'), controller.signal)).rejects.toThrow('WebSocket connection failed');
    });
  });

  describe('next()', () => {
    let connection: FeedConnection;

    beforeEach(async () => {
      connection = await feed.connect(ticker('BTC_USDT'), controller.signal);
    });

    afterEach(() => {
      connection.close();
    });

    it('受信した差分を到着順に返す', async () => {
      socket.emitMessage(depthUpdate(1, 2));
      socket.emitMessage(depthUpdate(3, 4));

      const first = await connection.next(controller.signal);
      const second = await connection.next(controller.signal);

      expect(first).toEqual({
        kind: 'delta',
        symbol: 'BTC_USDT',
        firstSequence: 1,
        sequence: 2,
        ts: 1_700_000_000_002,
        changes: [{ side: 'bid', price: 100, quantity: 1 }],
      });
      expect(second.kind === 'delta' && second.sequence).toBe(4);
    });

    it('購読応答は読み飛ばす', async () => {
      socket.emitMessage({ result: null, id: 1 });
      socket.emitMessage(depthUpdate(1, 2));

      const update = await connection.next(controller.signal);

      expect(update.kind === 'delta' && update.sequence).toBe(2);
    });

    it('ソケットが閉じたら FeedError', async () => {
      const pending = connection.next(controller.signal);
      socket.emitClose(1006);

      await expect(pending).rejects.toThrow('Binance stream closed for BTCUSDT (code 1006)');
    });

    it('ソケットのエラーは FeedError として原因を保持する', async () => {
      const cause = new Error('ECONNRESET');
      socket.emitError(cause);

      const error = await connection.next(controller.signal).then(
        () => null,
        (reason: unknown) => reason
      );

      expect(error).toBeInstanceOf(FeedError);
      expect(error instanceof FeedError && error.cause).toBe(cause);
    });

    it('形式が不正なメッセージで接続を失敗させる', async () => {
      socket.emitMessage('{"e":"depthUpdate"}');

      await expect(connection.next(controller.signal)).rejects.toBeInstanceOf(FeedError);
    });

    it('中断されたら AbortError', async () => {
      const pending = connection.next(controller.signal);
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(AbortError);
    });
  });

  describe('resync()', () => {
    it('REST の板スナップショットを取得し、lastUpdateId をシーケンスにする', async () => {
      get.mockResolvedValue({ data: { lastUpdateId: 500, bids: [['99.5', '2']], asks: [['100.5', '3']] } });
      const connection = await feed.connect(ticker('BTC_USDT'), controller.signal);

      const snapshot = await connection.resync(controller.signal);

      expect(get).toHaveBeenCalledWith('https://api.binance.com/api/v3/depth', {
        params: { symbol: 'BTCUSDT', limit: 1000 },
        signal: controller.signal,
      });
      expect(snapshot.sequence).toBe(500);
      expect(snapshot.bids).toEqual([{ price: 99.5, quantity: 2 }]);
      expect(snapshot.asks).toEqual([{ price: 100.5, quantity: 3 }]);
      connection.close();
    });

    it('スナップショット取得中に届いた差分はバッファに残る', async () => {
      let respond: (value: unknown) => void = () => undefined;
      get.mockReturnValue(
        new Promise((resolve) => {
          respond = resolve;
        })
      );
      const connection = await feed.connect(ticker('BTC_USDT'), controller.signal);

      const pending = connection.resync(controller.signal);
      socket.emitMessage(depthUpdate(499, 501));
      respond({ data: { lastUpdateId: 500, bids: [], asks: [] } });
      await pending;

      const update = await connection.next(controller.signal);
      expect(update.kind === 'delta' && update.firstSequence).toBe(499);
      connection.close();
    });

    it('HTTP エラーは FeedError', async () => {
      get.mockRejectedValue(new Error('Request failed with status code 429'));
      const connection = await feed.connect(ticker('BTC_USDT'), controller.signal);

      await expect(connection.resync(controller.signal)).rejects.toThrow('Binance depth snapshot request failed for BTCUSDT');
      connection.close();
    });

    it('取得中に中断されたら AbortError で終わる', async () => {
      get.mockImplementation(
        (_url: string, config: { signal: AbortSignal }) =>
          new Promise((_resolve, reject) => {
            config.signal.addEventListener('abort', () => reject(new Error('canceled')), { once: true });
          })
      );
      const connection = await feed.connect(ticker('BTC_USDT'), controller.signal);

      const pending = connection.resync(controller.signal);
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(AbortError);
      connection.close();
    });

    it('snapshotLimit を指定できる', async () => {
      get.mockResolvedValue({ data: { lastUpdateId: 1, bids: [], asks: [] } });
      const limited = new BinanceFeed({ client: { connect }, http: { get }, logger: loggerMock, snapshotLimit: 100 });
      const connection = await limited.connect(ticker('ETH_USDT'), controller.signal);

      await connection.resync(controller.signal);

      expect(get).toHaveBeenCalledWith('https://api.binance.com/api/v3/depth', {
        params: { symbol: 'ETHUSDT', limit: 100 },
        signal: controller.signal,
      });
      connection.close();
    });
  });

  describe('無通信の検知', () => {
    it('staleTimeoutMs を超えてメッセージがなければ FeedError', async () => {
      vi.useFakeTimers();
      const stale = new BinanceFeed({
        client: { connect },
        http: { get },
        logger: loggerMock,
        staleTimeoutMs: 1000,
        now: () => Date.now(),
      });
      const connection = await stale.connect(ticker('BTC_USDT'), controller.signal);

      const assertion = expect(connection.next(controller.signal)).rejects.toThrow(
        'Binance stream for BTCUSDT silent for 2000ms'
      );
      await vi.advanceTimersByTimeAsync(2000);
      await assertion;
      connection.close();
    });

    it('メッセージが届いている間は失敗しない', async () => {
      vi.useFakeTimers();
      const stale = new BinanceFeed({
        client: { connect },
        http: { get },
        logger: loggerMock,
        staleTimeoutMs: 1000,
        now: () => Date.now(),
      });
      const connection = await stale.connect(ticker('BTC_USDT'), controller.signal);

      for (let u = 1; u <= 4; u++) {
        await vi.advanceTimersByTimeAsync(600);
        socket.emitMessage(depthUpdate(u, u));
      }

      for (let u = 1; u <= 4; u++) {
        const update = await connection.next(controller.signal);
        expect(update.kind === 'delta' && update.sequence).toBe(u);
      }
      connection.close();
    });
  });

  describe('close()', () => {
    it('リスナーを外してソケットを閉じ、タイマーを止める', async () => {
      vi.useFakeTimers();
      const connection = await feed.connect(ticker('BTC_USDT'), controller.signal);
      expect(vi.getTimerCount()).toBe(1);

      connection.close();
      connection.close();

      expect(socket.closed).toBe(true);
      expect(socket.listenerCount).toBe(0);
      expect(vi.getTimerCount()).toBe(0);
      await expect(connection.next(controller.signal)).rejects.toThrow('Binance connection for BTCUSDT closed');
    });
  });
});
