import { mkdtemp, readdir, readFile, rm, writeFile, mkdir } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { createMetricsCollectorMock, type MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PersistenceError } from '@/domain/errors/CollectorErrors';
import { OrderBook } from '@/domain/models/OrderBook';
import type { OrderBookSnapshot } from '@/domain/models/OrderBookSnapshot';
import { FileSnapshotPersister } from '@/infra/storage/FileSnapshotPersister';

function sampleSnapshot(symbol = 'BTC_USDT', capturedAt = 1_700_000_000_000): OrderBookSnapshot {
  const book = new OrderBook('BINANCE', symbol);
  book.apply({
    kind: 'snapshot',
    symbol,
    sequence: 42,
    ts: 1_699_999_999_000,
    bids: [
      { price: 100.5, quantity: 1.25 },
      { price: 100, quantity: 3 },
    ],
    asks: [{ price: 101, quantity: 0.5 }],
  });
  return book.snapshot({ capturedAt });
}

/**
 * 単体テスト: FileSnapshotPersister
 *
 * 一時ディレクトリに実際に書き込んで確認する。
 */
describe('FileSnapshotPersister', () => {
  let dataDir: string;
  let loggerMock: LoggerMock;
  let metricsMock: MetricsCollectorMock;
  let persister: FileSnapshotPersister;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'snapshots-'));
    loggerMock = new LoggerMock();
    metricsMock = createMetricsCollectorMock();
    persister = new FileSnapshotPersister(dataDir, loggerMock, metricsMock);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('<dataDir>/<EXCHANGE>/<SYMBOL>.json に書き込む', async () => {
    await persister.persist(sampleSnapshot());

    const raw = await readFile(path.join(dataDir, 'BINANCE', 'BTC_USDT.json'), 'utf8');
    expect(JSON.parse(raw)).toEqual({
      exchange: 'BINANCE',
      symbol: 'BTC_USDT',
      capturedAt: 1_700_000_000_000,
      updatedAt: 1_699_999_999_000,
      sequence: 42,
      state: 'CONSISTENT',
      bids: [
        [100.5, 1.25],
        [100, 3],
      ],
      asks: [[101, 0.5]],
    });
    expect(metricsMock.incrementSnapshotsPersisted).toHaveBeenCalledWith('BTC_USDT', 'file');
  });

  it('書き込んだスナップショットを読み戻すと同じ内容になる', async () => {
    const snapshot = sampleSnapshot();

    await persister.persist(snapshot);

    expect(await persister.load('BINANCE', 'BTC_USDT')).toEqual(snapshot);
  });

  it('最後の書き込みで置き換わり、一時ファイルは残らない', async () => {
    await persister.persist(sampleSnapshot('BTC_USDT', 1));
    await persister.persist(sampleSnapshot('BTC_USDT', 2));
    await persister.persist(sampleSnapshot('ETH_USDT', 3));

    expect((await readdir(path.join(dataDir, 'BINANCE'))).sort()).toEqual(['BTC_USDT.json', 'ETH_USDT.json']);
    expect((await persister.load('BINANCE', 'BTC_USDT'))?.capturedAt).toBe(2);
  });

  it('ファイルがなければ load() は null', async () => {
    expect(await persister.load('BINANCE', 'SOL_USDT')).toBeNull();
  });

  it('内容が壊れていれば load() は PersistenceError', async () => {
    await mkdir(path.join(dataDir, 'BINANCE'), { recursive: true });
    await writeFile(path.join(dataDir, 'BINANCE', 'BTC_USDT.json'), JSON.stringify({ symbol: 'BTC_USDT' }));

    await expect(persister.load('BINANCE', 'BTC_USDT')).rejects.toBeInstanceOf(PersistenceError);
  });

  it('書き込めない場合は PersistenceError を投げ、原因を保持する', async () => {
    const blocker = path.join(dataDir, 'blocker');
    await writeFile(blocker, 'not a directory');
    const broken = new FileSnapshotPersister(path.join(blocker, 'nested'), loggerMock, metricsMock);

    const error = await broken.persist(sampleSnapshot()).then(
      () => null,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error instanceof PersistenceError && error.cause).toBeInstanceOf(Error);
    expect(metricsMock.incrementError).toHaveBeenCalledWith('persistence_error', 'BTC_USDT');
    expect(metricsMock.incrementSnapshotsPersisted).not.toHaveBeenCalled();
  });
});
