import { randomUUID } from 'node:crypto';
import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { PersistenceError } from '@/domain/errors/CollectorErrors';
import { EXCHANGES, type ExchangeName } from '@/domain/models/Exchange';
import type { OrderBookSnapshot } from '@/domain/models/OrderBookSnapshot';
import type { SnapshotPersister } from '@/domain/repositories/SnapshotPersister';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { describeZodError } from '@/shared/zod';

const PriceLevelSchema = z.tuple([z.number(), z.number()]);

/**
 * 書き込み済みスナップショットファイルの形式
 */
const StoredSnapshotSchema = z.object({
  exchange: z.enum(EXCHANGES),
  symbol: z.string(),
  capturedAt: z.number(),
  updatedAt: z.number().nullable(),
  sequence: z.number().nullable(),
  state: z.enum(['EMPTY', 'PARTIAL', 'CONSISTENT', 'ANOMALOUS']),
  bids: z.array(PriceLevelSchema),
  asks: z.array(PriceLevelSchema),
});

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * インフラ層: スナップショットのファイル書き込み
 *
 * 責務: `<dataDir>/<EXCHANGE>/<SYMBOL>.json` を最新のスナップショットで置き換える。
 * 同じディレクトリの一時ファイルに書いて fsync した後 rename するため、
 * 読み手が途中まで書かれたファイルを見ることはない。
 */
export class FileSnapshotPersister implements SnapshotPersister {
  private readonly logger: Logger;

  constructor(
    private readonly dataDir: string,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger = logger ?? LoggerFactory.forComponent('FileSnapshotPersister');
  }

  /**
   * シンボルごとの出力先パス
   */
  pathFor(exchange: ExchangeName, symbol: string): string {
    return path.join(this.dataDir, exchange, `${symbol}.json`);
  }

  async persist(snapshot: OrderBookSnapshot): Promise<void> {
    const target = this.pathFor(snapshot.exchange, snapshot.symbol);
    const directory = path.dirname(target);
    const temp = path.join(directory, `.${path.basename(target)}.${randomUUID()}.tmp`);

    try {
      await mkdir(directory, { recursive: true });
      const handle = await open(temp, 'w');
      try {
        await handle.writeFile(JSON.stringify(snapshot));
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(temp, target);
    } catch (error) {
      await this.removeTemp(temp);
      // メトリクス収集: 書き込みエラー
      this.metricsCollector?.incrementError('persistence_error', snapshot.symbol);
      throw new PersistenceError(`failed to write snapshot to ${target}`, { cause: error });
    }

    // メトリクス収集: 書き込み件数
    this.metricsCollector?.incrementSnapshotsPersisted(snapshot.symbol, 'file');
  }

  /**
   * 書き込み済みのスナップショットを読み込む。
   * @returns ファイルが存在しない場合は null
   * @throws {PersistenceError} 読み込み失敗、または内容が不正な場合
   */
  async load(exchange: ExchangeName, symbol: string): Promise<OrderBookSnapshot | null> {
    const target = this.pathFor(exchange, symbol);

    let raw: string;
    try {
      raw = await readFile(target, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new PersistenceError(`failed to read snapshot ${target}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`snapshot ${target} is not valid JSON`, { cause: error });
    }

    const parsed = StoredSnapshotSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceError(`snapshot ${target} is malformed: ${describeZodError(parsed.error)}`);
    }
    return parsed.data;
  }

  private async removeTemp(temp: string): Promise<void> {
    try {
      await rm(temp, { force: true });
    } catch (error) {
      this.logger.warn('Failed to remove temporary snapshot file', { path: temp, err: error });
    }
  }
}
