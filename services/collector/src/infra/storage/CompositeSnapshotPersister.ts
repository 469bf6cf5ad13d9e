import { PersistenceError } from '@/domain/errors/CollectorErrors';
import type { OrderBookSnapshot } from '@/domain/models/OrderBookSnapshot';
import type { SnapshotPersister } from '@/domain/repositories/SnapshotPersister';

/**
 * 複数の書き込み先へ同時に書き込む。
 * すべての書き込みが終わってから、失敗があれば1つの PersistenceError にまとめて投げる。
 */
export class CompositeSnapshotPersister implements SnapshotPersister {
  constructor(private readonly persisters: readonly SnapshotPersister[]) {}

  async persist(snapshot: OrderBookSnapshot): Promise<void> {
    const results = await Promise.allSettled(this.persisters.map((persister) => persister.persist(snapshot)));

    const failures: unknown[] = [];
    for (const result of results) {
      if (result.status === 'rejected') {
        failures.push(result.reason);
      }
    }

    if (failures.length === 0) {
      return;
    }
    if (failures.length === 1) {
      const [failure] = failures;
      throw failure instanceof PersistenceError
        ? failure
        : new PersistenceError(`failed to persist ${snapshot.symbol} snapshot`, { cause: failure });
    }
    throw new PersistenceError(
      `${failures.length} of ${this.persisters.length} persisters failed for ${snapshot.symbol}`,
      { cause: new AggregateError(failures) }
    );
  }
}
