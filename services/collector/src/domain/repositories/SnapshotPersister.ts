import type { OrderBookSnapshot } from '@/domain/models/OrderBookSnapshot';

/**
 * スナップショット永続化のインターフェイス（インフラ層で実装される）。
 */
export interface SnapshotPersister {
  /**
   * スナップショットを書き込む。
   * @throws {PersistenceError} 書き込みに失敗した場合
   */
  persist(snapshot: OrderBookSnapshot): Promise<void>;
}
