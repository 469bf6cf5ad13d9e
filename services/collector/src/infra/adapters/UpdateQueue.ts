import { AbortError, FeedError } from '@/domain/errors/CollectorErrors';

interface Waiter<T> {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
}

/**
 * インフラ層: push 型の受信（WebSocket）を pull 型の next() に変換するバッファ
 *
 * 到着順を保ったまま保持する。fail() 後は未取得の更新を破棄し、next() はエラーを返す。
 * 上限を超えた場合は黙って欠落させず、接続ごと失敗させる。
 */
export class UpdateQueue<T> {
  private readonly buffer: T[] = [];
  private waiter: Waiter<T> | null = null;
  private failure: Error | null = null;

  constructor(private readonly capacity = 10000) {}

  get size(): number {
    return this.buffer.length;
  }

  get failed(): boolean {
    return this.failure !== null;
  }

  push(item: T): void {
    if (this.failure) {
      return;
    }
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.resolve(item);
      return;
    }
    this.buffer.push(item);
    if (this.buffer.length > this.capacity) {
      this.fail(new FeedError(`update buffer overflow (${this.capacity} pending updates)`));
    }
  }

  /**
   * 以降の next() をエラーにする。最初のエラーだけが保持される。
   */
  fail(error: Error): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    this.buffer.length = 0;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.reject(error);
    }
  }

  /**
   * 次の更新を取り出す。中断済みなら未取得の更新が残っていても AbortError。
   */
  next(signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
      return Promise.reject(new AbortError());
    }
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      return Promise.resolve(item);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.waiter) {
      return Promise.reject(new Error('UpdateQueue supports a single consumer'));
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        this.waiter = null;
        reject(new AbortError());
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.waiter = {
        resolve: (item) => {
          signal.removeEventListener('abort', onAbort);
          resolve(item);
        },
        reject: (error) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
    });
  }
}
