import { describe, expect, it } from 'vitest';
import { AbortError, FeedError } from '@/domain/errors/CollectorErrors';
import { UpdateQueue } from '@/infra/adapters/UpdateQueue';

describe('UpdateQueue', () => {
  const signal = new AbortController().signal;

  it('到着順に取り出す', async () => {
    const queue = new UpdateQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.push(3);

    expect([await queue.next(signal), await queue.next(signal), await queue.next(signal)]).toEqual([1, 2, 3]);
    expect(queue.size).toBe(0);
  });

  it('待機中の next() は push() で解決される', async () => {
    const queue = new UpdateQueue<string>();

    const pending = queue.next(signal);
    queue.push('a');

    await expect(pending).resolves.toBe('a');
  });

  it('fail() は待機中の next() を reject し、以降も同じエラーを返す', async () => {
    const queue = new UpdateQueue<string>();
    const error = new FeedError('socket closed');

    const pending = queue.next(signal);
    queue.fail(error);
    queue.fail(new FeedError('second failure'));

    await expect(pending).rejects.toBe(error);
    await expect(queue.next(signal)).rejects.toBe(error);
    expect(queue.failed).toBe(true);
  });

  it('fail() は未取得の更新を破棄し、以降の push() を無視する', async () => {
    const queue = new UpdateQueue<number>();
    queue.push(1);
    queue.fail(new FeedError('socket closed'));
    queue.push(2);

    expect(queue.size).toBe(0);
    await expect(queue.next(signal)).rejects.toThrow('socket closed');
  });

  it('上限を超えたら FeedError で失敗する', async () => {
    const queue = new UpdateQueue<number>(2);
    queue.push(1);
    queue.push(2);
    queue.push(3);

    await expect(queue.next(signal)).rejects.toThrow('update buffer overflow (2 pending updates)');
  });

  it('中断されると AbortError で reject する', async () => {
    const queue = new UpdateQueue<number>();
    const controller = new AbortController();

    const pending = queue.next(controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortError);

    // 中断後も別の signal で取り出せる
    queue.push(7);
    await expect(queue.next(signal)).resolves.toBe(7);
  });

  it('中断済みの signal では待たずに reject する', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(new UpdateQueue<number>().next(controller.signal)).rejects.toBeInstanceOf(AbortError);
  });

  it('中断済みなら未取得の更新があっても取り出さない', async () => {
    const queue = new UpdateQueue<number>();
    queue.push(1);
    queue.push(2);
    const controller = new AbortController();
    controller.abort();

    await expect(queue.next(controller.signal)).rejects.toBeInstanceOf(AbortError);
    expect(queue.size).toBe(2);
  });

  it('同時に2つの next() は受け付けない', async () => {
    const queue = new UpdateQueue<number>();
    void queue.next(signal).catch(() => undefined);

    await expect(queue.next(signal)).rejects.toThrow('UpdateQueue supports a single consumer');
  });
});
