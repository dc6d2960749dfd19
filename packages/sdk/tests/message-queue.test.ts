/**
 * MessageQueue テストスイート
 */
import { describe, it, expect } from 'vitest';
import { MessageQueue } from '../src/queue/index.js';

async function drain<T>(queue: MessageQueue<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of queue) items.push(item);
  return items;
}

describe('MessageQueue', () => {
  it('投入順に取り出し、end で終了する', async () => {
    const queue = new MessageQueue<number>();
    queue.enqueue(1);
    queue.enqueue(2);
    queue.end();

    await expect(drain(queue)).resolves.toEqual([1, 2]);
  });

  it('空の間は次の投入まで待つ', async () => {
    const queue = new MessageQueue<string>();
    const first = queue.next();

    queue.enqueue('late');

    await expect(first).resolves.toEqual({ done: false, value: 'late' });
  });

  it('end 後の投入は破棄される', async () => {
    const queue = new MessageQueue<number>();
    queue.enqueue(1);
    queue.end();
    queue.enqueue(2);
    queue.fail(new Error('ignored'));

    expect(queue.isEnded).toBe(true);
    expect(queue.size).toBe(1);
    await expect(drain(queue)).resolves.toEqual([1]);
  });

  it('エラーは先行データの後に一度だけ送出される', async () => {
    const queue = new MessageQueue<number>();
    queue.enqueue(1);
    queue.fail(new Error('stream broke'));
    queue.end();

    await expect(queue.next()).resolves.toEqual({ done: false, value: 1 });
    await expect(queue.next()).rejects.toThrow('stream broke');
    await expect(queue.next()).resolves.toEqual({ done: true, value: undefined });
  });

  it('反復は一度だけ許可される', () => {
    const queue = new MessageQueue<number>();
    queue[Symbol.asyncIterator]();

    expect(() => queue[Symbol.asyncIterator]()).toThrow('MessageQueue can only be iterated once');
  });

  it('途中で抜けると以降は終了扱い', async () => {
    const queue = new MessageQueue<number>();
    queue.enqueue(1);
    queue.enqueue(2);

    for await (const item of queue) {
      expect(item).toBe(1);
      break;
    }

    await expect(queue.next()).resolves.toEqual({ done: true, value: undefined });
  });
});
