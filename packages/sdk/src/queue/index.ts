/**
 * メッセージキュー
 * 読み取りループ（単一プロデューサー）とAPI利用側（単一コンシューマー）の間のFIFO
 */

type QueueEntry<T> =
  | { kind: 'item'; value: T }
  | { kind: 'error'; error: Error }
  | { kind: 'end' };

export class MessageQueue<T> implements AsyncIterable<T> {
  private readonly entries: QueueEntry<T>[] = [];
  private waiter?: () => void;
  private ended = false;
  private finished = false;
  private iterated = false;

  enqueue(value: T): void {
    this.push({ kind: 'item', value });
  }

  /**
   * 終端直前のエラー項目。コンシューマーには一度だけ送出される
   */
  fail(error: Error): void {
    this.push({ kind: 'error', error });
  }

  /**
   * 終端センチネル。以降の項目は破棄される
   */
  end(): void {
    this.push({ kind: 'end' });
  }

  get isEnded(): boolean {
    return this.ended;
  }

  get size(): number {
    return this.entries.filter(entry => entry.kind === 'item').length;
  }

  private push(entry: QueueEntry<T>): void {
    if (this.ended) return;
    if (entry.kind === 'end') this.ended = true;

    this.entries.push(entry);
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    while (!this.finished) {
      const entry = this.entries.shift();

      if (!entry) {
        await new Promise<void>(resolve => {
          this.waiter = resolve;
        });
        continue;
      }

      switch (entry.kind) {
        case 'item':
          return { done: false, value: entry.value };
        case 'error':
          this.finished = true;
          this.entries.length = 0;
          throw entry.error;
        case 'end':
          this.finished = true;
          break;
      }
    }

    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.iterated) {
      throw new Error('MessageQueue can only be iterated once');
    }
    this.iterated = true;

    return {
      next: () => this.next(),
      return: async () => {
        this.finished = true;
        return { done: true, value: undefined };
      }
    };
  }
}
