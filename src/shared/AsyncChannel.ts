interface Waiter<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (err: unknown) => void;
}

export interface AsyncChannelOptions {
  /** consumer 提前結束（break / return()）時呼叫 */
  onReturn?: () => void;
}

/**
 * 單一 consumer 的非同步佇列
 *
 * producer push() 不會阻塞；close() 之後已緩衝的值仍會依序交付，
 * 交付完才回報 done（或 close(error) 帶入的錯誤）。
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | undefined;

  constructor(private readonly options: AsyncChannelOptions = {}) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** 回傳 false 表示 channel 已關閉、值被丟棄 */
  push(value: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value, done: false });
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  close(error?: unknown): void {
    if (this.closed) return;
    this.closed = true;
    if (error !== undefined) this.failure = { error };

    // 有 waiter 代表 buffer 已空
    for (const waiter of this.waiters.splice(0)) {
      if (this.failure) {
        waiter.reject(this.failure.error);
      } else {
        waiter.resolve({ value: undefined, done: true });
      }
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      if (this.failure) return Promise.reject(this.failure.error);
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.buffer.length = 0;
        this.close();
        this.options.onReturn?.();
        return { value: undefined, done: true };
      },
    };
  }
}

/** 收集整個 async iterable（測試與 CLI 用） */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}
