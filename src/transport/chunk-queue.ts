interface PendingRead<T> {
  resolve: (value: T | null) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort: () => void;
}

/**
 * Buffers pushed chunks for a single consumer. `next` waits for the next
 * chunk; `null` means the queue was closed (or the wait aborted).
 */
export class ChunkQueue<T> {
  private readonly queue: T[] = [];
  private pending: PendingRead<T> | null = null;
  private closed = false;
  private failure: Error | null = null;

  get size(): number {
    return this.queue.length;
  }

  push(value: T): void {
    if (this.closed) {
      return;
    }
    const pending = this.takePending();
    if (pending) {
      pending.resolve(value);
    } else {
      this.queue.push(value);
    }
  }

  /** Returns a partially consumed chunk to the front of the queue. */
  unshift(value: T): void {
    this.queue.unshift(value);
  }

  shift(): T | undefined {
    return this.queue.shift();
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.takePending()?.resolve(null);
  }

  /** Closes the queue; the waiting consumer, and every later `next`, rejects with `error`. */
  fail(error: Error): void {
    if (this.closed) {
      return;
    }
    this.failure = error;
    this.closed = true;
    this.takePending()?.reject(error);
  }

  next(signal?: AbortSignal): Promise<T | null> {
    const value = this.queue.shift();
    if (value !== undefined) {
      return Promise.resolve(value);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(null);
    }
    if (this.pending) {
      return Promise.reject(new Error('ChunkQueue supports a single pending reader'));
    }

    return new Promise<T | null>((resolve, reject) => {
      const onAbort = () => {
        this.pending = null;
        resolve(null);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.pending = { resolve, reject, signal, onAbort };
    });
  }

  private takePending(): PendingRead<T> | null {
    const pending = this.pending;
    this.pending = null;
    pending?.signal?.removeEventListener('abort', pending.onAbort);
    return pending;
  }
}
