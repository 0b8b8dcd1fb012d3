import type { Duplex } from 'node:stream';

import { ChunkQueue } from './chunk-queue.js';
import { RemoteTransportError, enrichError } from './remote-transport.js';
import type { ShellChannel } from './types.js';

/** Bytes buffered before the remote stream is paused. */
export const DEFAULT_HIGH_WATER_MARK = 64 * 1024;

/**
 * Adapts an ssh2 shell stream (any Duplex) to the poll-or-wait ShellChannel
 * interface. Every `data` event lands in a queue; `end`, `close` and `error`
 * close it. The stream is paused while more than `highWaterMark` bytes are
 * buffered and resumed once the consumer catches up.
 */
export class SshShellChannel implements ShellChannel {
  private readonly queue = new ChunkQueue<Buffer>();
  private buffered = 0;

  constructor(
    private readonly stream: Duplex,
    private readonly host: string,
    private readonly highWaterMark = DEFAULT_HIGH_WATER_MARK,
  ) {
    stream.on('data', (chunk: Buffer | string) => {
      const data = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      this.buffered += data.length;
      this.queue.push(data);
      if (this.buffered >= this.highWaterMark && !stream.isPaused()) {
        stream.pause();
      }
    });
    stream.once('end', () => this.queue.close());
    stream.once('close', () => this.queue.close());
    stream.on('error', (error: Error) => this.queue.fail(enrichError(error, 'read', host)));
  }

  get writable(): boolean {
    return this.stream.writable && !this.stream.destroyed;
  }

  dataAvailable(): boolean {
    return this.queue.size > 0;
  }

  readAvailable(maxBytes: number): Buffer {
    const head = this.queue.shift();
    if (head === undefined) {
      return Buffer.alloc(0);
    }
    if (head.length <= maxBytes) {
      this.taken(head.length);
      return head;
    }

    this.queue.unshift(head.subarray(maxBytes));
    this.taken(maxBytes);
    return head.subarray(0, maxBytes);
  }

  async read(signal?: AbortSignal): Promise<Buffer | null> {
    const chunk = await this.queue.next(signal);
    if (chunk !== null) {
      this.taken(chunk.length);
    }
    return chunk;
  }

  write(data: string): Promise<void> {
    if (!this.writable) {
      return Promise.reject(
        new RemoteTransportError('write', `Shell channel to ${this.host} is not writable`),
      );
    }

    return new Promise((resolve, reject) => {
      this.stream.write(data, (error?: Error | null) => {
        if (error) {
          reject(enrichError(error, 'write', this.host));
          return;
        }
        resolve();
      });
    });
  }

  /** Sends EOF to the remote shell. */
  close(): void {
    this.stream.end();
  }

  private taken(bytes: number): void {
    this.buffered -= bytes;
    if (this.buffered < this.highWaterMark && this.stream.isPaused()) {
      this.stream.resume();
    }
  }
}
