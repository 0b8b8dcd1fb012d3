import { describe, expect, it } from 'vitest';

import { ChunkQueue } from '../src/transport/chunk-queue.js';
import { RemoteTransportError } from '../src/transport/remote-transport.js';
import { ScriptedShell } from './helpers/fake-session.js';

async function until(condition: () => boolean): Promise<void> {
  while (!condition()) {
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
}

describe('ChunkQueue', () => {
  it('hands pushed values to a waiting reader', async () => {
    const queue = new ChunkQueue<string>();
    const pending = queue.next();
    queue.push('a');

    await expect(pending).resolves.toBe('a');
  });

  it('drains buffered values before reporting close', async () => {
    const queue = new ChunkQueue<string>();
    queue.push('a');
    queue.close();
    queue.push('ignored');

    await expect(queue.next()).resolves.toBe('a');
    await expect(queue.next()).resolves.toBeNull();
  });

  it('resolves a waiting reader with null when its signal aborts', async () => {
    const queue = new ChunkQueue<string>();
    const controller = new AbortController();
    const pending = queue.next(controller.signal);
    controller.abort();

    await expect(pending).resolves.toBeNull();
    queue.push('later');
    await expect(queue.next()).resolves.toBe('later');
  });

  it('rejects the waiting reader and later reads after a failure', async () => {
    const queue = new ChunkQueue<string>();
    const pending = queue.next();
    queue.fail(new Error('reset'));

    await expect(pending).rejects.toThrow('reset');
    await expect(queue.next()).rejects.toThrow('reset');
  });
});

describe('SshShellChannel', () => {
  it('buffers output until it is polled', async () => {
    const shell = new ScriptedShell();
    expect(shell.channel.dataAvailable()).toBe(false);

    shell.emit('banner');
    await until(() => shell.channel.dataAvailable());

    expect(shell.channel.readAvailable(64).toString()).toBe('banner');
    expect(shell.channel.dataAvailable()).toBe(false);
    expect(shell.channel.readAvailable(64)).toHaveLength(0);
  });

  it('splits a buffered chunk larger than the requested size', async () => {
    const shell = new ScriptedShell();
    shell.emit('0123456789');
    await until(() => shell.channel.dataAvailable());

    expect(shell.channel.readAvailable(4).toString()).toBe('0123');
    expect(shell.channel.readAvailable(4).toString()).toBe('4567');
    expect(shell.channel.readAvailable(4).toString()).toBe('89');
    expect(shell.channel.dataAvailable()).toBe(false);
  });

  it('reads chunks in order and reports end of stream as null', async () => {
    const shell = new ScriptedShell();
    shell.emit('one');
    shell.emit('two');
    shell.end();

    const received: string[] = [];
    for (let chunk = await shell.channel.read(); chunk !== null; chunk = await shell.channel.read()) {
      received.push(chunk.toString());
    }

    expect(received.join('')).toBe('onetwo');
  });

  it('rejects pending reads with a read error when the stream fails', async () => {
    const shell = new ScriptedShell();
    const pending = shell.channel.read();
    shell.stream.destroy(new Error('connection reset'));

    const error = await pending.catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(RemoteTransportError);
    expect(error).toMatchObject({ code: 'read', message: 'connection reset (host: test-host)' });
  });

  it('writes through to the remote side', async () => {
    const shell = new ScriptedShell();

    await shell.channel.write('stty -echo\n');

    expect(shell.writes).toEqual(['stty -echo\n']);
  });

  it('rejects writes once the stream is closed', async () => {
    const shell = new ScriptedShell();
    shell.channel.close();

    await expect(shell.channel.write('x')).rejects.toMatchObject({ code: 'write' });
    expect(shell.channel.writable).toBe(false);
  });

  it('pauses the remote stream past the high-water mark and resumes once read', async () => {
    const shell = new ScriptedShell({ highWaterMark: 8 });
    shell.emit('0123456789');
    await until(() => shell.channel.dataAvailable());

    expect(shell.stream.isPaused()).toBe(true);

    expect(shell.channel.readAvailable(4).toString()).toBe('0123');
    expect(shell.stream.isPaused()).toBe(false);
  });

  it('resumes a paused stream when output is awaited', async () => {
    const shell = new ScriptedShell({ highWaterMark: 2 });
    shell.emit('abc');
    await until(() => shell.channel.dataAvailable());
    expect(shell.stream.isPaused()).toBe(true);

    await expect(shell.channel.read()).resolves.toEqual(Buffer.from('abc'));
    expect(shell.stream.isPaused()).toBe(false);
  });

  it('ends the write side on close', () => {
    const shell = new ScriptedShell();
    shell.channel.close();

    expect(shell.stream.writableEnded).toBe(true);
  });

  it('surfaces a failed write as a write error', async () => {
    const shell = new ScriptedShell({ failWrites: true });

    await expect(shell.channel.write('x')).rejects.toMatchObject({
      code: 'write',
      message: 'broken pipe (host: test-host)',
    });
  });
});
