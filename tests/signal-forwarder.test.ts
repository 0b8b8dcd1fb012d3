import { EventEmitter } from 'node:events';

import { describe, expect, it } from 'vitest';

import { INTERRUPT_BYTE, SignalForwarder } from '../src/session/signal-forwarder.js';
import type { ShellChannel } from '../src/transport/types.js';
import { FakeSession, ScriptedShell, capturingLogger, silentLogger } from './helpers/fake-session.js';

function connectedSession(channel: ShellChannel): FakeSession {
  const session = new FakeSession(channel);
  session.connected = true;
  return session;
}

describe('SignalForwarder', () => {
  it('writes the interrupt byte for every SIGINT while attached', async () => {
    const signals = new EventEmitter();
    const shell = new ScriptedShell();
    const forwarder = new SignalForwarder({ signals, logger: silentLogger() });
    forwarder.attach(connectedSession(shell.channel), shell.channel);

    signals.emit('SIGINT');
    signals.emit('SIGINT');
    await forwarder.settled();

    expect(shell.writes).toEqual([INTERRUPT_BYTE, INTERRUPT_BYTE]);
  });

  it('ignores a failed forward and logs it at debug level', async () => {
    const signals = new EventEmitter();
    const shell = new ScriptedShell({ failWrites: true });
    const { logger, lines } = capturingLogger();
    const forwarder = new SignalForwarder({ signals, logger });
    forwarder.attach(connectedSession(shell.channel), shell.channel);

    signals.emit('SIGINT');
    await expect(forwarder.settled()).resolves.toBeUndefined();

    expect(lines.find((line) => line.event === 'session:suppressed')).toMatchObject({
      operation: 'forward-interrupt',
      errorMessage: 'broken pipe (host: test-host)',
    });
  });

  it('skips the write when the session is no longer connected', async () => {
    const signals = new EventEmitter();
    const shell = new ScriptedShell();
    const session = new FakeSession(shell.channel);
    const forwarder = new SignalForwarder({ signals, logger: silentLogger() });
    forwarder.attach(session, shell.channel);

    signals.emit('SIGINT');
    await forwarder.settled();

    expect(shell.writes).toEqual([]);
  });

  it('keeps a single listener across re-attachment and removes it on detach', () => {
    const signals = new EventEmitter();
    const shell = new ScriptedShell();
    const session = connectedSession(shell.channel);
    const forwarder = new SignalForwarder({ signals, logger: silentLogger() });

    forwarder.attach(session, shell.channel);
    forwarder.attach(session, shell.channel);
    expect(signals.listenerCount('SIGINT')).toBe(1);

    forwarder.detach();
    forwarder.detach();
    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(forwarder.attached).toBe(false);
  });

  it('does nothing after detach', async () => {
    const signals = new EventEmitter();
    const shell = new ScriptedShell();
    const forwarder = new SignalForwarder({ signals, logger: silentLogger() });
    forwarder.attach(connectedSession(shell.channel), shell.channel);
    forwarder.detach();

    signals.emit('SIGINT');
    await forwarder.settled();

    expect(shell.writes).toEqual([]);
  });
});
