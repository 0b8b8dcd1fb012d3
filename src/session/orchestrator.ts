import type { EventEmitter } from 'node:events';

import type { RemoteCommand } from '../command/remote-command.js';
import type { SessionLogger } from '../logging/index.js';
import { RemoteTransportError, enrichError } from '../transport/remote-transport.js';
import type { RemoteTransportErrorCode } from '../transport/remote-transport.js';
import { DEFAULT_TERMINAL } from '../transport/types.js';
import type { ShellChannel, SshSession, TerminalOptions } from '../transport/types.js';
import { attempt, err, ok, type Result } from '../types/result.js';
import { bestEffort, delay } from './best-effort.js';
import { createSessionMetadata } from './metadata.js';
import { SignalForwarder } from './signal-forwarder.js';
import {
  DEFAULT_SESSION_TIMINGS,
  SESSION_STATES,
  type OutputSink,
  type SessionEndReason,
  type SessionFailure,
  type SessionStage,
  type SessionState,
  type SessionSummary,
  type SessionTimings,
} from './types.js';

export interface SessionOrchestratorOptions {
  session: SshSession;
  /** Host name used in error messages and logs. */
  host: string;
  output: OutputSink;
  signals: EventEmitter;
  logger: SessionLogger;
  timings?: Partial<SessionTimings>;
  terminal?: TerminalOptions;
}

export type SessionResult = Result<SessionSummary, SessionFailure>;

/**
 * Drives one remote command through connect, shell, banner drain, dispatch,
 * streaming and shutdown. Single use: `run` may be called once.
 */
export class SessionOrchestrator {
  private readonly timings: SessionTimings;
  private readonly terminal: TerminalOptions;
  private currentState: SessionState = 'disconnected';
  private logger: SessionLogger;

  constructor(private readonly options: SessionOrchestratorOptions) {
    this.timings = { ...DEFAULT_SESSION_TIMINGS, ...options.timings };
    this.terminal = options.terminal ?? DEFAULT_TERMINAL;
    this.logger = options.logger;
  }

  get state(): SessionState {
    return this.currentState;
  }

  async run(command: RemoteCommand): Promise<SessionResult> {
    if (this.currentState !== 'disconnected') {
      throw new Error(`SessionOrchestrator.run called in state ${this.currentState}`);
    }

    const metadata = createSessionMetadata();
    this.logger = this.options.logger.forInvocation(metadata.invocationId);
    const forwarder = new SignalForwarder({ signals: this.options.signals, logger: this.logger });
    const cancellation = new AbortController();
    const { session } = this.options;

    const fail = async (
      stage: SessionStage,
      error: RemoteTransportError,
      channel?: ShellChannel,
    ): Promise<SessionResult> => {
      this.transition('shutting-down');
      cancellation.abort();
      await this.close(forwarder, channel);
      this.logger.logSessionError(error, metadata.startedAt);
      return err({ stage, error });
    };

    const connected = await attempt(() => session.connect(), this.fatal('connection'));
    if (!connected.success) {
      return fail('connect', connected.error);
    }
    this.transition('connected');

    const shell = await attempt(() => session.openShell(this.terminal), this.fatal('shell'));
    if (!shell.success) {
      return fail('shell', shell.error);
    }
    const channel = shell.data;
    this.transition('shell-open');
    forwarder.attach(session, channel);

    this.transition('draining');
    await this.drain(channel);

    const dispatched = await attempt(
      () => channel.write(`${command.dispatchLine}\n`),
      this.fatal('write'),
    );
    if (!dispatched.success) {
      return fail('dispatch', dispatched.error, channel);
    }
    this.logger.logDispatch(this.options.host, command.command);
    this.transition('executing');

    const summary = await this.streamUntilDone(channel, cancellation);
    await this.close(forwarder, channel);
    this.logger.logSessionEnd(summary, metadata.startedAt);
    return ok(summary);
  }

  /**
   * Discards whatever the shell prints before it is ready (banner, MOTD,
   * prompt). Ends after two consecutive empty polls or at end of stream.
   */
  private async drain(channel: ShellChannel): Promise<void> {
    const { settleDelayMs, drainPollIntervalMs, drainChunkBytes } = this.timings;
    const startedAt = Date.now();
    let discarded = 0;

    await delay(settleDelayMs);

    await bestEffort('drain', this.logger, async () => {
      let emptyPolls = 0;
      while (channel.dataAvailable() || emptyPolls < 2) {
        if (channel.dataAvailable()) {
          const chunk = channel.readAvailable(drainChunkBytes);
          if (chunk.length === 0) {
            break;
          }
          discarded += chunk.length;
          emptyPolls = 0;
        } else {
          emptyPolls++;
          await delay(drainPollIntervalMs);
        }
      }
    });

    this.logger.logDrain(discarded, Date.now() - startedAt);
  }

  private async streamUntilDone(
    channel: ShellChannel,
    cancellation: AbortController,
  ): Promise<SessionSummary> {
    const { signal } = cancellation;
    const { output } = this.options;
    let bytesForwarded = 0;
    let outputClosed = false;

    // Left attached after shutdown: a closed pipe may still report EPIPE while the process exits.
    output.on('error', (error: Error) => {
      if (!outputClosed) {
        outputClosed = true;
        this.logger.logSuppressed('output', error);
      }
      cancellation.abort();
    });

    const reader = (async () => {
      try {
        while (!signal.aborted) {
          const chunk = await channel.read(signal);
          if (chunk === null) {
            break;
          }
          bytesForwarded += chunk.length;
          if (!output.write(chunk)) {
            await this.waitForDrain(signal);
          }
        }
      } catch (error) {
        this.logger.logSuppressed('read', error instanceof Error ? error : new Error(String(error)));
      }
    })();

    const monitor = (async () => {
      while (!signal.aborted) {
        if (!this.options.session.isConnected()) {
          break;
        }
        await delay(this.timings.livenessIntervalMs, signal);
      }
    })();

    const finished = await Promise.race([
      reader.then((): SessionEndReason => 'stream-end'),
      monitor.then((): SessionEndReason => 'disconnected'),
    ]);
    const endedBy: SessionEndReason = outputClosed ? 'output-closed' : finished;

    this.transition('shutting-down');
    cancellation.abort();

    const readerStopped = await this.settleWithin(reader, this.timings.shutdownGraceMs);
    return { endedBy, bytesForwarded, readerStopped };
  }

  /** Resolves once the output sink drains, or when `signal` aborts. */
  private waitForDrain(signal: AbortSignal): Promise<void> {
    const { output } = this.options;
    if (signal.aborted) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const done = () => {
        output.off('drain', done);
        signal.removeEventListener('abort', done);
        resolve();
      };
      output.once('drain', done);
      signal.addEventListener('abort', done, { once: true });
    });
  }

  private async settleWithin(task: Promise<void>, ms: number): Promise<boolean> {
    const timer = new AbortController();
    const settled = await Promise.race([
      task.then(() => true),
      delay(ms, timer.signal).then(() => false),
    ]);
    timer.abort();
    return settled;
  }

  private async close(forwarder: SignalForwarder, channel?: ShellChannel): Promise<void> {
    const { session } = this.options;
    if (channel) {
      await bestEffort('close-channel', this.logger, () => channel.close());
    }
    await bestEffort('disconnect', this.logger, () => {
      if (session.isConnected()) {
        session.disconnect();
      }
    });
    forwarder.detach();
    this.transition('closed');
  }

  private fatal(code: RemoteTransportErrorCode): (error: unknown) => RemoteTransportError {
    return (error) => enrichError(error, code, this.options.host);
  }

  private transition(next: SessionState): void {
    const from = this.currentState;
    const fromIndex = SESSION_STATES.indexOf(from);
    const nextIndex = SESSION_STATES.indexOf(next);
    const forward = nextIndex === fromIndex + 1;
    const abort = next === 'shutting-down' && fromIndex < nextIndex;

    if (!forward && !abort) {
      throw new Error(`Invalid session transition ${from} -> ${next}`);
    }

    this.currentState = next;
    this.logger.logStateChange(from, next);
  }
}
