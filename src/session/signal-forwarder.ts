import type { EventEmitter } from 'node:events';

import type { SessionLogger } from '../logging/index.js';
import type { ShellChannel, SshSession } from '../transport/types.js';
import { bestEffort } from './best-effort.js';

export const INTERRUPT_BYTE = '\x03';

export interface SignalForwarderOptions {
  /** Emitter of SIGINT; `process` in production. */
  signals: EventEmitter;
  logger: SessionLogger;
}

/**
 * Turns local Ctrl+C into a Ctrl+C byte on the remote shell. While attached,
 * the SIGINT listener replaces Node's default of exiting the process.
 */
export class SignalForwarder {
  private listener: (() => void) | null = null;
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly options: SignalForwarderOptions) {}

  get attached(): boolean {
    return this.listener !== null;
  }

  attach(session: SshSession, channel: ShellChannel): void {
    this.detach();

    const { logger } = this.options;
    const listener = () => {
      logger.logInterrupt();
      this.pending = bestEffort('forward-interrupt', logger, async () => {
        if (session.isConnected() && channel.writable) {
          await channel.write(INTERRUPT_BYTE);
        }
      });
    };

    this.listener = listener;
    this.options.signals.on('SIGINT', listener);
  }

  detach(): void {
    if (this.listener) {
      this.options.signals.off('SIGINT', this.listener);
      this.listener = null;
    }
  }

  /** Settles once the most recent forward attempt has finished. */
  settled(): Promise<void> {
    return this.pending;
  }
}
