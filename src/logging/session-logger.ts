import pino from 'pino';

import type { SessionState, SessionSummary } from '../session/types.js';

export const LOG_PATH_ENV_VAR = 'CEC_SSH_LOG_PATH';
export const LOG_LEVEL_ENV_VAR = 'CEC_SSH_LOG_LEVEL';

const LEVELS: readonly pino.LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export interface SessionLoggerOptions {
  /** File to append to; defaults to CEC_SSH_LOG_PATH, then stderr. Never stdout. */
  destination?: string;
  level?: pino.LevelWithSilent;
  /** Use an existing pino instance instead of building one. */
  logger?: pino.Logger;
}

function levelFromEnv(env: NodeJS.ProcessEnv): pino.LevelWithSilent {
  const requested = env[LOG_LEVEL_ENV_VAR]?.trim().toLowerCase();
  return LEVELS.find((level) => level === requested) ?? 'silent';
}

export class SessionLogger {
  private readonly logger: pino.Logger;

  constructor(options: SessionLoggerOptions = {}) {
    if (options.logger) {
      this.logger = options.logger;
      return;
    }

    const destination = options.destination ?? process.env[LOG_PATH_ENV_VAR];

    this.logger = pino(
      {
        name: 'cec-ssh',
        level: options.level ?? levelFromEnv(process.env),
      },
      pino.destination(destination ?? 2),
    );
  }

  /** A logger whose every line carries `invocationId`. */
  forInvocation(invocationId: string): SessionLogger {
    return new SessionLogger({ logger: this.logger.child({ invocationId }) });
  }

  logStateChange(from: SessionState, to: SessionState): void {
    this.logger.debug({ event: 'session:state', from, to }, 'Session state changed');
  }

  logDrain(bytesDiscarded: number, durationMs: number): void {
    this.logger.debug({ event: 'session:drain', bytesDiscarded, durationMs }, 'Login banner drained');
  }

  logDispatch(host: string, command: string): void {
    this.logger.info({ event: 'session:dispatch', host, command }, 'Remote command dispatched');
  }

  logInterrupt(): void {
    this.logger.debug({ event: 'session:interrupt' }, 'Forwarding interrupt to remote shell');
  }

  /** Failure of a best-effort operation; recorded, never rethrown. */
  logSuppressed(operation: string, error: Error): void {
    this.logger.debug(
      { event: 'session:suppressed', operation, errorMessage: error.message },
      'Ignored best-effort failure',
    );
  }

  logSessionEnd(summary: SessionSummary, startedAt: Date): void {
    this.logger.info(
      {
        event: 'session:end',
        ...summary,
        durationMs: Date.now() - startedAt.getTime(),
      },
      'Session closed',
    );
  }

  logSessionError(error: Error, startedAt: Date): void {
    this.logger.error(
      {
        event: 'session:error',
        errorMessage: error.message,
        stack: error.stack,
        durationMs: Date.now() - startedAt.getTime(),
      },
      'Session failed',
    );
  }
}
