import type { Writable } from 'node:stream';

import type { RemoteTransportError } from '../transport/remote-transport.js';

export const SESSION_STATES = [
  'disconnected',
  'connected',
  'shell-open',
  'draining',
  'executing',
  'shutting-down',
  'closed',
] as const;

export type SessionState = (typeof SESSION_STATES)[number];

export interface SessionTimings {
  /** Wait before draining so the login banner can arrive. */
  settleDelayMs: number;
  /** Pause between drain polls that found nothing buffered. */
  drainPollIntervalMs: number;
  /** Upper bound on one discarded drain read. */
  drainChunkBytes: number;
  /** Interval between liveness checks while executing. */
  livenessIntervalMs: number;
  /** How long shutdown waits for the output reader before disconnecting. */
  shutdownGraceMs: number;
}

export const DEFAULT_SESSION_TIMINGS: Readonly<SessionTimings> = Object.freeze({
  settleDelayMs: 300,
  drainPollIntervalMs: 50,
  drainChunkBytes: 2048,
  livenessIntervalMs: 200,
  shutdownGraceMs: 2000,
});

export type SessionEndReason = 'stream-end' | 'disconnected' | 'output-closed';

export interface SessionSummary {
  endedBy: SessionEndReason;
  bytesForwarded: number;
  /** False when the grace period ran out before the reader exited. */
  readerStopped: boolean;
}

/** Where remote output goes; process.stdout in production. */
export type OutputSink = Pick<Writable, 'write' | 'on' | 'once' | 'off'>;

/** The fatal step a session failed in. */
export type SessionStage = 'connect' | 'shell' | 'dispatch';

export interface SessionFailure {
  stage: SessionStage;
  error: RemoteTransportError;
}
