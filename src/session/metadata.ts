import { nanoid } from 'nanoid/non-secure';

export interface SessionMetadata {
  /** Opaque identifier for correlating log lines of one run. */
  invocationId: string;
  startedAt: Date;
}

export function createSessionMetadata(): SessionMetadata {
  return {
    invocationId: nanoid(12),
    startedAt: new Date(),
  };
}
