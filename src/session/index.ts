export { SessionOrchestrator, type SessionOrchestratorOptions, type SessionResult } from './orchestrator.js';
export { SignalForwarder, INTERRUPT_BYTE } from './signal-forwarder.js';
export {
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
