import type { ConfigLoadErrorKind } from '../config/types.js';
import type { SessionStage } from '../session/index.js';

export const ExitCode = {
  Success: 0,
  Usage: 1,
  MissingConfigValue: 2,
  ConfigNotFound: 3,
  ConfigSearchExhausted: 4,
  ConfigInvalid: 5,
  ConnectFailed: 6,
  ShellOpenFailed: 7,
  DispatchFailed: 8,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeForConfigError(kind: ConfigLoadErrorKind): ExitCode {
  switch (kind) {
    case 'explicit-not-found':
      return ExitCode.ConfigNotFound;
    case 'not-found':
      return ExitCode.ConfigSearchExhausted;
    case 'invalid':
      return ExitCode.ConfigInvalid;
    default: {
      const exhaustive: never = kind;
      throw new Error(`Unsupported config error kind: ${exhaustive}`);
    }
  }
}

export function exitCodeForSessionStage(stage: SessionStage): ExitCode {
  switch (stage) {
    case 'connect':
      return ExitCode.ConnectFailed;
    case 'shell':
      return ExitCode.ShellOpenFailed;
    case 'dispatch':
      return ExitCode.DispatchFailed;
    default: {
      const exhaustive: never = stage;
      throw new Error(`Unsupported session stage: ${exhaustive}`);
    }
  }
}
