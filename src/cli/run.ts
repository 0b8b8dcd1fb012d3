import type { EventEmitter } from 'node:events';

import { buildRemoteCommand } from '../command/remote-command.js';
import { ConfigLoadError, loadConfig } from '../config/loader.js';
import type { ConnectionConfig } from '../config/types.js';
import type { SessionLogger } from '../logging/index.js';
import {
  SessionOrchestrator,
  type OutputSink,
  type SessionStage,
  type SessionTimings,
} from '../session/index.js';
import type { SshSession } from '../transport/types.js';
import { parseArguments } from './arguments.js';
import { ExitCode, exitCodeForConfigError, exitCodeForSessionStage } from './exit-codes.js';

export interface DiagnosticSink {
  write(text: string): unknown;
}

export interface CliDependencies {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: OutputSink;
  stderr: DiagnosticSink;
  signals: EventEmitter;
  logger: SessionLogger;
  createSession(config: ConnectionConfig): SshSession;
  timings?: Partial<SessionTimings>;
}

const FAILURE_PREFIX: Record<SessionStage, string> = {
  connect: 'SSH connection failed',
  shell: 'Failed to open remote shell',
  dispatch: 'Failed to send command to remote shell',
};

function configDiagnostic(error: ConfigLoadError): string {
  if (error.kind !== 'not-found') {
    return error.message;
  }
  return [
    `${error.message} Tried the following paths:`,
    ...error.triedPaths.map((candidate) => `  ${candidate}`),
    'Use --config <path> to specify a config file.',
  ].join('\n');
}

/**
 * Runs one cec-ctl invocation end to end and returns the process exit code.
 */
export async function run(argv: readonly string[], deps: CliDependencies): Promise<ExitCode> {
  const report = (message: string) => deps.stderr.write(`${message}\n`);

  const parsed = parseArguments(argv);
  if (parsed.kind === 'usage-error') {
    report(parsed.message);
    return parsed.exitCode;
  }

  let config: ConnectionConfig;
  try {
    config = await loadConfig({ configPath: parsed.configPath, cwd: deps.cwd, env: deps.env });
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      report(configDiagnostic(error));
      return exitCodeForConfigError(error.kind);
    }
    throw error;
  }

  const command = buildRemoteCommand(parsed.commandArgs);
  const orchestrator = new SessionOrchestrator({
    session: deps.createSession(config),
    host: config.host,
    output: deps.stdout,
    signals: deps.signals,
    logger: deps.logger,
    timings: deps.timings,
  });

  const result = await orchestrator.run(command);
  if (!result.success) {
    const { stage, error } = result.error;
    report(`${FAILURE_PREFIX[stage]}: ${error.message}`);
    return exitCodeForSessionStage(stage);
  }

  return ExitCode.Success;
}
