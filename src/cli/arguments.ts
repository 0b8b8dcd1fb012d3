import { ExitCode } from './exit-codes.js';

export const CONFIG_FLAGS: readonly string[] = ['--config', '-c'];

export type ParsedArguments =
  | { kind: 'run'; configPath?: string; commandArgs: readonly string[] }
  | { kind: 'usage-error'; exitCode: ExitCode; message: string };

export const USAGE = [
  'Usage: cec-ssh [--config <path>] <cec-ctl arguments...>',
  'Example: cec-ssh -d /dev/cec1 -M',
].join('\n');

/**
 * Pulls the first `--config <path>` (or `-c <path>`) out of argv. Everything
 * else is passed to cec-ctl untouched, in order.
 */
export function parseArguments(argv: readonly string[]): ParsedArguments {
  const args = [...argv];
  let configPath: string | undefined;

  const flagIndex = args.findIndex((arg) => CONFIG_FLAGS.includes(arg));
  if (flagIndex !== -1) {
    const value = args[flagIndex + 1];
    if (value === undefined) {
      return {
        kind: 'usage-error',
        exitCode: ExitCode.MissingConfigValue,
        message: 'error: --config requires a path argument.',
      };
    }
    configPath = value;
    args.splice(flagIndex, 2);
  }

  if (args.length === 0) {
    return { kind: 'usage-error', exitCode: ExitCode.Usage, message: USAGE };
  }

  return { kind: 'run', configPath, commandArgs: Object.freeze(args) };
}
