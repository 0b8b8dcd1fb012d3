export const REMOTE_PROGRAM = 'cec-ctl';

/** Characters a POSIX shell would interpret inside an unquoted word. */
const SHELL_SIGNIFICANT = /[\s"'\\$`*?[\]()<>|&;]/u;

export interface RemoteCommand {
  /** Operator arguments in their original order, unquoted. */
  readonly args: readonly string[];
  /** `exec cec-ctl ...`, so the remote shell is replaced by the program. */
  readonly command: string;
  /** The single line written to the shell: echo suppression followed by the command. */
  readonly dispatchLine: string;
}

export function quoteForShell(arg: string): string {
  if (arg.length === 0) {
    return "''";
  }

  if (!SHELL_SIGNIFICANT.test(arg)) {
    return arg;
  }

  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

export function buildRemoteCommand(args: readonly string[]): RemoteCommand {
  const frozenArgs = Object.freeze([...args]);
  const command = `exec ${[REMOTE_PROGRAM, ...frozenArgs.map(quoteForShell)].join(' ')}`;

  return Object.freeze({
    args: frozenArgs,
    command,
    dispatchLine: `stty -echo; ${command}`,
  });
}
