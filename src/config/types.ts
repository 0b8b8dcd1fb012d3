export interface ConnectionConfig {
  readonly host: string;
  readonly port: number;
  readonly username: string;
  readonly password: string;
  /** Bound on the SSH handshake and authentication. Defaults to the transport's own timeout. */
  readonly connectTimeoutMs?: number;
  /** Bound on opening the interactive shell. Unbounded when absent. */
  readonly shellTimeoutMs?: number;
}

export interface LoadConfigOptions {
  /** Explicit config path from `--config`; disables the search. */
  configPath?: string;
  /** Directory searched first; defaults to process.cwd(). */
  cwd?: string;
  /** Environment providing PATH; defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

export type ConfigLoadErrorKind = 'explicit-not-found' | 'not-found' | 'invalid';
