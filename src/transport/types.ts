export interface TerminalOptions {
  term: string;
  cols: number;
  rows: number;
  width: number;
  height: number;
}

export const DEFAULT_TERMINAL: Readonly<TerminalOptions> = Object.freeze({
  term: 'xterm',
  cols: 80,
  rows: 24,
  width: 800,
  height: 600,
});

/**
 * The read/write side of an interactive shell. Output is buffered as it
 * arrives so callers can either poll it or wait for it.
 */
export interface ShellChannel {
  readonly writable: boolean;
  /** True when output is buffered and can be taken without waiting. */
  dataAvailable(): boolean;
  /** Takes at most `maxBytes` of buffered output; empty when nothing is buffered. */
  readAvailable(maxBytes: number): Buffer;
  /** Next chunk of output; `null` at end of stream or once `signal` aborts. */
  read(signal?: AbortSignal): Promise<Buffer | null>;
  /** Resolves once the data has been handed to the transport. */
  write(data: string): Promise<void>;
  close(): void;
}

export interface SshSession {
  connect(): Promise<void>;
  openShell(options: TerminalOptions): Promise<ShellChannel>;
  isConnected(): boolean;
  disconnect(): void;
}
