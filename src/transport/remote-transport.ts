export type RemoteTransportErrorCode =
  | 'auth'
  | 'connection'
  | 'timeout'
  | 'shell'
  | 'write'
  | 'read';

export class RemoteTransportError extends Error {
  constructor(
    readonly code: RemoteTransportErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'RemoteTransportError';
  }
}

export function enrichError(
  error: unknown,
  code: RemoteTransportErrorCode,
  host: string,
): RemoteTransportError {
  if (error instanceof RemoteTransportError) {
    return error;
  }

  if (error instanceof Error) {
    return new RemoteTransportError(code, `${error.message} (host: ${host})`, {
      cause: error,
    });
  }

  return new RemoteTransportError(code, `Unknown ${code} error on host ${host}: ${String(error)}`);
}

/** ssh2 tags client errors with a `level`; map it onto our codes. */
export function classifyClientError(level: string | undefined): RemoteTransportErrorCode {
  switch (level) {
    case 'client-authentication':
      return 'auth';
    case 'client-timeout':
      return 'timeout';
    default:
      return 'connection';
  }
}
