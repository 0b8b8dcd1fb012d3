/**
 * Result type for operations whose failure the caller must handle.
 * Failures that may be ignored go through `bestEffort` instead.
 */

export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Run an async action once and capture a rejection as a failed Result.
 */
export async function attempt<T, E>(
  action: () => Promise<T>,
  toError: (error: unknown) => E,
): Promise<Result<T, E>> {
  try {
    return ok(await action());
  } catch (error) {
    return err(toError(error));
  }
}
