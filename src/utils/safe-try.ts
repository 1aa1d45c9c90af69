/**
 * Result type shared by every toolkit operation.
 * Expected failures travel as values; callers branch on `isOk` / `isErr`.
 */
export type Err<E> = { isOk: false; value: null; isErr: true; error: E };

export type Result<T, E = string> =
  | { isOk: true; value: T; isErr: false; error: null }
  | Err<E>;

export function ok<T>(value: T): Result<T, never> {
  return { isOk: true, value, isErr: false, error: null };
}

export function err<E>(error: E): Err<E> {
  return { isOk: false, value: null, isErr: true, error };
}

/**
 * Runs an async operation and captures a rejection as an Err result,
 * so callers never need their own try/catch around I/O.
 *
 * @example
 * const { isOk, value, error } = await safeTry(() => readFile(path));
 */
export async function safeTry<T>(
  fn: () => T | Promise<T>
): Promise<Result<T, unknown>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(error);
  }
}

/** Sync counterpart of safeTry for code paths that never await */
export function safeTrySync<T>(fn: () => T): Result<T, unknown> {
  try {
    return ok(fn());
  } catch (error) {
    return err(error);
  }
}

/** Turns an unknown thrown value into a readable message */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
