/**
 * Result<T, E>: discriminated union for explicit ok/err returns.
 *
 * Used where a caller must branch on failure instead of letting it
 * propagate, e.g. the resolver deciding between retry and re-creation
 * after a failed decryption.
 *
 * Usage:
 *   const result = await tryCatch(() => store.read(password));
 *   if (isOk(result)) {
 *     return result.value;
 *   }
 */

// ============================================================================
// Types
// ============================================================================

export interface OkResult<T> {
  success: true;
  value: T;
}

export interface ErrResult<E> {
  success: false;
  error: E;
}

/**
 * Either an OkResult<T> or an ErrResult<E>. Narrow with isOk().
 */
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

// ============================================================================
// Constructors
// ============================================================================

export function ok<T>(value: T): OkResult<T> {
  return { success: true, value };
}

export function err<E = Error>(error: E): ErrResult<E> {
  return { success: false, error };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isOk<T, E>(result: Result<T, E>): result is OkResult<T> {
  return result.success === true;
}

// ============================================================================
// Try-Catch Wrapper
// ============================================================================

/**
 * Run an async function and return a Result instead of throwing.
 * Non-Error throwables are wrapped via String().
 */
export async function tryCatch<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    const value = await fn();
    return ok(value);
  } catch (thrown) {
    if (thrown instanceof Error) {
      return err(thrown);
    }
    return err(new Error(String(thrown)));
  }
}
