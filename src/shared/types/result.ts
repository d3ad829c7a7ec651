/**
 * Outcome of an operation that reports failure as a value instead of
 * throwing. Used by the builders and the renderer, whose callers branch on
 * `ok` rather than wrapping calls in try/catch.
 *
 * @example
 * ```typescript
 * const outcome = tryBuildMapSpec(table, shapes);
 * if (!outcome.ok) {
 *   return reject(outcome.error.field);
 * }
 * use(outcome.value);
 * ```
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Helper to create a successful result.
 */
export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

/**
 * Helper to create a failed result.
 */
export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Type guard to check if a Result is successful.
 */
export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok === true;
}
