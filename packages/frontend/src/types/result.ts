/**
 * Result type for functional error handling
 *
 * Checks return a Result instead of throwing; callers propagate a failure
 * with `if (!r.ok) return r;`.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T, E>(error: E): Result<T, E> => ({
  ok: false,
  error,
});

export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> => (result.ok ? ok(fn(result.value)) : result);

/**
 * Thread a state through a list of steps left to right.
 * The first failing step aborts the fold.
 */
export const foldResults = <S, T, E>(
  items: readonly T[],
  initial: S,
  step: (state: S, item: T, index: number) => Result<S, E>
): Result<S, E> => {
  let state = initial;
  for (const [index, item] of items.entries()) {
    const next = step(state, item, index);
    if (!next.ok) {
      return next;
    }
    state = next.value;
  }
  return ok(state);
};
