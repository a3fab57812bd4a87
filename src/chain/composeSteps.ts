/** A unary step that maps a value to a value of the same type. */
export type Step<T> = (value: T) => T;

export const identity = <T>(value: T): T => value;

/**
 * Left-to-right composition: run `first`, then feed its result to `second`.
 *
 * @example
 * andThen((n: number) => n + 1, (n) => n * 2)(3) // 8
 */
export const andThen =
  <A, B, C>(first: (a: A) => B, second: (b: B) => C) =>
  (a: A): C =>
    second(first(a));

/**
 * Compose an ordered list of steps into one, first step running first.
 * An empty list composes to `identity`.
 *
 * Steps are applied in a loop, so the call depth does not grow with the
 * number of steps.
 */
export const composeSteps = <T>(steps: readonly Step<T>[]): Step<T> => {
  if (steps.length === 0) {
    return identity;
  }
  const pending = [...steps];
  return (value) => pending.reduce<T>((acc, step) => step(acc), value);
};

/**
 * Apply an ordered list of steps to a value.
 *
 * @example
 * applySteps(10, [(n) => n - 3, (n) => n * 2]) // 14
 */
export const applySteps = <T>(value: T, steps: readonly Step<T>[]): T =>
  composeSteps(steps)(value);
