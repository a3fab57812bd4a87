import { requirePresent } from "../errors/InvalidArgumentError.js";

/** Decides whether an element is kept by `filter`. */
export type Predicate<T> = (element: T) => boolean;

/** Converts an element, possibly to another type. */
export type Mapper<T, U> = (element: T) => U;

/**
 * Immutable wrapper around an ordered sequence.
 *
 * `filter` and `transform` are eager and return a new wrapper each time.
 * `toSequence` and `size` are terminal.
 *
 * @example
 * ```typescript
 * sequenceFrom([1, 2, 3, 4])
 *   .filter((n) => n % 2 === 0)
 *   .transform((n) => `#${n}`)
 *   .toSequence(); // ["#2", "#4"]
 * ```
 */
export interface FluentSequence<T> {
  filter(predicate: Predicate<T>): FluentSequence<T>;
  transform<U>(mapper: Mapper<T, U>): FluentSequence<U>;
  toSequence(): T[];
  size(): number;
}

// Takes ownership of `elements`: callers must pass an array nobody else holds.
const wrap = <T>(elements: readonly T[]): FluentSequence<T> => ({
  filter: (predicate) => {
    const kept: T[] = [];
    for (const element of elements) {
      if (predicate(element)) {
        kept.push(element);
      }
    }
    return wrap(kept);
  },

  transform: <U>(mapper: Mapper<T, U>) => {
    const mapped: U[] = [];
    for (const element of elements) {
      mapped.push(mapper(element));
    }
    return wrap(mapped);
  },

  toSequence: () => [...elements],

  size: () => elements.length,
});

/**
 * Wrap an ordered sequence. The input is copied.
 *
 * @throws InvalidArgumentError if the sequence is null or undefined
 */
export const sequenceFrom = <T>(
  sequence: readonly T[] | null | undefined,
): FluentSequence<T> => wrap([...requirePresent(sequence, "sequence")]);

export const Sequence = { from: sequenceFrom } as const;
