/**
 * Thrown when a required argument is absent (`null` or `undefined`).
 *
 * @example
 * ```typescript
 * try {
 *   chainFrom(undefined);
 * } catch (error) {
 *   if (error instanceof InvalidArgumentError) {
 *     console.error(error.argument); // "value"
 *   }
 * }
 * ```
 */
export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    /** Name of the offending argument */
    public readonly argument: string,
  ) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Narrow an optional value to its present type.
 *
 * @throws InvalidArgumentError if the value is null or undefined
 */
export const requirePresent = <T>(
  value: T | null | undefined,
  argument: string,
): T => {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(`${argument} must not be ${value}`, argument);
  }
  return value;
};
