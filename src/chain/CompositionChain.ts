import { requirePresent } from "../errors/InvalidArgumentError.js";
import { composeSteps, type Step } from "./composeSteps.js";

/**
 * A starting value plus the steps still to be applied to it.
 *
 * Each `with` returns a new chain; nothing runs until `calculate`.
 *
 * @example
 * ```typescript
 * chainFrom(100)
 *   .with((n) => n - 20)
 *   .with((n) => n / 2)
 *   .calculate(); // 40
 * ```
 */
export interface CompositionChain<T> {
  with(step: Step<T>): CompositionChain<T>;
  calculate(): T;
}

// Pending steps, newest first. Links are shared between chains and never mutated.
interface StepLink<T> {
  readonly step: Step<T>;
  readonly previous: StepLink<T> | null;
}

const toOrderedSteps = <T>(last: StepLink<T> | null): Step<T>[] => {
  const steps: Step<T>[] = [];
  for (let node = last; node !== null; node = node.previous) {
    steps.push(node.step);
  }
  return steps.reverse();
};

const link = <T>(value: T, last: StepLink<T> | null): CompositionChain<T> => ({
  with: (step) => link(value, { step, previous: last }),
  calculate: () => composeSteps(toOrderedSteps(last))(value),
});

/**
 * Start a chain from a value, with no steps pending.
 *
 * @throws InvalidArgumentError if the value is null or undefined
 */
export const chainFrom = <T>(
  value: T | null | undefined,
): CompositionChain<T> =>
  link<T>(requirePresent(value, "value"), null);

export const Chain = { from: chainFrom } as const;
