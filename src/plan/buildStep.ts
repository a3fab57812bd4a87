import type { Step } from "../chain/composeSteps.js";
import type { Operation, StepConfig } from "../config/Config.schemas.js";
import { InvalidArgumentError } from "../errors/InvalidArgumentError.js";

/** A step together with the name it was declared under. */
export interface NamedStep {
  name: string;
  apply: Step<number>;
}

const OPERATORS: Record<Operation, (value: number, amount: number) => number> = {
  add: (value, amount) => value + amount,
  subtract: (value, amount) => value - amount,
  multiply: (value, amount) => value * amount,
  divide: (value, amount) => value / amount,
};

/**
 * Turn a declared step into a function of the running value.
 *
 * @throws InvalidArgumentError for a division by zero
 */
export const buildStep = (config: StepConfig): NamedStep => {
  if (config.operation === "divide" && config.amount === 0) {
    throw new InvalidArgumentError(
      `Step "${config.name}" divides by zero`,
      "amount",
    );
  }
  const operator = OPERATORS[config.operation];
  const { amount } = config;
  return { name: config.name, apply: (value) => operator(value, amount) };
};
