import { chainFrom } from "../chain/CompositionChain.js";
import type { Step } from "../chain/composeSteps.js";
import type { PlanConfig } from "../config/Config.schemas.js";
import type { ChainLogger } from "../logging/ChainLogger.js";
import { silentLogger } from "../logging/SilentChainLogger.js";
import type { NamedStep } from "./buildStep.js";
import { selectSteps } from "./selectSteps.js";

/**
 * Options for runPlan.
 */
export interface RunPlanOptions {
  /** Overrides the plan's start value */
  start?: number;
  /** Names of steps to leave out */
  omit?: readonly string[];
  /** Report every step through the logger as it runs (default: false) */
  trace?: boolean;
  /** Logger for trace output (default: silentLogger) */
  logger?: ChainLogger;
}

/**
 * Result of running a plan.
 */
export interface PlanResult {
  result: number;
  /** Names of the steps that were applied, in order */
  applied: string[];
}

const traced = (step: NamedStep, logger: ChainLogger): Step<number> => (value) => {
  const next = step.apply(value);
  logger.step(step.name, value, next);
  return next;
};

/**
 * Build a composition chain from a plan and calculate it.
 *
 * @example
 * ```typescript
 * runPlan({ start: 100, steps: [{ name: "fee", operation: "subtract", amount: 5 }] });
 * // { result: 95, applied: ["fee"] }
 * ```
 */
export const runPlan = (
  plan: PlanConfig,
  options: RunPlanOptions = {},
): PlanResult => {
  const logger = options.logger ?? silentLogger;
  const steps = selectSteps(plan, options.omit);

  const chain = steps.reduce(
    (acc, step) => acc.with(options.trace ? traced(step, logger) : step.apply),
    chainFrom(options.start ?? plan.start),
  );

  return {
    result: chain.calculate(),
    applied: steps.map((step) => step.name),
  };
};
