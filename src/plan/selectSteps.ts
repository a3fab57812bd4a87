import type { PlanConfig } from "../config/Config.schemas.js";
import { InvalidArgumentError } from "../errors/InvalidArgumentError.js";
import { sequenceFrom } from "../sequence/FluentSequence.js";
import { buildStep, type NamedStep } from "./buildStep.js";

/**
 * Pick the steps of a plan that should run, in declaration order.
 * Disabled steps and steps named in `omit` are left out.
 *
 * @throws InvalidArgumentError if `omit` names a step the plan does not have
 */
export const selectSteps = (
  plan: PlanConfig,
  omit: readonly string[] = [],
): NamedStep[] => {
  const declared = new Set(plan.steps.map((step) => step.name));
  const unknown = omit.filter((name) => !declared.has(name));
  if (unknown.length > 0) {
    throw new InvalidArgumentError(
      `Unknown step${unknown.length > 1 ? "s" : ""}: ${unknown.join(", ")}`,
      "omit",
    );
  }

  const omitted = new Set(omit);
  return sequenceFrom(plan.steps)
    .filter((step) => step.enabled !== false)
    .filter((step) => !omitted.has(step.name))
    .transform(buildStep)
    .toSequence();
};
