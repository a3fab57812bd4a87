import { type PlanConfig, PlanConfigSchema } from "./Config.schemas.js";

/**
 * Type-safe helper for declaring a plan in code.
 * Validates the plan at runtime using Zod.
 *
 * @throws ZodError if validation fails
 */
export const defineConfig = (config: PlanConfig): PlanConfig =>
  PlanConfigSchema.parse(config);
