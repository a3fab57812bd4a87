import { z } from "zod";

// --- Schemas ---

export const OPERATIONS = ["add", "subtract", "multiply", "divide"] as const;

export const StepConfigSchema = z.object({
  /** Step name (unique within a plan), used by --omit and in trace output */
  name: z.string().min(1),
  /** Arithmetic applied to the running value */
  operation: z.enum(OPERATIONS),
  /** Right-hand operand */
  amount: z.number().finite(),
  /** Set to false to keep the step in the file without applying it (default: true) */
  enabled: z.boolean().optional(),
});

export const PlanConfigSchema = z
  .object({
    /** Starting value of the chain */
    start: z.number().finite(),
    /** Steps, applied in order */
    steps: z.array(StepConfigSchema),
  })
  .superRefine((plan, ctx) => {
    const seen = new Set<string>();
    plan.steps.forEach((step, index) => {
      if (seen.has(step.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate step name: ${step.name}`,
          path: ["steps", index, "name"],
        });
      }
      seen.add(step.name);
    });
  });

// --- Inferred Types ---

export type Operation = (typeof OPERATIONS)[number];
export type StepConfig = z.infer<typeof StepConfigSchema>;
export type PlanConfig = z.infer<typeof PlanConfigSchema>;
