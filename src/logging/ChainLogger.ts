/**
 * Logging interface for fluent-chain status output.
 *
 * All output goes to stderr so stdout carries only results.
 *
 * @example
 * ```typescript
 * logger.info("Loaded plan from fluent-chain.config.json");
 * logger.step("income tax", 97600, 82600);
 * logger.success("Applied 5 steps");
 * ```
 */
export interface ChainLogger {
  /**
   * Report one applied step.
   * Displays: [fluent-chain] → {name}: {before} -> {after}
   */
  step(name: string, before: number, after: number): void;

  /**
   * Log a success message (green ✓).
   */
  success(message: string): void;

  /**
   * Log an info message (neutral).
   */
  info(message: string): void;

  /**
   * Log a warning message (yellow ⚠).
   */
  warn(message: string): void;

  /**
   * Log an error message (red ✗).
   */
  error(message: string): void;
}
