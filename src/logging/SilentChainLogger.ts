import type { ChainLogger } from "./ChainLogger.js";

/**
 * Silent logger that discards all output.
 * Used in tests to suppress console noise.
 */
export const silentLogger: ChainLogger = {
  step(): void {},
  success(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
};
