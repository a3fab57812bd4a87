import chalk from "chalk";
import type { ChainLogger } from "./ChainLogger.js";

/**
 * Terminal logger with colors. Writes every line to stderr unless another
 * sink is given.
 */
export const createConsoleChainLogger = (
  write: (line: string) => void = (line) => console.error(line),
): ChainLogger => {
  const prefix = chalk.dim("[fluent-chain]");

  return {
    step(name: string, before: number, after: number): void {
      write(`${prefix} ${chalk.cyan("→")} ${name}: ${before} -> ${after}`);
    },

    success(message: string): void {
      write(`${prefix} ${chalk.green("✓")} ${message}`);
    },

    info(message: string): void {
      write(`${prefix} ${message}`);
    },

    warn(message: string): void {
      write(`${prefix} ${chalk.yellow("⚠")} ${message}`);
    },

    error(message: string): void {
      write(`${prefix} ${chalk.red("✗")} ${message}`);
    },
  };
};

/**
 * Default console logger instance.
 */
export const consoleLogger = createConsoleChainLogger();
