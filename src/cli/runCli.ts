import { resolve } from "node:path";
import { ZodError } from "zod";
import { loadConfigFrom } from "../config/configLoader.utils.js";
import type { ChainLogger } from "../logging/ChainLogger.js";
import { consoleLogger } from "../logging/ConsoleChainLogger.js";
import { runPlan } from "../plan/runPlan.js";
import { parseArgs, USAGE } from "./parseArgs.js";

/**
 * Options for runCli.
 */
export interface CliEnvironment {
  /** Directory searched for the default plan file (default: process.cwd()) */
  cwd?: string;
  /** Receives the result and the usage text (default: console.log) */
  print?: (line: string) => void;
  /** Logger for status output (default: consoleLogger) */
  logger?: ChainLogger;
}

const describeError = (error: unknown): string => {
  if (error instanceof ZodError) {
    return `Invalid plan: ${error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      )
      .join("; ")}`;
  }
  return error instanceof Error ? error.message : String(error);
};

/**
 * Run the command line and return the process exit code.
 *
 * 0 on success, 1 when the plan cannot be loaded or run, 2 for usage errors.
 */
export const runCli = (
  args: readonly string[],
  env: CliEnvironment = {},
): number => {
  const cwd = env.cwd ?? process.cwd();
  const print = env.print ?? ((line: string) => console.log(line));
  const logger = env.logger ?? consoleLogger;

  const parsed = parseArgs(args);
  if (!parsed.success) {
    logger.error(parsed.error);
    print(USAGE);
    return 2;
  }

  const { options } = parsed;
  if (options.help) {
    print(USAGE);
    return 0;
  }

  try {
    const { config, configPath } = loadConfigFrom(
      options.configPath === undefined ? undefined : resolve(cwd, options.configPath),
      cwd,
    );
    logger.info(`Loaded plan from ${configPath}`);

    const { result, applied } = runPlan(config, {
      start: options.start,
      omit: options.omit,
      trace: options.trace,
      logger,
    });

    if (options.omit.length > 0) {
      logger.warn(`Omitted: ${options.omit.join(", ")}`);
    }
    logger.success(
      `Applied ${applied.length} step${applied.length === 1 ? "" : "s"}`,
    );
    print(String(result));
    return 0;
  } catch (error) {
    logger.error(describeError(error));
    return 1;
  }
};
