import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { type PlanConfig, PlanConfigSchema } from "./Config.schemas.js";

/**
 * Supported config file name.
 */
export const CONFIG_FILE_NAME = "fluent-chain.config.json" as const;

/**
 * Find a config file in the given directory.
 *
 * @param directory - Directory to search in
 * @returns Path to config file, or null if not found
 */
export const findConfigFile = (directory: string): string | null => {
  const configPath = join(directory, CONFIG_FILE_NAME);
  return existsSync(configPath) ? configPath : null;
};

/**
 * Load and validate a plan file.
 *
 * @throws Error if the file is missing or is not valid JSON
 * @throws ZodError if the plan does not match the schema
 */
export const loadConfig = (configPath: string): PlanConfig => {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const content = readFileSync(configPath, "utf-8");
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error(`Failed to parse JSON config: ${configPath}`);
  }

  return PlanConfigSchema.parse(rawConfig);
};

/**
 * Load the plan from an explicit path, or from the config file in `directory`.
 *
 * @throws Error if no config file can be found
 */
export const loadConfigFrom = (
  configPath: string | undefined,
  directory: string,
): { config: PlanConfig; configPath: string } => {
  const resolved = configPath ?? findConfigFile(directory);
  if (!resolved) {
    throw new Error(`No ${CONFIG_FILE_NAME} found in: ${directory}`);
  }
  return { config: loadConfig(resolved), configPath: resolved };
};
