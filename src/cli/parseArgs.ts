/**
 * Options accepted on the command line.
 */
export interface CliOptions {
  configPath?: string;
  start?: number;
  omit: string[];
  trace: boolean;
  help: boolean;
}

export type ParseResult =
  | { success: true; options: CliOptions }
  | { success: false; error: string };

export const USAGE = `Usage: fluent-chain [options]

Runs the steps of a plan file against its start value and prints the result.

Options:
  --config <path>   Plan file (default: ./fluent-chain.config.json)
  --start <number>  Override the plan's start value
  --omit <name>     Leave a step out (repeatable)
  --trace           Log every step as it is applied
  --help            Show this message`;

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @example
 * parseArgs(["--omit", "union-fee", "--trace"])
 * // { success: true, options: { omit: ["union-fee"], trace: true, help: false } }
 */
export const parseArgs = (args: readonly string[]): ParseResult => {
  const options: CliOptions = { omit: [], trace: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--trace":
        options.trace = true;
        break;
      case "--config":
      case "--start":
      case "--omit": {
        const value = args[i + 1];
        if (value === undefined || value.startsWith("--")) {
          return { success: false, error: `Missing value for ${arg}` };
        }
        i++;
        if (arg === "--config") {
          options.configPath = value;
        } else if (arg === "--omit") {
          options.omit.push(value);
        } else {
          const start = Number(value);
          if (value.trim() === "" || !Number.isFinite(start)) {
            return { success: false, error: `Invalid number for --start: ${value}` };
          }
          options.start = start;
        }
        break;
      }
      default:
        return { success: false, error: `Unknown argument: ${arg}` };
    }
  }

  return { success: true, options };
};
