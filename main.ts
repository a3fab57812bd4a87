#!/usr/bin/env node

/**
 * fluent-chain entry point
 *
 * Usage:
 *   npx fluent-chain                     # Run ./fluent-chain.config.json
 *   npx fluent-chain --omit union-fee    # Run without one step
 *   npx fluent-chain --trace             # Log every step
 */

import { runCli } from "./src/cli/runCli.js";

process.exitCode = runCli(process.argv.slice(2));
