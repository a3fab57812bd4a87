export { Chain, type CompositionChain, chainFrom } from "./chain/CompositionChain.js";
export {
  andThen,
  applySteps,
  composeSteps,
  identity,
  type Step,
} from "./chain/composeSteps.js";
export {
  type Operation,
  type PlanConfig,
  PlanConfigSchema,
  type StepConfig,
  StepConfigSchema,
} from "./config/Config.schemas.js";
export {
  CONFIG_FILE_NAME,
  findConfigFile,
  loadConfig,
} from "./config/configLoader.utils.js";
export { defineConfig } from "./config/defineConfig.js";
export {
  InvalidArgumentError,
  requirePresent,
} from "./errors/InvalidArgumentError.js";
export type { ChainLogger } from "./logging/ChainLogger.js";
export {
  consoleLogger,
  createConsoleChainLogger,
} from "./logging/ConsoleChainLogger.js";
export { silentLogger } from "./logging/SilentChainLogger.js";
export { buildStep, type NamedStep } from "./plan/buildStep.js";
export { type PlanResult, type RunPlanOptions, runPlan } from "./plan/runPlan.js";
export { selectSteps } from "./plan/selectSteps.js";
export {
  type FluentSequence,
  type Mapper,
  type Predicate,
  Sequence,
  sequenceFrom,
} from "./sequence/FluentSequence.js";
