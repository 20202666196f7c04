export type {
  GenerateError,
  GenerateMode,
  GenerateOptions,
  GenerateOutcome,
} from "./types.js";
export { generate, formatGenerateError } from "./generate.js";
export { composeConfigFile } from "./composeConfigFile.js";
export { loadConfiguration, parseConfiguration } from "./loadConfiguration.js";
