/**
 * Configuration module exports
 */

// Loader
export {
  CONFIG_ENV_VAR,
  CONFIG_FILE_NAME,
  findConfigFile,
  type LoadedTargets,
  loadTargets,
  parseConfig,
  readConfigFile,
} from "./loader";
// Parser
export { isIgnoredLine, parseDirectiveLine, parseDirectives } from "./parser";
// Resolver
export {
  listSubdirectories,
  type ResolveContext,
  resolveDirectory,
  resolveTargets,
} from "./resolver";
