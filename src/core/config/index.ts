// src/core/config/index.ts
// Configuration system exports

export {
  type ServerConfig,
  type InterpreterConfig,
  type ModuleEntry,
  type ForthicConfig,
  type ConfigLayer,
  type ConfigValidation,
  DEFAULT_SERVER_CONFIG,
  DEFAULT_INTERPRETER_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  loadModulesConfig,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
