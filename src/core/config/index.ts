// src/core/config/index.ts
// Configuration system exports

export {
  type ClockKind,
  type TaskConfig,
  type TaskloopConfig,
  type ConfigValidation,
  ConfigError,
  DEFAULT_TASKS,
  DEFAULT_CONFIG,
  parseTaskSpec,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
