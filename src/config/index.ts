/**
 * Pipeline configuration: environment helpers, schema, loader and runtime
 * wiring.
 */

export {
  ConfigError,
  requireEnv,
  optionalEnv,
  optionalEnvString,
  optionalEnvInt,
  optionalEnvBool,
  type Env,
} from "./env.js";
export {
  PipelineConfigSchema,
  RetrySettingsSchema,
  RuntimeEnv,
  StorageDriver,
  LogLevelSetting,
  type PipelineConfig,
  type RetrySettings,
} from "./schema.js";
export { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
export {
  PipelineConfigError,
  loadPipelineConfig,
  validatePipelineConfig,
  rawConfigFromEnv,
  configFromEnv,
  type ConfigValidationIssue,
} from "./loader.js";
export {
  createRuntime,
  retryPoliciesFrom,
  type Runtime,
  type RuntimeOverrides,
} from "./runtime.js";
