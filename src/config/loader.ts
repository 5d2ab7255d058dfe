/**
 * Pipeline configuration loader and validator.
 *
 * Responsible for:
 * - Building configuration from the environment
 * - Validating against the schema with fail-fast behavior
 * - Freezing configuration to enforce immutability
 */

import type { ZodIssue } from "zod";

import { PipelineConfigSchema, type PipelineConfig } from "./schema.js";
import { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
import {
  optionalEnv,
  optionalEnvBool,
  optionalEnvInt,
  optionalEnvString,
  type Env,
} from "./env.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Structured validation error for pipeline configuration.
 */
export class PipelineConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "PipelineConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Pipeline configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path,
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze a value to enforce runtime immutability.
 */
function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const key of Reflect.ownKeys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate and load pipeline configuration.
 *
 * @throws PipelineConfigError if validation fails
 */
export function loadPipelineConfig(input: unknown): Readonly<PipelineConfig> {
  const result = PipelineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PipelineConfigError(
      `Invalid pipeline configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate pipeline configuration without loading.
 */
export function validatePipelineConfig(input: unknown): {
  success: boolean;
  config?: PipelineConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = PipelineConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Raw configuration object read from the environment, before validation.
 *
 * @throws ConfigError if a numeric or boolean variable cannot be parsed
 */
export function rawConfigFromEnv(env: Env = process.env): Record<string, unknown> {
  const defaults = DEFAULT_PIPELINE_CONFIG;

  const storage: Record<string, unknown> = {
    driver: optionalEnv("STATE_STORE", defaults.storage.driver, env),
  };
  const directory = optionalEnvString("STATE_DIR", env);
  if (directory !== undefined) storage["directory"] = directory;
  const region = optionalEnvString("AWS_REGION", env);
  if (region !== undefined) storage["region"] = region;

  const logging: Record<string, unknown> = {
    level: optionalEnv("LOG_LEVEL", defaults.logging.level, env),
    json: optionalEnvBool("LOG_JSON", defaults.logging.json, env),
  };
  const file = optionalEnvString("LOG_FILE", env);
  if (file !== undefined) logging["file"] = file;

  return {
    env: optionalEnv("NODE_ENV", defaults.env, env),
    stateBucket: optionalEnv("STATE_BUCKET", defaults.stateBucket, env),
    storage,
    hybrid: {
      enabled: optionalEnvBool("ENABLE_HYBRID_STORAGE", defaults.hybrid.enabled, env),
      thresholdBytes: optionalEnvInt("BASE64_SIZE_THRESHOLD", defaults.hybrid.thresholdBytes, env),
    },
    integrity: {
      enabled: optionalEnvBool("INTEGRITY_CHECKS", defaults.integrity.enabled, env),
    },
    stageTimeoutMs: optionalEnvInt("STAGE_TIMEOUT_MS", defaults.stageTimeoutMs, env),
    retry: defaults.retry,
    tables: {
      verificationResults: optionalEnv(
        "VERIFICATION_RESULTS_TABLE",
        defaults.tables.verificationResults,
        env
      ),
    },
    logging,
  };
}

/**
 * Load configuration from the environment.
 *
 * @throws ConfigError on unparseable variables
 * @throws PipelineConfigError on values the schema rejects
 */
export function configFromEnv(env: Env = process.env): Readonly<PipelineConfig> {
  return loadPipelineConfig(rawConfigFromEnv(env));
}
