#!/usr/bin/env node
/**
 * CLI command to validate the pipeline configuration.
 *
 * Validates:
 * - Environment variables (integers and booleans parse)
 * - Pipeline configuration schema
 * - Runtime wiring (stores, codec, table)
 * - Category catalog
 *
 * Usage:
 *   npx tsx src/cli/validate-config.ts [options]
 *   npm run validate-config
 *
 * Options:
 *   --env-file <path>   Read variables from this file instead of .env
 *   --verbose           Show detailed output
 *   --json              Output entire report as JSON (for CI parsing)
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - All validations passed
 *   1 - One or more validations failed
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { config as loadDotenv } from "dotenv";

import {
  ConfigError,
  PipelineConfigError,
  configFromEnv,
  createRuntime,
  rawConfigFromEnv,
  type PipelineConfig,
} from "../config/index.js";
import { DEFAULT_CATALOG } from "../categories/index.js";
import { createSilentLogger } from "../logging/index.js";
import { errorMessage } from "../errors/index.js";

// ============================================================
// Types
// ============================================================

interface StepResult {
  success: boolean;
  component: string;
  message: string;
  details?: string[];
}

interface ValidationReport {
  timestamp: string;
  steps: StepResult[];
  config?: Readonly<PipelineConfig>;
  summary: {
    stepsPassed: number;
    stepsFailed: number;
    stepsTotal: number;
  };
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      "env-file": { type: "string" },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-config [options]

Options:
  --env-file <path>   Read variables from this file instead of .env
  --verbose           Show detailed output
  --json              Output entire report as JSON (for CI parsing)
  -h, --help          Show this help message
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printHeader(): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", " Pipeline Configuration Validation"));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
}

function printStep(step: StepResult, verbose: boolean): void {
  if (step.success) {
    console.log(`${c("green", "✓")} ${c("bold", step.component)}: ${step.message}`);
    if (verbose) {
      step.details?.forEach((d) => console.log(`  ${c("dim", "•")} ${d}`));
    }
  } else {
    console.log(`${c("red", "✗")} ${c("bold", step.component)}: ${step.message}`);
    step.details?.forEach((d) => console.log(`    ${c("red", "•")} ${d}`));
  }
  console.log("");
}

function printFooter(passed: number, failed: number): void {
  console.log("─".repeat(60));
  if (failed === 0) {
    console.log(c("green", `✓ All validations passed (${passed}/${passed})`));
  } else {
    console.log(c("red", `✗ Validation failed: ${failed} error(s)`));
  }
  console.log("─".repeat(60));
  console.log("");
}

// ============================================================
// Validation Steps
// ============================================================

function runEnvironmentStep(): StepResult {
  try {
    const raw = rawConfigFromEnv();
    return {
      success: true,
      component: "Environment",
      message: "All variables parse",
      details: Object.keys(raw).map((key) => `${key} read`),
    };
  } catch (err) {
    if (err instanceof ConfigError) {
      return { success: false, component: "Environment", message: err.message };
    }
    throw err;
  }
}

function runSchemaStep(): { step: StepResult; config?: Readonly<PipelineConfig> } {
  try {
    const config = configFromEnv();
    return {
      step: {
        success: true,
        component: "PipelineConfig",
        message: `Valid (${config.env}, ${config.storage.driver} storage)`,
        details: [
          `State bucket: ${config.stateBucket}`,
          `Hybrid storage: ${config.hybrid.enabled ? "enabled" : "disabled"}, threshold ${config.hybrid.thresholdBytes} bytes`,
          `Stage timeout: ${config.stageTimeoutMs} ms`,
          `Results table: ${config.tables.verificationResults}`,
          `Log level: ${config.logging.level}${config.logging.json ? " (json)" : ""}`,
        ],
      },
      config,
    };
  } catch (err) {
    if (err instanceof PipelineConfigError) {
      return {
        step: {
          success: false,
          component: "PipelineConfig",
          message: err.message,
          details: err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
        },
      };
    }
    if (err instanceof ConfigError) {
      return { step: { success: false, component: "PipelineConfig", message: err.message } };
    }
    throw err;
  }
}

function runRuntimeStep(config: Readonly<PipelineConfig>): StepResult {
  try {
    const runtime = createRuntime(config, { logger: createSilentLogger() });
    return {
      success: true,
      component: "Runtime",
      message: `Wired ${runtime.store.constructor.name} and ${runtime.table.constructor.name}`,
      details: [
        `Container: ${runtime.client.container}`,
        `Capacity retries: ${runtime.retryPolicies.capacity.maxAttempts}`,
        `Transient retries: ${runtime.retryPolicies.transient.maxAttempts}`,
      ],
    };
  } catch (err) {
    return { success: false, component: "Runtime", message: errorMessage(err) };
  }
}

function runCatalogStep(): StepResult {
  const slotIds = DEFAULT_CATALOG.listSlotIds();
  return {
    success: slotIds.length > 0,
    component: "CategoryCatalog",
    message: `Version ${DEFAULT_CATALOG.version}, ${DEFAULT_CATALOG.listCategories().length} categories, ${slotIds.length} slots`,
    details: slotIds,
  };
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs();
  const isJson = args.json === true;
  const isVerbose = args.verbose === true;

  const envFile = args["env-file"];
  if (envFile !== undefined) {
    const path = resolve(envFile);
    if (!existsSync(path)) {
      console.error(`Env file not found: ${path}`);
      process.exit(1);
    }
    loadDotenv({ path, override: true });
  }

  const steps: StepResult[] = [];
  let loaded: Readonly<PipelineConfig> | undefined;

  if (!isJson) {
    printHeader();
  }

  function record(step: StepResult): void {
    steps.push(step);
    if (!isJson) {
      printStep(step, isVerbose);
    }
  }

  const envStep = runEnvironmentStep();
  record(envStep);

  if (envStep.success) {
    const { step, config } = runSchemaStep();
    record(step);
    loaded = config;
  }

  if (loaded !== undefined) {
    record(runRuntimeStep(loaded));
  }

  record(runCatalogStep());

  const passed = steps.filter((s) => s.success).length;
  const report: ValidationReport = {
    timestamp: new Date().toISOString(),
    steps,
    config: loaded,
    summary: {
      stepsPassed: passed,
      stepsFailed: steps.length - passed,
      stepsTotal: steps.length,
    },
  };

  if (isJson) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printFooter(report.summary.stepsPassed, report.summary.stepsFailed);
  }

  process.exit(report.summary.stepsFailed > 0 ? 1 : 0);
}

main().catch((err) => {
  console.error("Unexpected error:", err);
  process.exit(1);
});
