/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { cosmiconfigSync } from "cosmiconfig";
import { dirname, resolve } from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import {
  LOG_FORMATS,
  LOG_LEVEL_NAMES,
  createLogger,
  type Logger,
} from "./logger.js";
import {
  RuleSchema,
  loadDefaultRuleSet,
  loadRuleSet,
  type Rule,
} from "./rules.js";

export { ConfigError };

export const CONFIG_MODULE_NAME = "fieldrewrite";

export const DEFAULT_TARGET = "src/lib.rs";

/**
 * Configuration schema using Zod for validation
 */
export const FieldRewriteConfigSchema = z.object({
  target: z
    .string()
    .min(1)
    .default(DEFAULT_TARGET)
    .describe("File to rewrite in place"),
  rulesFile: z
    .string()
    .min(1)
    .optional()
    .describe("JSON rule table replacing the bundled one"),
  rules: z
    .array(RuleSchema)
    .optional()
    .describe("Inline rule table; wins over rulesFile from the same file"),

  verbose: z.boolean().default(false).describe("Enable verbose logging"),
  veryVerbose: z
    .boolean()
    .default(false)
    .describe("Enable very verbose logging"),
  quiet: z
    .boolean()
    .default(false)
    .describe("Quiet mode (only warnings and errors)"),
  logLevel: z
    .enum(LOG_LEVEL_NAMES)
    .optional()
    .describe("Set the minimum log level"),
  logFormat: z
    .enum(LOG_FORMATS)
    .default("human")
    .describe("Log line format"),
});

export type FieldRewriteConfig = z.infer<typeof FieldRewriteConfigSchema>;

/**
 * CLI arguments interface for type safety
 */
export interface CliArguments {
  file?: string;
  rules?: string;
  config?: string;
  verbose?: boolean;
  veryVerbose?: boolean;
  quiet?: boolean;
  /** Checked against the schema's level names during validation */
  logLevel?: string;
  logFormat?: string;
}

/**
 * Configuration loading result
 */
export interface ConfigResult {
  config: FieldRewriteConfig;
  filepath?: string;
  isEmpty?: boolean;
}

export interface ResolvedRuleSet {
  rules: Rule[];
  /** Where the rules came from, for log output */
  source: string;
}

const configLogger = createLogger("Config");

function isObject(item: unknown): item is Record<string, unknown> {
  return item !== null && typeof item === "object" && !Array.isArray(item);
}

/**
 * Convert CLI arguments to configuration format
 */
function normalizeCliArguments(args: CliArguments): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (args.file !== undefined) config.target = args.file;
  if (args.rules !== undefined) config.rulesFile = args.rules;
  if (args.verbose !== undefined) config.verbose = args.verbose;
  if (args.veryVerbose !== undefined) config.veryVerbose = args.veryVerbose;
  if (args.quiet !== undefined) config.quiet = args.quiet;
  if (args.logLevel !== undefined) config.logLevel = args.logLevel;
  if (args.logFormat !== undefined) config.logFormat = args.logFormat;

  return config;
}

/**
 * Paths inside a config file are relative to that file, not to the cwd
 */
function resolveFilePaths(
  fileConfig: Record<string, unknown>,
  filepath?: string,
): Record<string, unknown> {
  if (!filepath) return fileConfig;

  const baseDir = dirname(filepath);
  const resolved = { ...fileConfig };
  if (typeof resolved.target === "string") {
    resolved.target = resolve(baseDir, resolved.target);
  }
  if (typeof resolved.rulesFile === "string") {
    resolved.rulesFile = resolve(baseDir, resolved.rulesFile);
  }
  return resolved;
}

/**
 * Validate configuration using Zod schema
 */
export function validateConfig(
  config: unknown,
  filepath?: string,
): FieldRewriteConfig {
  const result = FieldRewriteConfigSchema.safeParse(config);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(
      `Invalid configuration${filepath ? ` in ${filepath}` : ""}:\n${issues}`,
      filepath,
      result.error,
      { operation: "validateConfig", issueCount: result.error.issues.length },
    );
  }

  return result.data;
}

/**
 * Load configuration from files using cosmiconfig
 */
function loadConfigFromFileSync(
  searchFrom?: string,
  configFile?: string,
): {
  config: Record<string, unknown>;
  filepath?: string;
  isEmpty?: boolean;
} {
  configLogger.debug("Loading configuration from file", {
    searchFrom,
    configFile,
    operation: "loadConfigFromFileSync",
  });

  const explorer = cosmiconfigSync(CONFIG_MODULE_NAME);

  let result: ReturnType<typeof explorer.search>;
  try {
    result = configFile
      ? explorer.load(configFile)
      : explorer.search(searchFrom);
  } catch (error) {
    throw new ConfigError(
      `Failed to load configuration${configFile ? ` from ${configFile}` : ""}`,
      configFile,
      error instanceof Error ? error : undefined,
      { operation: "loadConfigFromFileSync", searchFrom },
    );
  }

  if (!result) {
    configLogger.debug("No configuration file found, using defaults");
    return { config: {} };
  }

  const loaded: unknown = result.config;
  if (loaded !== undefined && loaded !== null && !isObject(loaded)) {
    throw new ConfigError(
      `Configuration in ${result.filepath} must be an object`,
      result.filepath,
      undefined,
      { operation: "loadConfigFromFileSync" },
    );
  }

  configLogger.debug("Configuration file loaded", {
    filepath: result.filepath,
    isEmpty: result.isEmpty,
  });

  return {
    config: isObject(loaded) ? loaded : {},
    filepath: result.filepath,
    isEmpty: result.isEmpty,
  };
}

/**
 * Load configuration with CLI args support. CLI values win over the file.
 */
export function loadConfigSync(
  cliArgs?: CliArguments,
  searchFrom?: string,
): ConfigResult {
  const {
    config: rawFileConfig,
    filepath,
    isEmpty,
  } = loadConfigFromFileSync(searchFrom ?? process.cwd(), cliArgs?.config);

  const fileConfig = resolveFilePaths(rawFileConfig, filepath);
  const cliConfig = cliArgs ? normalizeCliArguments(cliArgs) : {};

  // A rules file named on the command line replaces inline rules too
  if (cliConfig.rulesFile !== undefined) {
    delete fileConfig.rules;
  }

  const config = validateConfig({ ...fileConfig, ...cliConfig }, filepath);

  return {
    config,
    filepath,
    isEmpty,
  };
}

/**
 * Pick the rule set a run uses: inline rules, then a rules file, then the
 * table bundled with the package.
 */
export function resolveRuleSet(
  result: ConfigResult,
  log: Logger = configLogger,
): ResolvedRuleSet {
  const { config, filepath } = result;

  if (config.rules) {
    return { rules: config.rules, source: filepath ?? "inline configuration" };
  }

  if (config.rulesFile) {
    return {
      rules: loadRuleSet(config.rulesFile, log),
      source: config.rulesFile,
    };
  }

  return { rules: loadDefaultRuleSet(log), source: "bundled rule table" };
}

/**
 * Sample `.fieldrewriterc.json` content
 */
export function createSampleConfig(): string {
  const sample = {
    target: DEFAULT_TARGET,
    rules: [
      {
        match: "self.anchor_row",
        replacement: "self.selection.anchor_row",
      },
    ],
    verbose: false,
  };
  return `${JSON.stringify(sample, null, 2)}\n`;
}
