/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

// #region Main Library Exports

// Engine
export {
  applyRule,
  applyRules,
  rewrite,
  type RewriteOptions,
  type RewriteSummary,
  type RuleApplication,
  type RuleReport,
  type RuleSetApplication,
} from "./rewriter.js";

// Rules
export {
  BUNDLED_RULES_FILE,
  RuleSchema,
  RuleSetFileSchema,
  compileRule,
  compileRuleSet,
  findCascades,
  loadDefaultRuleSet,
  loadRuleSet,
  parseRuleSet,
  type CompiledRule,
  type Rule,
  type RuleCascade,
  type RuleSet,
  type RuleSetFile,
} from "./rules.js";

// Configuration
export * from "./config.js";

// Core Utilities
export { Logger, LogLevel, createLogger, type LoggerOptions } from "./logger.js";
export {
  CliError,
  ErrorExitCodes,
  ErrorUtils,
  FieldRewriteError,
  FileReadError,
  FileWriteError,
  ValidationError,
  getExitCode,
} from "./errors.js";
export { runCli } from "./cli.js";

// #endregion
