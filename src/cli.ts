/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import chalk from "chalk";
import { readFileSync } from "fs";
import yargs from "yargs";
import { loadConfigSync, resolveRuleSet, type CliArguments } from "./config.js";
import {
  CliError,
  ErrorExitCodes,
  ErrorUtils,
  getExitCode,
  type ErrorExitCode,
} from "./errors.js";
import {
  LOG_FORMATS,
  LOG_LEVEL_NAMES,
  Logger,
  parseLogLevel,
  type LogFormat,
} from "./logger.js";
import { resolvePackageFile } from "./pathUtils.js";
import { rewrite } from "./rewriter.js";
import { findCascades } from "./rules.js";

const SCRIPT_NAME = "field-rewrite";

function readPackageVersion(): string {
  const packageJsonPath = resolvePackageFile("package.json");
  if (!packageJsonPath) return "0.0.0";

  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  if (
    packageJson !== null &&
    typeof packageJson === "object" &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

/**
 * Build the CLI logger from the merged verbosity settings
 */
export function createCliLogger(settings: {
  verbose?: boolean;
  veryVerbose?: boolean;
  quiet?: boolean;
  logLevel?: string;
  logFormat?: LogFormat;
}): Logger {
  return new Logger({
    level: parseLogLevel(settings.logLevel),
    verbose: settings.verbose,
    veryVerbose: settings.veryVerbose,
    quiet: settings.quiet,
    format: settings.logFormat,
    timestamp: false,
    component: "CLI",
  });
}

function reportFailure(error: unknown): ErrorExitCode {
  const wrapped = ErrorUtils.wrapUnknownError(error, SCRIPT_NAME);

  console.error(chalk.red(`❌ ${wrapped.message}`));
  if (wrapped instanceof CliError && wrapped.suggestions?.length) {
    console.error("\n💡 Suggestions:");
    for (const suggestion of wrapped.suggestions) {
      console.error(`   • ${suggestion}`);
    }
  }

  return getExitCode(wrapped.code);
}

/**
 * Load configuration, pick the rule set and rewrite the target file
 */
export function executeRewrite(args: CliArguments): ErrorExitCode {
  try {
    const configResult = loadConfigSync(args);
    const { config } = configResult;
    const cliLogger = createCliLogger(config);

    if (configResult.filepath) {
      cliLogger.debug(`Using configuration from ${configResult.filepath}`);
    }

    const { rules, source } = resolveRuleSet(
      configResult,
      cliLogger.child("Rules"),
    );
    cliLogger.debug(`Loaded ${rules.length} rules from ${source}`);

    for (const cascade of findCascades(rules)) {
      cliLogger.warn(
        `Rule ${cascade.laterIndex + 1} (${cascade.later.match}) matches the replacement of rule ${cascade.earlierIndex + 1} (${cascade.earlier.replacement})`,
      );
    }

    const summary = rewrite(config.target, rules, {
      logger: cliLogger.child("Rewriter"),
    });

    if (!summary.changed) {
      cliLogger.info(`No rule matched anything in ${config.target}`);
    }

    console.log(
      chalk.green(
        `✅ Rewrote field access paths in ${config.target} (${summary.totalReplacements} replacement${summary.totalReplacements === 1 ? "" : "s"})`,
      ),
    );
    return ErrorExitCodes.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}

/**
 * Parse `args` (without the node and script entries) and run the rewrite.
 * Resolves to the process exit code.
 */
export async function runCli(args: string[]): Promise<ErrorExitCode> {
  let exitCode: ErrorExitCode = ErrorExitCodes.SUCCESS;

  try {
    await yargs(args)
      .scriptName(SCRIPT_NAME)
      .usage("Usage: $0 [file] [options]")
      .version(readPackageVersion())
      .alias("version", "v")
      .help()
      .alias("help", "h")
      .option("rules", {
        alias: "r",
        type: "string",
        description: "JSON rule table to apply instead of the bundled one",
      })
      .option("config", {
        alias: "c",
        type: "string",
        description: "Path to configuration file",
      })
      .option("verbose", {
        type: "boolean",
        description: "Enable verbose logging (shows per-rule counts)",
      })
      .option("very-verbose", {
        type: "boolean",
        description: "Enable very verbose logging (shows file operations)",
      })
      .option("quiet", {
        type: "boolean",
        description: "Quiet mode (only warnings and errors)",
      })
      .option("log-level", {
        type: "string",
        choices: LOG_LEVEL_NAMES,
        description: "Set the minimum log level",
      })
      .option("log-format", {
        type: "string",
        choices: LOG_FORMATS,
        description: "Log line format",
      })
      .command(
        "$0 [file]",
        "Rewrite flat field accesses into nested ones, in place",
        (command) =>
          command.positional("file", {
            type: "string",
            description: "File to rewrite (default: src/lib.rs)",
          }),
        (argv) => {
          exitCode = executeRewrite({
            file: argv.file,
            rules: argv.rules,
            config: argv.config,
            verbose: argv.verbose,
            veryVerbose: argv.veryVerbose,
            quiet: argv.quiet,
            logLevel: argv.logLevel,
            logFormat: argv.logFormat,
          });
        },
      )
      .strict()
      .exitProcess(false)
      .fail((message, error) => {
        // Throwing stops yargs before the command handler runs
        throw new CliError(
          message || ErrorUtils.getErrorMessage(error),
          SCRIPT_NAME,
          [`Run ${SCRIPT_NAME} --help to see the available options`],
          error instanceof Error ? error : undefined,
        );
      })
      .parseAsync();
  } catch (error) {
    return reportFailure(error);
  }

  return exitCode;
}
