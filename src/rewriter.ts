/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Field-path rewrite engine.
 *
 * Reads one file into memory, runs an ordered rule set over the whole buffer
 * (each rule sees the output of the previous one) and stores the result in
 * place. Matching is purely lexical.
 */

import { accessSync, constants, readFileSync } from "fs";
import writeFileAtomic from "write-file-atomic";
import { FileReadError, FileWriteError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { compileRule, type Rule, type RuleSet } from "./rules.js";

const rewriteLogger = createLogger("Rewriter");

export interface RuleApplication {
  text: string;
  count: number;
}

export interface RuleSetApplication {
  text: string;
  /** Replacement count per rule, in rule order */
  counts: number[];
}

export interface RuleReport {
  match: string;
  replacement: string;
  count: number;
}

export interface RewriteOptions {
  /** Receives per-rule counts (verbose) and file operations (very verbose) */
  logger?: Logger;
}

export interface RewriteSummary {
  filePath: string;
  rules: RuleReport[];
  totalReplacements: number;
  changed: boolean;
  bytesBefore: number;
  bytesAfter: number;
}

/**
 * Replace every non-overlapping occurrence of one rule, scanning left to
 * right. The replacement is inserted literally.
 */
export function applyRule(buffer: string, rule: Rule): RuleApplication {
  const { pattern } = compileRule(rule);
  let count = 0;

  const text = buffer.replace(pattern, () => {
    count++;
    return rule.replacement;
  });

  return { text, count };
}

/**
 * Apply rules in order, each over the entire current buffer
 */
export function applyRules(buffer: string, rules: RuleSet): RuleSetApplication {
  const counts: number[] = [];
  let text = buffer;

  for (const rule of rules) {
    const result = applyRule(text, rule);
    text = result.text;
    counts.push(result.count);
  }

  return { text, counts };
}

function readSource(filePath: string): string {
  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (error) {
    throw new FileReadError(
      `Cannot read ${filePath}`,
      filePath,
      error instanceof Error ? error : undefined,
      { operation: "readSource" },
    );
  }

  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(
      bytes,
    );
  } catch (error) {
    throw new FileReadError(
      `${filePath} is not valid UTF-8 text`,
      filePath,
      error instanceof Error ? error : undefined,
      { operation: "readSource", fileSize: bytes.length },
    );
  }
}

/**
 * write-file-atomic renames a temp file over the target, which succeeds on a
 * read-only target in a writable directory. Refuse such targets up front.
 */
function assertWritable(filePath: string): void {
  try {
    accessSync(filePath, constants.W_OK);
  } catch (error) {
    throw new FileWriteError(
      `Cannot write ${filePath}`,
      filePath,
      error instanceof Error ? error : undefined,
      { operation: "assertWritable" },
    );
  }
}

function writeSource(filePath: string, text: string): void {
  try {
    // Temp file + rename: a failed write leaves the original in place
    writeFileAtomic.sync(filePath, text, { encoding: "utf8" });
  } catch (error) {
    throw new FileWriteError(
      `Cannot write ${filePath}`,
      filePath,
      error instanceof Error ? error : undefined,
      { operation: "writeSource" },
    );
  }
}

/**
 * Rewrite `filePath` in place with `rules`.
 *
 * @throws FileReadError before anything is written
 * @throws FileWriteError with the original file untouched, including when
 * the target is not writable
 */
export function rewrite(
  filePath: string,
  rules: RuleSet,
  options: RewriteOptions = {},
): RewriteSummary {
  const log = options.logger ?? rewriteLogger;
  const startTime = Date.now();

  const source = readSource(filePath);
  const bytesBefore = Buffer.byteLength(source, "utf8");
  log.fileOperation("Read", filePath, bytesBefore);
  assertWritable(filePath);

  const { text, counts } = applyRules(source, rules);

  const reports = rules.map((rule, index) => ({
    match: rule.match,
    replacement: rule.replacement,
    count: counts[index] ?? 0,
  }));
  for (const report of reports) {
    log.processStep(
      `${report.match} → ${report.replacement}`,
      `${report.count} replacement${report.count === 1 ? "" : "s"}`,
    );
  }

  writeSource(filePath, text);
  const bytesAfter = Buffer.byteLength(text, "utf8");
  log.fileOperation("Write", filePath, bytesAfter);
  log.timing("rewrite", Date.now() - startTime, { filePath });

  return {
    filePath,
    rules: reports,
    totalReplacements: counts.reduce((sum, count) => sum + count, 0),
    changed: text !== source,
    bytesBefore,
    bytesAfter,
  };
}
