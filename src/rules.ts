/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Rename rules: the data model, the JSON rule-table loader and the
 * boundary-aware matcher each rule compiles to.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { FileReadError, ValidationError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { resolvePackageFile } from "./pathUtils.js";

const rulesLogger = createLogger("Rules");

export const BUNDLED_RULES_FILE = "rules/field-paths.json";

/** Characters that can continue an identifier */
const IDENTIFIER_CHAR = /[A-Za-z0-9_]/;

export const RuleSchema = z.object({
  match: z
    .string()
    .min(1, "match must not be empty")
    .describe("Literal token sequence to find, e.g. self.anchor_row"),
  replacement: z
    .string()
    .describe("Literal text substituted for every match"),
  description: z.string().optional(),
});

export type Rule = z.infer<typeof RuleSchema>;

export type RuleSet = readonly Rule[];

export const RuleSetFileSchema = z.object({
  rules: z.array(RuleSchema),
});

export type RuleSetFile = z.infer<typeof RuleSetFileSchema>;

export interface CompiledRule {
  rule: Rule;
  /** Global matcher; reset `lastIndex` or use String#replace */
  pattern: RegExp;
}

/**
 * A later rule whose matcher finds text an earlier rule introduces
 */
export interface RuleCascade {
  earlierIndex: number;
  laterIndex: number;
  earlier: Rule;
  later: Rule;
}

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build the matcher for a rule.
 *
 * An edge of the match that is an identifier character must not touch
 * another identifier character, so `self.anchor_row` never matches inside
 * `xself.anchor_rowx`. An edge that is punctuation carries no guard.
 */
export function compileRule(rule: Rule): CompiledRule {
  if (rule.match.length === 0) {
    throw new ValidationError("Rule match must not be empty", "match", rule);
  }

  const first = rule.match.charAt(0);
  const last = rule.match.charAt(rule.match.length - 1);
  const before = IDENTIFIER_CHAR.test(first) ? "(?<![A-Za-z0-9_])" : "";
  const after = IDENTIFIER_CHAR.test(last) ? "(?![A-Za-z0-9_])" : "";

  return {
    rule,
    pattern: new RegExp(`${before}${escapeRegex(rule.match)}${after}`, "g"),
  };
}

export function compileRuleSet(rules: RuleSet): CompiledRule[] {
  return rules.map(compileRule);
}

/**
 * Validate an already-parsed rule table
 */
export function parseRuleSet(data: unknown, source?: string): Rule[] {
  const result = RuleSetFileSchema.safeParse(data);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new ValidationError(
      `Invalid rule table${source ? ` in ${source}` : ""}:\n${issues}`,
      "rules",
      source,
      result.error,
      { operation: "parseRuleSet", issueCount: result.error.issues.length },
    );
  }

  return result.data.rules;
}

/**
 * Read and validate a JSON rule table
 */
export function loadRuleSet(
  filePath: string,
  log: Logger = rulesLogger,
): Rule[] {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf8");
  } catch (error) {
    throw new FileReadError(
      `Cannot read rule table ${filePath}`,
      filePath,
      error instanceof Error ? error : undefined,
      { operation: "loadRuleSet" },
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `Rule table ${filePath} is not valid JSON`,
      "rules",
      filePath,
      error instanceof Error ? error : undefined,
      { operation: "loadRuleSet" },
    );
  }

  const rules = parseRuleSet(data, filePath);
  log.debug("Loaded rule table", {
    filePath,
    ruleCount: rules.length,
  });
  return rules;
}

/**
 * Load the rename table shipped with the package
 */
export function loadDefaultRuleSet(log: Logger = rulesLogger): Rule[] {
  const filePath = resolvePackageFile(BUNDLED_RULES_FILE);
  if (!filePath) {
    throw new FileReadError(
      `Bundled rule table ${BUNDLED_RULES_FILE} not found`,
      BUNDLED_RULES_FILE,
      undefined,
      { operation: "loadDefaultRuleSet" },
    );
  }
  return loadRuleSet(filePath, log);
}

/**
 * Find every pair where a later rule matches inside an earlier rule's
 * replacement text, i.e. where list order changes the output.
 */
export function findCascades(rules: RuleSet): RuleCascade[] {
  const compiled = compileRuleSet(rules);
  const cascades: RuleCascade[] = [];

  compiled.forEach((earlier, earlierIndex) => {
    for (
      let laterIndex = earlierIndex + 1;
      laterIndex < compiled.length;
      laterIndex++
    ) {
      const later = compiled[laterIndex];
      if (later === undefined) continue;

      later.pattern.lastIndex = 0;
      if (later.pattern.test(earlier.rule.replacement)) {
        cascades.push({
          earlierIndex,
          laterIndex,
          earlier: earlier.rule,
          later: later.rule,
        });
      }
      later.pattern.lastIndex = 0;
    }
  });

  return cascades;
}
