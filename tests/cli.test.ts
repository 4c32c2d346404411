/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { runCli } from "../src/cli.js";
import { ErrorExitCodes } from "../src/errors.js";

describe("CLI", () => {
  let testDir: string;
  let target: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "field-rewrite-cli-"));
    target = join(testDir, "lib.rs");
    stdout = [];
    stderr = [];

    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      stdout.push(args.map(String).join(" "));
    });
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      stderr.push(args.map(String).join(" "));
    });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  function writeRules(rules: Array<{ match: string; replacement: string }>): string {
    const file = join(testDir, "rules.json");
    writeFileSync(file, JSON.stringify({ rules }));
    return file;
  }

  describe("Help and Version", () => {
    it("should display help information", async () => {
      const exitCode = await runCli(["--help"]);

      expect(exitCode).toBe(ErrorExitCodes.SUCCESS);
      const output = stdout.join("\n");
      expect(output).toContain("field-rewrite");
      expect(output).toContain("--rules");
      expect(output).toContain("--config");
    });

    it("should display version information", async () => {
      const exitCode = await runCli(["--version"]);

      expect(exitCode).toBe(ErrorExitCodes.SUCCESS);
      expect(stdout).toContain("1.0.0");
    });
  });

  describe("Rewriting", () => {
    it("should rewrite the file with the bundled rules", async () => {
      writeFileSync(
        target,
        "let x = self.search_query.len();\nself.anchor_row = 5;",
      );

      const exitCode = await runCli([target]);

      expect(exitCode).toBe(ErrorExitCodes.SUCCESS);
      expect(readFileSync(target, "utf8")).toBe(
        "let x = self.search.search_query.len();\nself.selection.anchor_row = 5;",
      );
      expect(stdout.join("\n")).toContain(
        `✅ Rewrote field access paths in ${target} (2 replacements)`,
      );
      expect(stderr).toEqual([]);
    });

    it("should apply a rules file given with --rules", async () => {
      writeFileSync(target, "self.x + self.y");
      const rules = writeRules([{ match: "self.x", replacement: "self.pos.x" }]);

      const exitCode = await runCli([target, "--rules", rules]);

      expect(exitCode).toBe(ErrorExitCodes.SUCCESS);
      expect(readFileSync(target, "utf8")).toBe("self.pos.x + self.y");
      expect(stdout.join("\n")).toContain("(1 replacement)");
    });

    it("should show per-rule counts with --verbose", async () => {
      writeFileSync(target, "self.search_query");

      await runCli([target, "--verbose"]);

      expect(stdout).toContain(
        "DEBUG [Rewriter] 🔄 self.search_query → self.search.search_query: 1 replacement",
      );
      expect(stdout).toContain(
        "DEBUG [Rewriter] 🔄 self.anchor_row → self.selection.anchor_row: 0 replacements",
      );
    });

    it("should warn about cascading rules", async () => {
      writeFileSync(target, "self.editing_row = 1;");
      const rules = writeRules([
        { match: "self.editing_row", replacement: "self.editing.editing_row" },
        { match: "self.editing", replacement: "X" },
      ]);

      const exitCode = await runCli([target, "-r", rules]);

      expect(exitCode).toBe(ErrorExitCodes.SUCCESS);
      expect(stdout).toContain(
        "WARN  [CLI] Rule 2 (self.editing) matches the replacement of rule 1 (self.editing.editing_row)",
      );
      expect(readFileSync(target, "utf8")).toBe("X.editing_row = 1;");
    });

    it("should write JSON log lines with --log-format json", async () => {
      writeFileSync(target, "self.search_query");

      const exitCode = await runCli([target, "--verbose", "--log-format", "json"]);

      expect(exitCode).toBe(ErrorExitCodes.SUCCESS);
      const entries: unknown[] = stdout
        .filter((line) => line.startsWith("{"))
        .map((line): unknown => JSON.parse(line));
      expect(entries).toContainEqual(
        expect.objectContaining({
          level: "DEBUG",
          component: "Rewriter",
          message: "🔄 self.search_query → self.search.search_query: 1 replacement",
        }),
      );
    });

    it("should read the target from a config file", async () => {
      writeFileSync(target, "self.anchor_row");
      const config = join(testDir, "rewrite.json");
      writeFileSync(config, JSON.stringify({ target: "lib.rs" }));

      const exitCode = await runCli(["--config", config]);

      expect(exitCode).toBe(ErrorExitCodes.SUCCESS);
      expect(readFileSync(target, "utf8")).toBe("self.selection.anchor_row");
    });
  });

  describe("Failures", () => {
    it("should exit with the file error code when the target is missing", async () => {
      const missing = join(testDir, "missing.rs");

      const exitCode = await runCli([missing]);

      expect(exitCode).toBe(ErrorExitCodes.FILE_ERROR);
      expect(stderr.join("\n")).toContain(`❌ Cannot read ${missing}`);
      expect(stdout.join("\n")).not.toContain("✅");
    });

    it("should exit with the validation code for a bad rules file", async () => {
      writeFileSync(target, "self.anchor_row");
      const rules = writeRules([{ match: "", replacement: "x" }]);

      const exitCode = await runCli([target, "--rules", rules]);

      expect(exitCode).toBe(ErrorExitCodes.VALIDATION_ERROR);
      expect(readFileSync(target, "utf8")).toBe("self.anchor_row");
    });

    it("should exit with the config code for an invalid config file", async () => {
      const config = join(testDir, "rewrite.json");
      writeFileSync(config, JSON.stringify({ quiet: "yes" }));

      const exitCode = await runCli([target, "--config", config]);

      expect(exitCode).toBe(ErrorExitCodes.CONFIG_ERROR);
    });

    it("should reject unknown options without touching the file", async () => {
      writeFileSync(target, "self.anchor_row = 1;");

      const exitCode = await runCli([target, "--bogus"]);

      expect(exitCode).toBe(ErrorExitCodes.CLI_ERROR);
      expect(stderr[0]).toContain("❌ Unknown argument: bogus");
      expect(stdout.join("\n")).not.toContain("✅");
      expect(readFileSync(target, "utf8")).toBe("self.anchor_row = 1;");
    });

    it("should reject an unknown log level without touching the file", async () => {
      writeFileSync(target, "self.anchor_row = 1;");

      const exitCode = await runCli([target, "--log-level", "loud"]);

      expect(exitCode).toBe(ErrorExitCodes.CLI_ERROR);
      expect(stderr.join("\n")).toContain("Invalid values");
      expect(readFileSync(target, "utf8")).toBe("self.anchor_row = 1;");
    });

    it("should print a hint after an argument error", async () => {
      writeFileSync(target, "self.anchor_row = 1;");

      await runCli([target, "--log-format", "xml"]);

      expect(stderr).toContain(
        "   • Run field-rewrite --help to see the available options",
      );
    });
  });
});
