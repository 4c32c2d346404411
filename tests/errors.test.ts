/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { describe, it, expect, vi } from "vitest";
import {
  CliError,
  ConfigError,
  ErrorExitCodes,
  ErrorUtils,
  FieldRewriteError,
  FileReadError,
  FileWriteError,
  ValidationError,
  getExitCode,
} from "../src/errors.js";
import { logger } from "../src/logger.js";

describe("Error classes", () => {
  it("should carry code, name and file path for file errors", () => {
    const cause = new Error("ENOENT: no such file or directory");
    const error = new FileReadError("Cannot read src/lib.rs", "src/lib.rs", cause);

    expect(error).toBeInstanceOf(FieldRewriteError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("FileReadError");
    expect(error.code).toBe("FILE_READ_ERROR");
    expect(error.filePath).toBe("src/lib.rs");
    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({
      component: "FileSystem",
      filePath: "src/lib.rs",
    });
  });

  it("should prefix the error id with the code", () => {
    const error = new FileWriteError("Cannot write out.rs", "out.rs");

    expect(error.code).toBe("FILE_WRITE_ERROR");
    expect(error.errorId.startsWith("FILE_WRITE_ERROR-")).toBe(true);
  });

  it("should record the config file path", () => {
    const error = new ConfigError("Invalid configuration", "rc.json");

    expect(error.filepath).toBe("rc.json");
    expect(error.context).toMatchObject({ component: "Config", filePath: "rc.json" });
  });

  it("should stringify object values in validation context", () => {
    const error = new ValidationError("bad rule", "rules.0", { match: "" });

    expect(error.field).toBe("rules.0");
    expect(error.value).toEqual({ match: "" });
    expect(error.context?.value).toBe('{"match":""}');
  });

  it("should keep CLI suggestions", () => {
    const error = new CliError("Unknown argument: bogus", "rewrite", [
      "Run with --help",
    ]);

    expect(error.command).toBe("rewrite");
    expect(error.suggestions).toEqual(["Run with --help"]);
    expect(error.context?.suggestions).toBe("Run with --help");
  });

  it("should log creation at debug level", () => {
    const debug = vi.spyOn(logger, "debug").mockImplementation(() => {});

    const error = new ConfigError("boom");

    expect(debug).toHaveBeenCalledWith("ConfigError: boom", {
      component: "Config",
      filePath: undefined,
      errorId: error.errorId,
      errorCode: "CONFIG_ERROR",
    });
  });

  it("should serialize the cause in toJSON", () => {
    const cause = new TypeError("not a string");
    const json = new ValidationError("bad", "match", 5, cause).toJSON();

    expect(json).toMatchObject({
      name: "ValidationError",
      message: "bad",
      code: "VALIDATION_ERROR",
      cause: { name: "TypeError", message: "not a string" },
    });
    expect(json.cause).toHaveProperty("stack");
  });

  it("should leave cause undefined in toJSON without one", () => {
    expect(new CliError("oops").toJSON().cause).toBeUndefined();
  });
});

describe("ErrorUtils", () => {
  it("should check error types", () => {
    const error = new FileReadError("Cannot read x");

    expect(ErrorUtils.isErrorType(error, FileReadError)).toBe(true);
    expect(ErrorUtils.isErrorType(error, FileWriteError)).toBe(false);
    expect(ErrorUtils.isErrorType(new Error("x"), FieldRewriteError)).toBe(false);
  });

  it("should extract messages from anything", () => {
    expect(ErrorUtils.getErrorMessage(new Error("plain"))).toBe("plain");
    expect(ErrorUtils.getErrorMessage("text")).toBe("text");
    expect(ErrorUtils.getErrorMessage(42)).toBe("42");
  });

  it("should only report codes of rewriter errors", () => {
    expect(ErrorUtils.getErrorCode(new ConfigError("x"))).toBe("CONFIG_ERROR");
    expect(ErrorUtils.getErrorCode(new Error("x"))).toBeUndefined();
  });

  it("should return rewriter errors unchanged when wrapping", () => {
    const error = new ConfigError("x");

    expect(ErrorUtils.wrapUnknownError(error, "load")).toBe(error);
  });

  it("should wrap plain errors and keep the cause", () => {
    const cause = new RangeError("too deep");

    const wrapped = ErrorUtils.wrapUnknownError(cause, "rewrite");

    expect(wrapped).toBeInstanceOf(FieldRewriteError);
    expect(wrapped.message).toBe("Unknown error in rewrite: too deep");
    expect(wrapped.code).toBe("UNKNOWN_ERROR");
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.context).toEqual({ operation: "rewrite" });
  });

  it("should wrap thrown non-errors", () => {
    const wrapped = ErrorUtils.wrapUnknownError("disk on fire", "write");

    expect(wrapped.message).toBe("Unknown error in write: disk on fire");
    expect(wrapped.cause).toBeUndefined();
  });
});

describe("getExitCode", () => {
  it("should map error codes to exit codes", () => {
    expect(getExitCode("CONFIG_ERROR")).toBe(ErrorExitCodes.CONFIG_ERROR);
    expect(getExitCode("FILE_READ_ERROR")).toBe(ErrorExitCodes.FILE_ERROR);
    expect(getExitCode("FILE_WRITE_ERROR")).toBe(ErrorExitCodes.FILE_ERROR);
    expect(getExitCode("VALIDATION_ERROR")).toBe(ErrorExitCodes.VALIDATION_ERROR);
    expect(getExitCode("CLI_ERROR")).toBe(ErrorExitCodes.CLI_ERROR);
  });

  it("should fall back to the generic code", () => {
    expect(getExitCode("UNKNOWN_ERROR")).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});
