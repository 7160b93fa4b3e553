import { describe, it, expect, vi, beforeAll, afterEach } from "vitest";
import chalk from "chalk";

import {
  ConfigError,
  ValidationError,
  formatError,
  getErrorHelp,
  parsePositiveNumber,
  withErrorHandling,
} from "../../../src/cli/error-handler.js";
import { NoProviderAvailableError } from "../../../src/agent/errors.js";

beforeAll(() => {
  chalk.level = 0;
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe("formatError()", () => {
  it("shows the title and suggestion for CLI errors", () => {
    expect(formatError(new ConfigError("bad file", "Fix it"))).toBe(
      "Configuration Error: bad file\nSuggestion: Fix it"
    );
    expect(formatError(new ValidationError("bad flag"))).toBe(
      "Validation Error: bad flag\nHint: Check the command arguments and try again."
    );
  });

  it("adds help for provider exhaustion", () => {
    const err = new NoProviderAvailableError([]);
    expect(formatError(err)).toBe(
      "Error: No LLM providers available: fallback_order is empty\n" +
        "Suggestion: Add an enabled, configured provider to credentials.json and list it in fallback_order."
    );
  });

  it("prints non-errors as strings", () => {
    expect(formatError("plain")).toBe("Error: plain");
  });
});

describe("getErrorHelp()", () => {
  it("matches common failure messages", () => {
    expect(getErrorHelp(new Error("needs an inference profile id"))).toBe(
      "Use a region-prefixed Bedrock model id such as us.<model-id>."
    );
    expect(getErrorHelp(new Error("ENOENT: no such file"))).toBe(
      "A required file or directory was not found. Check the workspace path."
    );
    expect(getErrorHelp(new Error("something else"))).toBeNull();
  });
});

describe("withErrorHandling()", () => {
  it("reports the error and sets a failing exit code", async () => {
    const printed: string[] = [];
    vi.spyOn(console, "error").mockImplementation((value?: unknown) => {
      printed.push(String(value));
    });

    const wrapped = withErrorHandling(async () => {
      throw new ValidationError("nope", "try again");
    });

    await expect(wrapped()).resolves.toBeUndefined();
    expect(process.exitCode).toBe(1);
    expect(printed).toEqual(["Validation Error: nope\nSuggestion: try again"]);
  });

  it("passes results through", async () => {
    const wrapped = withErrorHandling(async (n: number) => n * 2);
    await expect(wrapped(21)).resolves.toBe(42);
  });
});

describe("parsePositiveNumber()", () => {
  it("parses positive values and rejects the rest", () => {
    expect(parsePositiveNumber("2.5", "--interval")).toBe(2.5);
    expect(() => parsePositiveNumber("0", "--interval")).toThrow('--interval must be a positive number, got "0"');
    expect(() => parsePositiveNumber("abc", "--count")).toThrow(ValidationError);
  });
});
