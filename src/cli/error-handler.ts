/**
 * Error Handler - Consistent error reporting for CLI commands
 */

import chalk from "chalk";

import { NoProviderAvailableError } from "../agent/errors.js";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;
  readonly suggestion?: string;

  constructor(message: string, options: { code: string; details?: Record<string, unknown>; suggestion?: string } = { code: "CLI_ERROR" }) {
    super(message);
    this.name = "CliError";
    this.code = options.code;
    this.details = options.details;
    this.suggestion = options.suggestion;
  }
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, { code: "CONFIG_ERROR", suggestion });
    this.name = "ConfigError";
  }
}

/**
 * Validation error (invalid input, etc)
 */
export class ValidationError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, { code: "VALIDATION_ERROR", suggestion });
    this.name = "ValidationError";
  }
}

const ERROR_MESSAGES: Record<string, { title: string; help: string }> = {
  CONFIG_ERROR: {
    title: "Configuration Error",
    help: "Check servant.config.json and credentials.json for issues.",
  },
  VALIDATION_ERROR: {
    title: "Validation Error",
    help: "Check the command arguments and try again.",
  },
  CLI_ERROR: {
    title: "CLI Error",
    help: "Run 'servant --help' for usage information.",
  },
};

const FALLBACK_META = { title: "CLI Error", help: "Run 'servant --help' for usage information." };

/**
 * Format an error for display
 */
export function formatError(err: unknown, verbose = false): string {
  const lines: string[] = [];

  if (err instanceof CliError) {
    const meta = ERROR_MESSAGES[err.code] ?? FALLBACK_META;
    lines.push(chalk.red.bold(`${meta.title}: `) + err.message);

    if (err.suggestion) {
      lines.push(chalk.yellow("Suggestion: ") + err.suggestion);
    } else {
      lines.push(chalk.dim(`Hint: ${meta.help}`));
    }

    if (verbose && err.details) {
      lines.push(chalk.dim("\nDetails:"));
      lines.push(chalk.dim(JSON.stringify(err.details, null, 2)));
    }
  } else if (err instanceof Error) {
    lines.push(chalk.red.bold("Error: ") + err.message);

    const help = getErrorHelp(err);
    if (help) {
      lines.push(chalk.yellow("Suggestion: ") + help);
    }

    if (verbose && err.stack) {
      lines.push(chalk.dim("\nStack trace:"));
      lines.push(chalk.dim(err.stack));
    }
  } else {
    lines.push(chalk.red.bold("Error: ") + String(err));
  }

  return lines.join("\n");
}

/**
 * Wrap an async command handler with error handling
 */
export function withErrorHandling<T extends unknown[], R>(
  fn: (...args: T) => Promise<R>,
  options: { verbose?: boolean } = {}
): (...args: T) => Promise<R | undefined> {
  return async (...args: T): Promise<R | undefined> => {
    try {
      return await fn(...args);
    } catch (err) {
      console.error(formatError(err, options.verbose));
      process.exitCode = 1;
      return undefined;
    }
  };
}

/**
 * Parse a positive number option
 */
export function parsePositiveNumber(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ValidationError(`${name} must be a positive number, got "${value}"`);
  }
  return parsed;
}

/**
 * Display a user-friendly message for common errors
 */
export function getErrorHelp(err: unknown): string | null {
  if (err instanceof NoProviderAvailableError) {
    return "Add an enabled, configured provider to credentials.json and list it in fallback_order.";
  }

  if (err instanceof Error) {
    const msg = err.message.toLowerCase();

    if (msg.includes("inference profile")) {
      return "Use a region-prefixed Bedrock model id such as us.<model-id>.";
    }

    if (msg.includes("api key")) {
      return "API key is missing or invalid. Check credentials.json or the provider's environment variable.";
    }

    if (msg.includes("enoent")) {
      return "A required file or directory was not found. Check the workspace path.";
    }
  }

  return null;
}
