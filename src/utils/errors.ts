/**
 * Error handling for ticketplan
 * Custom error types with context and recovery information
 */

/**
 * Base error class for ticketplan
 */
export class PlannerError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: string;
      context?: Record<string, unknown>;
      recoverable?: boolean;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "PlannerError";
    this.code = options.code;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;

    // Capture stack trace
    Error.captureStackTrace(this, PlannerError);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * File system error
 */
export class FileSystemError extends PlannerError {
  constructor(
    message: string,
    options: {
      path: string;
      operation: "read" | "write" | "delete" | "exists";
      cause?: Error;
    },
  ) {
    super(message, {
      code: "FILESYSTEM_ERROR",
      context: { path: options.path, operation: options.operation },
      recoverable: false,
      suggestion: `Check that the path exists and you have permissions: ${options.path}`,
      cause: options.cause,
    });
    this.name = "FileSystemError";
  }
}

/**
 * Generative model error
 */
export class ProviderError extends PlannerError {
  readonly provider: string;
  readonly statusCode?: number;

  constructor(
    message: string,
    options: {
      provider: string;
      statusCode?: number;
      retryable?: boolean;
      cause?: Error;
    },
  ) {
    super(message, {
      code: "PROVIDER_ERROR",
      context: { provider: options.provider, statusCode: options.statusCode },
      recoverable: options.retryable ?? false,
      suggestion: options.retryable
        ? "The request can be retried"
        : "Check your API key and model configuration",
      cause: options.cause,
    });
    this.name = "ProviderError";
    this.provider = options.provider;
    this.statusCode = options.statusCode;
  }
}

/**
 * Configuration error
 */
export class ConfigError extends PlannerError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      issues?: ConfigIssue[];
      configPath?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "CONFIG_ERROR",
      context: { configPath: options.configPath, issues: options.issues },
      recoverable: true,
      suggestion: "Check your .ticketplan/config.json for errors",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues as a readable string
   */
  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Invalid user input (ticket id, CLI arguments)
 */
export class ValidationError extends PlannerError {
  readonly field?: string;

  constructor(
    message: string,
    options: {
      field?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "VALIDATION_ERROR",
      context: { field: options.field },
      recoverable: false,
      suggestion: "Check the input format",
      cause: options.cause,
    });
    this.name = "ValidationError";
    this.field = options.field;
  }
}

/**
 * The documentation container named by a ticket could not be found.
 * Fatal: nothing downstream can run without a location.
 */
export class LocationNotFoundError extends PlannerError {
  readonly locator: string;
  readonly folderName: string;
  readonly space: string;

  constructor(
    message: string,
    options: {
      locator: string;
      folderName: string;
      space: string;
      cause?: Error;
    },
  ) {
    super(message, {
      code: "LOCATION_NOT_FOUND",
      context: { locator: options.locator, folderName: options.folderName, space: options.space },
      recoverable: false,
      suggestion:
        "Check the ticket's Project Folder / Project Link fields point at an existing documentation folder",
      cause: options.cause,
    });
    this.name = "LocationNotFoundError";
    this.locator = options.locator;
    this.folderName = options.folderName;
    this.space = options.space;
  }
}

/**
 * Check if error is a ticketplan error
 */
export function isPlannerError(error: unknown): error is PlannerError {
  return error instanceof PlannerError;
}

/**
 * Default suggestions for common error codes.
 * Used as fallback when an error doesn't have a specific suggestion.
 */
export const ERROR_SUGGESTIONS: Record<string, string> = {
  PROVIDER_ERROR: "Check DEEPSEEK_API_KEY / OPENAI_API_KEY and the model settings.",
  CONFIG_ERROR: "Check your .ticketplan/config.json.",
  FILESYSTEM_ERROR: "Check that the path exists and you have read/write permissions.",
  VALIDATION_ERROR: "Pass a ticket key such as PROJ-123 or a ticket URL.",
  LOCATION_NOT_FOUND: "Fix the ticket's documentation folder fields and run again.",
  TRANSPORT_ERROR: "Check that the ticket and document servers are configured and reachable.",
  UNEXPECTED_ERROR: "An unexpected error occurred. Re-run with --log-level debug for details.",
};

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof PlannerError) {
    let message = `[${error.code}] ${error.message}`;
    if (error instanceof ConfigError && error.issues.length > 0) {
      message += `\n${error.formatIssues()}`;
    }
    const suggestion = error.suggestion ?? ERROR_SUGGESTIONS[error.code];
    if (suggestion) {
      message += `\n  Suggestion: ${suggestion}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return `${error.message}\n  Suggestion: ${ERROR_SUGGESTIONS["UNEXPECTED_ERROR"]}`;
  }

  return String(error);
}

/**
 * True for fs errors raised because a path does not exist
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Render any thrown value as a single line for warning lists
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
