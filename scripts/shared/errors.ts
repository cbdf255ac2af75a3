/**
 * Unified error handling utilities for consistent and actionable error messages.
 *
 * Provides:
 * - Standardized error types across all standup scripts
 * - Actionable error messages with suggested fixes
 * - Consistent error formatting with chalk
 */

import chalk from "chalk";

/**
 * Base application error with actionable suggestions
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly suggestions: string[] = [],
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Format error for display with suggestions
   */
  format(): string {
    let output = chalk.red(`❌ ${this.name}: ${this.message}`);

    if (this.suggestions.length > 0) {
      output += chalk.gray("\n\n💡 Suggestions:");
      for (const suggestion of this.suggestions) {
        output += chalk.gray(`\n   - ${suggestion}`);
      }
    }

    if (this.context && Object.keys(this.context).length > 0) {
      output += chalk.gray("\n\n📋 Context:");
      for (const [key, value] of Object.entries(this.context)) {
        output += chalk.gray(`\n   ${key}: ${JSON.stringify(value)}`);
      }
    }

    return output;
  }
}

/**
 * Configuration or environment-related errors
 */
export class ConfigError extends AppError {
  constructor(
    message: string,
    suggestions: string[] = [],
    context?: Record<string, unknown>
  ) {
    const defaultSuggestions = [
      "Check your .env file configuration",
      "Ensure all required environment variables are set",
      "See .env.example for the supported variables",
    ];
    super(message, [...defaultSuggestions, ...suggestions], context);
  }
}

/**
 * Network or API-related errors
 */
export class NetworkError extends AppError {
  constructor(
    message: string,
    suggestions: string[] = [],
    context?: Record<string, unknown>,
    public readonly originalError?: unknown
  ) {
    const defaultSuggestions = [
      "Check your internet connection",
      "Verify API credentials are valid",
      "Make sure the integration is shared with the database",
    ];
    super(message, [...defaultSuggestions, ...suggestions], context);
  }
}

/**
 * Input document validation or parsing errors
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    suggestions: string[] = [],
    context?: Record<string, unknown>
  ) {
    const defaultSuggestions = [
      "Verify the input data format is correct",
      "Re-run notion:standups to regenerate the standup document",
    ];
    super(message, [...defaultSuggestions, ...suggestions], context);
  }
}

/**
 * File system or I/O errors
 */
export class FileSystemError extends AppError {
  constructor(
    message: string,
    suggestions: string[] = [],
    context?: Record<string, unknown>
  ) {
    const defaultSuggestions = [
      "Check file permissions",
      "Ensure the file or directory exists",
      "Verify sufficient disk space",
    ];
    super(message, [...defaultSuggestions, ...suggestions], context);
  }
}

/**
 * A single page's block tree could not be fetched completely.
 * The page is still emitted with whatever blocks were collected.
 */
export class PartialExpansionError extends AppError {
  constructor(
    public readonly pageId: string,
    public readonly blocksFetched: number,
    public readonly originalError?: unknown
  ) {
    super(
      `Failed to fetch all blocks for page ${pageId}: ${toErrorMessage(originalError)}`,
      ["The page was kept with partial content; re-run to refresh it"],
      { pageId, blocksFetched }
    );
  }
}

/**
 * Text generation failed for one project group
 */
export class GenerationError extends AppError {
  constructor(
    public readonly projectName: string,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(
      message,
      [
        "Check that the model server is running and reachable",
        "Verify AI_MODEL_NAME names a model the server provides",
      ],
      { projectName }
    );
  }
}

/**
 * Extract a printable message from anything that was thrown
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Log an error with consistent formatting
 */
export function logError(error: unknown, context?: string): void {
  const prefix = context ? chalk.gray(`[${context}]`) : "";

  if (error instanceof AppError) {
    console.error(`${prefix} ${error.format()}`);
  } else if (error instanceof Error) {
    console.error(
      `${prefix} ${chalk.red("❌ Error:")} ${chalk.white(error.message)}`
    );
    if (error.stack) {
      console.error(chalk.gray("\nStack trace:"));
      console.error(chalk.gray(error.stack.split("\n").slice(1, 3).join("\n")));
    }
  } else {
    console.error(
      `${prefix} ${chalk.red("❌ Unknown error:")} ${chalk.white(String(error))}`
    );
  }
}

/**
 * Log a warning with consistent formatting
 */
export function logWarning(message: string, context?: string): void {
  const prefix = context ? chalk.gray(`[${context}]`) : "";
  console.warn(
    `${prefix} ${chalk.yellow("⚠️  Warning:")} ${chalk.white(message)}`
  );
}

/**
 * Log an info message with consistent formatting
 */
export function logInfo(message: string, context?: string): void {
  const prefix = context ? chalk.gray(`[${context}]`) : "";
  console.info(`${prefix} ${chalk.blue("ℹ️  Info:")} ${chalk.white(message)}`);
}

/**
 * Log success message with consistent formatting
 */
export function logSuccess(message: string, context?: string): void {
  const prefix = context ? chalk.gray(`[${context}]`) : "";
  console.log(
    `${prefix} ${chalk.green("✅ Success:")} ${chalk.white(message)}`
  );
}
