import chalk from 'chalk';
import { BaseError, describeError } from './base.error';
import { DocumentIoError, DocumentParseError } from './document.error';
import { CommandResult, ENV_VARS } from '../types/config.types';
import { logger } from '../utils/logger.service';

/**
 * Where an error surfaced
 */
export interface ErrorContext {
  command?: string | undefined;
  args: string[];
  workingDirectory: string;
}

/**
 * User facing rendering of an error
 */
export interface ErrorReport {
  message: string;
  suggestions: string[];
  exitCode: number;
}

const SUGGESTIONS: Record<string, string[]> = {
  NO_HOME: [
    `Set ${ENV_VARS.home}, or point ${ENV_VARS.configDirOverride} at a configuration directory`,
  ],
  LOCATOR_IO: ['Check the permissions of the configuration directory'],
  DOCUMENT_PARSE_ERROR: ['Fix the TOML syntax at the reported line and column'],
  DOCUMENT_IO_ERROR: ['Check that the configuration file is readable and its directory writable'],
  DOCUMENT_VALIDATION_ERROR: ["Check the 'repos' and 'hooks' sections of config.toml"],
  DUPLICATE_REPO: ["Pick another name, or rename the existing repository with 'tendril rename'"],
  ENTRY_NOT_FOUND: ["Run 'tendril list' to see configured repositories"],
  SCRIPT_NOT_FOUND: ['Create the script in the hooks directory or remove it from config.toml'],
  HOOK_ABORT: ['Fix the failing hook, or run without --abort-on-hook-failure'],
  INVALID_PATH: ['Check the path for empty or invalid characters'],
  INVALID_SETTING: ['Hook run mode must be one of: always, never, prompt'],
};

const USAGE_ERRORS = new Set(['DUPLICATE_REPO', 'ENTRY_NOT_FOUND', 'INVALID_PATH', 'INVALID_SETTING']);

/**
 * Turns thrown errors into messages, suggestions and exit codes
 */
export class EnhancedErrorHandler {
  public static createContext(
    command: string | undefined,
    args: string[],
    workingDirectory: string,
  ): ErrorContext {
    return { command, args, workingDirectory };
  }

  public static describe(error: unknown, context: ErrorContext): ErrorReport {
    if (!(error instanceof BaseError)) {
      return {
        message: describeError(error),
        suggestions: ['Run again with --verbose for more details'],
        exitCode: 1,
      };
    }

    let message = error.toString();
    if (error instanceof DocumentParseError) {
      message = `${error.path ?? 'configuration'}:${error.line}:${error.column}: ${error.message}`;
    } else if (error instanceof DocumentIoError && !error.message.includes(error.path)) {
      message = `${error.toString()} (${error.path})`;
    }
    if (context.command) {
      message = `${context.command}: ${message}`;
    }

    let exitCode = 1;
    if (USAGE_ERRORS.has(error.code)) {
      exitCode = 2;
    } else if (error.code === 'HOOK_ABORT') {
      exitCode = 3;
    }

    return { message, suggestions: SUGGESTIONS[error.code] ?? [], exitCode };
  }

  /**
   * Failed command result for an error a command caught
   */
  public static toResult<T = unknown>(error: unknown, fallbackMessage: string): CommandResult<T> {
    if (error instanceof BaseError) {
      return {
        success: false,
        message: error.toString(),
        error,
        exitCode: EnhancedErrorHandler.describe(error, { args: [], workingDirectory: '' }).exitCode,
      };
    }
    return {
      success: false,
      message: fallbackMessage,
      error: error instanceof Error ? error : new Error(String(error)),
      exitCode: 1,
    };
  }

  /**
   * Log the error with its suggestions
   *
   * @returns the exit code to leave with
   */
  public static handleError(error: unknown, context: ErrorContext): number {
    const report = EnhancedErrorHandler.describe(error, context);

    logger.error(report.message);
    for (const suggestion of report.suggestions) {
      logger.info(chalk.gray(`  hint: ${suggestion}`));
    }
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }

    return report.exitCode;
  }
}
