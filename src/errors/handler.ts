/**
 * Error formatting and display for the Delve CLI
 *
 * - Coloured text output for terminals
 * - JSON output for scripts (--json)
 * - Stack traces and cause chains in verbose mode
 */

import chalk from 'chalk';
import { AllProvidersFailedError, CLIError } from './types.js';

export interface ErrorHandlerOptions {
  /** Show stack traces and causes */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  name: string;
  code: number;
  hint?: string;
  details?: string[];
  stack?: string;
}

/**
 * Extra per-error lines worth showing (provider attempts, validation issues).
 */
function errorDetails(error: CLIError): string[] {
  if (error instanceof AllProvidersFailedError) {
    return error.attempts.map(
      (a) => `${a.provider}: ${a.ok ? 'ok' : (a.reason ?? 'failed')} (${a.durationMs}ms)`
    );
  }
  return [];
}

function causeChain(error: Error): string[] {
  const lines: string[] = [];
  let cause: unknown = error.cause;
  while (cause instanceof Error && lines.length < 5) {
    lines.push(`Caused by: ${cause.name}: ${cause.message}`);
    cause = cause.cause;
  }
  return lines;
}

/**
 * Format an error for display. Kept separate from handleError so it can be
 * tested without exiting the process.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;

  if (error instanceof Error) {
    const cliError = error instanceof CLIError ? error : undefined;
    const details = cliError ? errorDetails(cliError) : [];

    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        name: error.name,
        code: cliError?.code ?? 1,
        hint: cliError?.hint,
        details: details.length > 0 ? details : undefined,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [chalk.red('Error: ') + error.message];
    for (const detail of details) {
      lines.push(chalk.dim('  - ') + detail);
    }

    if (cliError?.hint) {
      lines.push(chalk.dim('Hint: ') + cliError.hint);
    } else if (!cliError && !verbose) {
      lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
    }

    if (verbose) {
      for (const line of causeChain(error)) {
        lines.push(chalk.dim(line));
      }
      if (error.stack) {
        lines.push('');
        lines.push(chalk.dim('Stack trace:'));
        lines.push(chalk.dim(error.stack));
      }
    }

    return lines.join('\n');
  }

  // Strings, numbers and other thrown values
  if (json) {
    return JSON.stringify({ error: String(error), name: 'Error', code: 1 }, null, 2);
  }
  return chalk.red('Error: ') + String(error);
}

/**
 * CLIError carries its own exit code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Format an error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler suitable for process 'uncaughtException' / 'unhandledRejection'.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
