/**
 * Output formatters - Format output for CLI display.
 *
 * Core exports:
 * - CLIError: Custom error class for CLI errors
 * - formatError: Format error messages with stack traces
 * - handleError: Print an error and exit
 * - printResult: Print a CommandResult to stdout / stderr
 */

import chalk from 'chalk';
import { isShellHostError } from '../../common/errors.ts';
import type { CommandResult } from '../../tools/command-result.ts';

/**
 * Custom CLI error with exit code.
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public exitCode: number = 1
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

/**
 * Format an error for CLI output. Tool errors are expected conditions and
 * are printed without a stack trace.
 */
export function formatError(error: Error | string): string {
  if (typeof error === 'string') {
    return chalk.red('Error: ') + error;
  }

  if (isShellHostError(error)) {
    return chalk.red(`Error [${error.code}]: `) + error.message;
  }

  const lines = [
    chalk.red.bold('Error:'),
    chalk.red(`  ${error.message}`),
  ];

  if (error.stack) {
    lines.push('');
    lines.push(chalk.gray('Stack trace:'));
    error.stack.split('\n').slice(1).forEach(line => {
      lines.push(chalk.gray(`  ${line.trim()}`));
    });
  }

  return lines.join('\n');
}

/**
 * Handle error and exit process.
 */
export function handleError(error: unknown): never {
  if (error instanceof CLIError) {
    console.error(formatError(error.message));
    process.exit(error.exitCode);
  }

  if (error instanceof Error) {
    console.error(formatError(error));
    process.exit(1);
  }

  console.error(chalk.red('Unknown error:'), error);
  process.exit(1);
}

export function printResult(result: CommandResult): void {
  if (result.systemMessage) {
    console.error(chalk.yellow(`[system] ${result.systemMessage}`));
  }
  if (result.output) {
    console.log(result.output);
  }
  if (result.error) {
    console.error(chalk.red(result.error));
  }
}
