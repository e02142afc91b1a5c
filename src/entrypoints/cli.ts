/**
 * CLI entry point for shellhost.
 */

import { handleError } from '../cli/formatters/output.ts';
import { createProgram } from '../cli/program.ts';

// Global error handlers
process.on('uncaughtException', (error) => {
  handleError(error);
});

process.on('unhandledRejection', (reason) => {
  handleError(reason);
});

createProgram().parseAsync(process.argv).catch(handleError);
