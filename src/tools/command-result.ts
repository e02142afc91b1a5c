/**
 * Command Result
 *
 * Immutable value returned by the bash session and the bash tool.
 *
 * Core Exports:
 * - CommandResult: output / error / systemMessage triple with combine and replace
 * - CommandResultFields: plain constructor input
 * - CommandResultJSON: wire shape handed to controllers
 */

import { CommandResultConflictError } from '../common/errors.ts';

export interface CommandResultFields {
  output?: string;
  error?: string;
  /** Advisory message for the controller, e.g. "tool must be restarted" */
  systemMessage?: string;
}

/** Wire shape; `system` is the field name controllers expect */
export interface CommandResultJSON {
  output: string;
  error: string;
  system: string;
}

export class CommandResult {
  readonly output: string;
  readonly error: string;
  readonly systemMessage: string;

  constructor(fields: CommandResultFields = {}) {
    this.output = fields.output ?? '';
    this.error = fields.error ?? '';
    this.systemMessage = fields.systemMessage ?? '';
    Object.freeze(this);
  }

  /**
   * A result that carries only failure text.
   */
  static failure(error: string, systemMessage?: string): CommandResult {
    return new CommandResult({ error, systemMessage });
  }

  /** True only when all three fields are empty */
  get isEmpty(): boolean {
    return !this.output && !this.error && !this.systemMessage;
  }

  /**
   * Merge two partial results. Output and error are concatenated (this first);
   * at most one side may carry a system message.
   */
  combine(other: CommandResult): CommandResult {
    if (this.systemMessage && other.systemMessage) {
      throw new CommandResultConflictError(
        `Cannot combine tool results: both carry a system message ("${this.systemMessage}", "${other.systemMessage}")`
      );
    }

    return new CommandResult({
      output: this.output + other.output,
      error: this.error + other.error,
      systemMessage: this.systemMessage || other.systemMessage,
    });
  }

  replace(fields: CommandResultFields): CommandResult {
    return new CommandResult({
      output: fields.output ?? this.output,
      error: fields.error ?? this.error,
      systemMessage: fields.systemMessage ?? this.systemMessage,
    });
  }

  toJSON(): CommandResultJSON {
    return {
      output: this.output,
      error: this.error,
      system: this.systemMessage,
    };
  }
}
