/**
 * Bash Tool Implementation
 *
 * CallableTool subclass exposed to the controller. Owns at most one BashSession,
 * created lazily on first use and replaced on restart.
 * Session 的异常原样抛给调用方，只有进程退出会以 CommandResult 的形式返回。
 *
 * Core Exports:
 * - BashTool: The bash tool façade
 * - BashToolOptions: Construction options (forwarded to every session)
 * - withBashTool: Scoped helper that always disposes the tool
 * - RESTARTED_MESSAGE: System message returned by a restart
 */

import { BASH_TOOL_NAME } from '../common/constants.ts';
import { ToolError } from '../common/errors.ts';
import { createChildLogger, getRootLogger } from '../common/logger.ts';
import { DEFAULT_SETTINGS } from '../config/settings-schema.ts';
import type { LLMTool } from '../types/tool.ts';
import { loadDesc } from '../utils/load-desc.ts';
import { BashSession, type BashSessionOptions } from './bash-session.ts';
import { CallableTool } from './callable-tool.ts';
import { CommandResult } from './command-result.ts';
import { BashToolInputSchema, BashToolParamsSchema, type BashToolParams } from './schemas.ts';

export type { BashToolParams } from './schemas.ts';

const logger = createChildLogger(getRootLogger(), 'bash-tool');

export const RESTARTED_MESSAGE = 'tool has been restarted.';

/**
 * Options for constructing BashTool
 */
export type BashToolOptions = BashSessionOptions;

/**
 * BashTool — the single tool exposed to the controller.
 */
export class BashTool extends CallableTool<BashToolParams, CommandResult> {
  readonly name = BASH_TOOL_NAME;
  readonly description: string;
  readonly paramsSchema = BashToolParamsSchema;

  private session: BashSession | null = null;
  private readonly sessionOptions: BashSessionOptions;

  constructor(options: BashToolOptions = {}) {
    super();
    this.sessionOptions = { ...options };
    const timeoutMs = options.timeoutMs ?? DEFAULT_SETTINGS.timeoutMs;
    this.description = loadDesc('./bash-tool.md', import.meta.url, {
      TIMEOUT_SECONDS: String(timeoutMs / 1000),
    });
  }

  protected get inputSchema() {
    return BashToolInputSchema;
  }

  /**
   * Static capability descriptor for tool-catalog negotiation
   */
  describe(): LLMTool {
    return this.toolDefinition;
  }

  /**
   * Get the current BashSession (null before first use)
   */
  getSession(): BashSession | null {
    return this.session;
  }

  /**
   * Run a command, or restart the session.
   *
   * `restart` wins over `command`: a restart call never runs the command.
   */
  async invoke(params: BashToolParams): Promise<CommandResult> {
    const { command, restart } = params;

    if (restart) {
      this.session?.stop();
      this.startSession();
      logger.info('Bash session restarted');
      return new CommandResult({ systemMessage: RESTARTED_MESSAGE });
    }

    const session = this.session ?? this.startSession();

    if (command !== undefined && command.trim() !== '') {
      return session.run(command);
    }

    logger.error('No command provided');
    throw new ToolError('no command provided.', 'NO_COMMAND');
  }

  protected execute(params: BashToolParams): Promise<CommandResult> {
    return this.invoke(params);
  }

  /**
   * Run commands one after another, yielding each result as soon as it is ready.
   * The next command is only sent once the consumer asks for it.
   */
  async *invokeEach(commands: Iterable<string> | AsyncIterable<string>): AsyncGenerator<CommandResult> {
    for await (const command of commands) {
      yield await this.invoke({ command });
    }
  }

  /**
   * Stop the session if one is running. Safe to call more than once.
   */
  async dispose(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session?.isAlive) {
      session.stop();
    }
  }

  private startSession(): BashSession {
    const session = new BashSession(this.sessionOptions);
    session.start();
    this.session = session;
    return session;
  }
}

/**
 * Create a BashTool, hand it to `fn` and dispose it on every exit path.
 */
export async function withBashTool<T>(
  options: BashToolOptions,
  fn: (tool: BashTool) => Promise<T>
): Promise<T> {
  const tool = new BashTool(options);
  try {
    return await fn(tool);
  } finally {
    await tool.dispose();
  }
}
