/**
 * REPL command - Interactive loop over one persistent bash session.
 *
 * Core exports:
 * - replCommand: Start the REPL
 * - handleReplLine: Process one input line (exported for tests)
 */

import * as readline from 'node:readline/promises';
import chalk from 'chalk';
import { BashTool } from '../../tools/bash-tool.ts';
import type { CommandResult } from '../../tools/command-result.ts';
import { formatError, printResult } from '../formatters/output.ts';
import { resolveToolOptions, type GlobalOptions } from './options.ts';

const PROMPT = chalk.cyan('shellhost> ');

export type ReplAction =
  | { kind: 'exit' }
  | { kind: 'skip' }
  | { kind: 'result'; result: CommandResult };

/**
 * `:exit` 退出，`:restart` 重启会话，其余非空行作为命令执行
 */
export async function handleReplLine(tool: BashTool, line: string): Promise<ReplAction> {
  const trimmed = line.trim();
  if (trimmed === '') {
    return { kind: 'skip' };
  }
  if (trimmed === ':exit' || trimmed === ':quit') {
    return { kind: 'exit' };
  }
  if (trimmed === ':restart') {
    return { kind: 'result', result: await tool.invoke({ restart: true }) };
  }
  return { kind: 'result', result: await tool.invoke({ command: line }) };
}

export async function replCommand(options: GlobalOptions): Promise<void> {
  const tool = new BashTool(resolveToolOptions(options));
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  console.log(chalk.gray('Type :restart to restart the shell, :exit to leave.'));
  try {
    for (;;) {
      const line = await rl.question(PROMPT);
      try {
        const action = await handleReplLine(tool, line);
        if (action.kind === 'exit') break;
        if (action.kind === 'result') printResult(action.result);
      } catch (error) {
        // 错误只影响当前一行，REPL 继续
        console.error(formatError(error instanceof Error ? error : String(error)));
      }
    }
  } finally {
    rl.close();
    await tool.dispose();
  }
}
