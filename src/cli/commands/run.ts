/**
 * Run command - Execute commands in one session and exit.
 *
 * Core exports:
 * - runCommand: Run each command in order through a fresh bash tool
 */

import { withBashTool } from '../../tools/bash-tool.ts';
import { printResult } from '../formatters/output.ts';
import { resolveToolOptions, type GlobalOptions } from './options.ts';

/**
 * 所有命令共享同一个会话，因此 `cd` / `export` 对后续命令可见。
 */
export async function runCommand(commands: string[], options: GlobalOptions): Promise<void> {
  await withBashTool(resolveToolOptions(options), async (tool) => {
    for await (const result of tool.invokeEach(commands)) {
      printResult(result);
    }
  });
}
