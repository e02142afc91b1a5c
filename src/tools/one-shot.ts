/**
 * One-shot command execution
 *
 * 功能：在一次性 shell 中执行单条命令，不保留任何会话状态。
 *
 * 核心导出：
 * - executeOnce: 执行命令并返回 CommandResult
 * - ExecuteOnceOptions: 执行选项
 */

import { spawn } from 'node:child_process';
import { createChildLogger, getRootLogger } from '../common/logger.ts';
import { DEFAULT_SETTINGS } from '../config/settings-schema.ts';
import { stripTrailingNewline } from '../utils/text.ts';
import { CommandResult } from './command-result.ts';

const logger = createChildLogger(getRootLogger(), 'one-shot');

export interface ExecuteOnceOptions {
  shellPath?: string;
  timeoutMs?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Run `command` with `shellPath -c`. Never rejects: a timeout or spawn failure comes
 * back as a failure result whose system message is `timeout` or `error`.
 */
export function executeOnce(command: string, options: ExecuteOnceOptions = {}): Promise<CommandResult> {
  const shellPath = options.shellPath ?? DEFAULT_SETTINGS.shellPath;
  const timeoutMs = options.timeoutMs ?? DEFAULT_SETTINGS.timeoutMs;

  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let settled = false;

    const child = spawn(shellPath, ['-c', command], {
      stdio: ['ignore', 'pipe', 'pipe'],
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
    });

    const finish = (result: CommandResult): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      resolve(result);
    };

    const timeoutId = setTimeout(() => {
      logger.warn({ command, timeoutMs }, 'One-shot command timed out');
      child.kill('SIGKILL');
      finish(CommandResult.failure(`Command timed out after ${timeoutMs / 1000} seconds`, 'timeout'));
    }, timeoutMs);

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (error) => {
      logger.error({ err: error, command }, 'One-shot command failed to start');
      finish(CommandResult.failure(error.message, 'error'));
    });

    child.on('close', (code) => {
      logger.debug({ command, code }, 'One-shot command finished');
      finish(new CommandResult({
        output: stripTrailingNewline(stdout),
        error: stripTrailingNewline(stderr),
      }));
    });
  });
}
