/**
 * CLI 共享选项
 *
 * 功能：把 commander 解析出的全局选项转换为设置覆盖层。
 *
 * 核心导出：
 * - GlobalOptions: 全局选项
 * - toSettingsOverrides: 选项 → ShellSettingsOverrides
 * - resolveToolOptions: 选项 → BashToolOptions（含配置文件与环境变量）
 */

import { loadSettings } from '../../config/settings.ts';
import type { ShellSettingsOverrides } from '../../config/settings-schema.ts';
import type { BashToolOptions } from '../../tools/bash-tool.ts';
import { CLIError } from '../formatters/output.ts';

export interface GlobalOptions {
  shell?: string;
  /** Seconds */
  timeout?: string;
  /** Milliseconds */
  pollInterval?: string;
  config?: string;
}

function parsePositive(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new CLIError(`${flag} must be a positive number, got "${value}"`);
  }
  return parsed;
}

export function toSettingsOverrides(options: GlobalOptions): ShellSettingsOverrides {
  return {
    shellPath: options.shell,
    timeoutMs: options.timeout !== undefined
      ? Math.round(parsePositive(options.timeout, '--timeout') * 1000)
      : undefined,
    pollIntervalMs: options.pollInterval !== undefined
      ? Math.round(parsePositive(options.pollInterval, '--poll-interval'))
      : undefined,
  };
}

export function resolveToolOptions(options: GlobalOptions): BashToolOptions {
  return loadSettings({
    file: options.config,
    overrides: toSettingsOverrides(options),
  });
}
