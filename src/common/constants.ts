/**
 * 全局常量定义 — 会话默认参数，均支持环境变量覆盖（见 config/settings.ts）。
 *
 * 核心导出:
 * - DEFAULT_SHELL_PATH: 默认 shell 可执行文件
 * - DEFAULT_POLL_INTERVAL_MS: 完成标记轮询间隔
 * - DEFAULT_COMMAND_TIMEOUT_MS: 单条命令超时时间
 * - DEFAULT_COMPLETION_MARKER: 命令完成标记
 * - DEFAULT_LOG_LEVEL: 默认日志级别
 */

/** 默认 shell 可执行文件 */
export const DEFAULT_SHELL_PATH = '/bin/bash';

/** 完成标记轮询间隔（毫秒） */
export const DEFAULT_POLL_INTERVAL_MS = 200;

/** 默认命令超时时间（毫秒） */
export const DEFAULT_COMMAND_TIMEOUT_MS = 120_000;

/** 命令完成标记，由 shell 在每条命令之后 echo */
export const DEFAULT_COMPLETION_MARKER = '___SHELLHOST_COMMAND_END___';

/** 默认日志级别 */
export const DEFAULT_LOG_LEVEL = process.env.SHELLHOST_LOG_LEVEL ?? process.env.LOG_LEVEL ?? 'info';

/** 工具名称（暴露给模型） */
export const BASH_TOOL_NAME = 'bash';
