/**
 * 公共工具模块 — 提供跨模块共享的基础设施。
 *
 * 核心导出:
 * - Logger / createLogger: 基于 pino 的结构化日志工具
 * - ShellHostError 及其子类: 统一错误类型体系
 * - 常量定义
 */

export {
  type Logger,
  createLogger,
  createChildLogger,
  getRootLogger,
  getCorrelationId,
  withCorrelationId,
} from './logger.ts';
export {
  ShellHostError,
  ToolError,
  SessionNotStartedError,
  SessionTimeoutError,
  SessionBusyError,
  ToolInputError,
  CommandResultConflictError,
  ConfigurationError,
  isShellHostError,
} from './errors.ts';
export {
  DEFAULT_SHELL_PATH,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_COMPLETION_MARKER,
  DEFAULT_LOG_LEVEL,
  BASH_TOOL_NAME,
} from './constants.ts';
