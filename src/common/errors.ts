/**
 * 统一错误类型体系 — 定义 shellhost 所有自定义错误类型。
 * 每种错误类型对应特定的故障场景，携带结构化的上下文信息。
 *
 * 核心导出:
 * - ShellHostError: 基础错误类（含 code 和 recoverable 属性）
 * - ToolError: 工具契约/会话协议违规
 * - SessionNotStartedError: 会话尚未启动
 * - SessionTimeoutError: 命令超时，会话必须重启
 * - SessionBusyError: 已有命令在执行
 * - ToolInputError: 工具参数校验失败
 * - CommandResultConflictError: 合并结果时 system message 冲突
 * - ConfigurationError: 配置错误
 * - isShellHostError: 类型守卫函数
 */

/** 基础错误类，所有 shellhost 错误的父类 */
export class ShellHostError extends Error {
  public readonly code: string;
  /** 该错误是否可恢复（可恢复错误不应终止 Agent 循环） */
  public readonly recoverable: boolean;

  constructor(message: string, code: string, options?: ErrorOptions & { recoverable?: boolean }) {
    super(message, options);
    this.name = 'ShellHostError';
    this.code = code;
    this.recoverable = options?.recoverable ?? false;
  }
}

/**
 * 类型守卫：检查是否为 ShellHostError 实例
 */
export function isShellHostError(error: unknown): error is ShellHostError {
  return error instanceof ShellHostError;
}

/**
 * Raised when the caller breaks the tool's contract or the session protocol
 * reaches a state it cannot continue from.
 */
export class ToolError extends ShellHostError {
  constructor(message: string, code: string = 'TOOL_ERROR', options?: ErrorOptions & { recoverable?: boolean }) {
    super(message, code, options);
    this.name = 'ToolError';
  }
}

/** run/stop 在 start 之前调用 */
export class SessionNotStartedError extends ToolError {
  constructor(message?: string) {
    super(message ?? 'Session has not started.', 'SESSION_NOT_STARTED');
    this.name = 'SessionNotStartedError';
  }
}

/** 命令超时；会话此后被标记为 poisoned，直到 restart */
export class SessionTimeoutError extends ToolError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, message?: string) {
    super(
      message ?? `timed out: bash has not returned in ${timeoutMs / 1000} seconds and must be restarted`,
      'SESSION_TIMEOUT',
      { recoverable: true },
    );
    this.name = 'SessionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** 同一会话上已有命令在执行 */
export class SessionBusyError extends ToolError {
  constructor(message?: string) {
    super(message ?? 'Another command is already executing', 'SESSION_BUSY', { recoverable: true });
    this.name = 'SessionBusyError';
  }
}

/** 工具参数未通过 schema 校验 */
export class ToolInputError extends ToolError {
  constructor(detail: string) {
    super(`Invalid parameters: ${detail}`, 'INVALID_TOOL_INPUT', { recoverable: true });
    this.name = 'ToolInputError';
  }
}

/** Two results both carry a different system message. */
export class CommandResultConflictError extends ShellHostError {
  constructor(message?: string) {
    super(message ?? 'Cannot combine tool results with different system messages', 'RESULT_CONFLICT');
    this.name = 'CommandResultConflictError';
  }
}

/** 配置错误 */
export class ConfigurationError extends ShellHostError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIGURATION_ERROR', options);
    this.name = 'ConfigurationError';
  }
}
