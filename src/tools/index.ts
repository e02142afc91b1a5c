/**
 * Tools Module
 *
 * Core Exports:
 * - BashTool / withBashTool: 控制器调用的工具门面
 * - BashSession: 持久 shell 会话
 * - CommandResult: 命令结果值类型
 * - executeOnce: 一次性命令执行
 * - 结果格式化与 tool_use 分发
 */

export { BashTool, withBashTool, RESTARTED_MESSAGE, type BashToolOptions, type BashToolParams } from './bash-tool.ts';
export {
  BashSession,
  RESTART_REQUIRED_MESSAGE,
  type BashSessionOptions,
  type BashSessionStatus,
  type SpawnShellProcess,
} from './bash-session.ts';
export { CallableTool } from './callable-tool.ts';
export { CommandResult, type CommandResultFields, type CommandResultJSON } from './command-result.ts';
export { executeOnce, type ExecuteOnceOptions } from './one-shot.ts';
export { BashToolInputSchema, BashToolParamsSchema } from './schemas.ts';
export { formatToolOutput, withSystemPrefix, toToolResultBlock, toolErrorBlock } from './tool-result-format.ts';
export { handleToolUse } from './tool-use-handler.ts';
