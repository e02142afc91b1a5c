/**
 * Tool use dispatch — 控制器侧的胶水：把模型的 tool_use 交给 BashTool，
 * 并把结果或抛出的错误统一转换为 tool_result 块。
 *
 * Core Exports:
 * - handleToolUse: Dispatch one tool_use block
 */

import type Anthropic from '@anthropic-ai/sdk';
import { createChildLogger, getRootLogger, withCorrelationId } from '../common/logger.ts';
import type { ToolInvocation } from '../types/tool.ts';
import type { BashTool } from './bash-tool.ts';
import { toolErrorBlock, toToolResultBlock } from './tool-result-format.ts';

const logger = createChildLogger(getRootLogger(), 'tool-use');

/**
 * Run one invocation. Tool errors are returned as `is_error` blocks, never thrown;
 * a tool name other than the bash tool's yields an error block as well.
 */
export async function handleToolUse(
  tool: BashTool,
  invocation: ToolInvocation
): Promise<Anthropic.ToolResultBlockParam> {
  return withCorrelationId(invocation.id, async () => {
    if (invocation.name !== tool.name) {
      logger.warn({ name: invocation.name }, 'Unknown tool requested');
      return toolErrorBlock(new Error(`unknown tool: ${invocation.name}`), invocation.id);
    }

    try {
      const result = await tool.call(invocation.input);
      return toToolResultBlock(result, invocation.id);
    } catch (error) {
      logger.warn({ err: error }, 'Tool call failed');
      return toolErrorBlock(error, invocation.id);
    }
  });
}
