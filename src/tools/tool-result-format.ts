/**
 * Tool Result Formatting
 *
 * 将 CommandResult 转换为控制器回填给模型的文本 / Anthropic tool_result 块。
 *
 * Core Exports:
 * - formatToolOutput: Render output and error as display text
 * - withSystemPrefix: Prepend the system message to rendered text
 * - toToolResultBlock: Build an Anthropic tool_result block from a result
 * - toolErrorBlock: Build an error tool_result block from a thrown error
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { CommandResult } from './command-result.ts';

/**
 * Output is fenced as a code block; error text follows unfenced.
 */
export function formatToolOutput(result: CommandResult): string {
  if (result.output && result.error) {
    return `\`\`\`\n${result.output}\n\`\`\`\n${result.error}`;
  }
  if (result.error) {
    return result.error;
  }
  if (result.output) {
    return `\`\`\`\n${result.output}\n\`\`\``;
  }
  return '';
}

/**
 * Prepend the system message (if any). Empty `text` renders as nothing.
 */
export function withSystemPrefix(result: CommandResult, text: string): string {
  if (!text) {
    return '';
  }
  const formatted = formatToolOutput(result);
  if (result.systemMessage) {
    return `<system>${result.systemMessage}</system>\n\n${formatted}`;
  }
  return formatted;
}

export function toToolResultBlock(result: CommandResult, toolUseId: string): Anthropic.ToolResultBlockParam {
  const isError = result.error !== '';
  const text = withSystemPrefix(result, isError ? result.error : result.output);

  const content: Anthropic.TextBlockParam[] = [];
  if (text) {
    content.push({ type: 'text', text });
  } else if (result.systemMessage) {
    content.push({ type: 'text', text: `<system>${result.systemMessage}</system>` });
  }

  return {
    type: 'tool_result',
    tool_use_id: toolUseId,
    content,
    is_error: isError,
  };
}

/**
 * A thrown tool error becomes error content so the model can react to it.
 */
export function toolErrorBlock(error: unknown, toolUseId: string): Anthropic.ToolResultBlockParam {
  const message = error instanceof Error ? error.message : String(error);
  return {
    type: 'tool_result',
    tool_use_id: toolUseId,
    content: [{ type: 'text', text: `Error: ${message}` }],
    is_error: true,
  };
}
