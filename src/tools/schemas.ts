/**
 * Tool Parameter Schemas
 *
 * 功能：定义工具参数的 Zod 校验 Schema，作为唯一定义点供所有工具文件导入。
 *
 * 核心导出：
 * - BashToolParamsSchema: 校验控制器传入参数（command / restart 均可选）
 * - BashToolInputSchema: 对模型公布的输入 schema（command 必填，restart 可选）
 * - BashToolParams: Bash 工具参数类型（从 schema 推导）
 */

import { z } from 'zod';

const commandField = z.string().describe(
  'The bash command to run. State such as the working directory and exported variables persists between calls.'
);

const restartField = z.boolean().describe(
  'If true, kills the existing shell session and starts a fresh one. Required after a timeout or when the shell has exited.'
);

/**
 * 运行时校验：restart 调用可以不带 command
 */
export const BashToolParamsSchema = z.object({
  command: commandField.optional(),
  restart: restartField.optional(),
});

export type BashToolParams = z.infer<typeof BashToolParamsSchema>;

/**
 * 模型看到的 schema：command 必填，restart 为隐式可选项
 */
export const BashToolInputSchema = z.object({
  command: commandField,
  restart: restartField.optional(),
});
