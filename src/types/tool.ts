/**
 * 工具相关类型定义 — 控制器（Agent 循环）看到的工具抽象。
 *
 * 核心导出：
 * - LLMTool: Provider 无关的工具定义接口（工具目录协商时交给控制器）
 * - ToolInvocation: 控制器发起的一次工具调用
 */

/**
 * Provider-agnostic tool definition for LLM.
 * 字段与 Anthropic Tool 定义保持一致，可直接放入 tools 列表。
 */
export interface LLMTool {
  /** 工具名称 */
  name: string;
  /** 工具描述 */
  description: string;
  /** JSON Schema 格式的输入参数定义 */
  input_schema: {
    type: 'object';
    properties?: Record<string, unknown>;
    required?: string[];
    [key: string]: unknown;
  };
}

/**
 * One structured call coming from the controller.
 */
export interface ToolInvocation {
  /** tool_use block id assigned by the model */
  id: string;
  name: string;
  input: unknown;
}
