/**
 * 文件功能说明：
 * - 该文件位于 `src/tools/callable-tool.ts`，定义带类型参数的可调用工具基类。
 * - 负责参数校验（zod）与工具描述（JSON Schema）的生成，具体执行由子类实现。
 *
 * 核心导出列表：
 * - `CallableTool`：工具基类
 */

import { toJSONSchema, z, type ZodType } from 'zod';
import { ToolInputError } from '../common/errors.ts';
import type { LLMTool } from '../types/tool.ts';

/**
 * Abstract base class for tools with typed parameters.
 *
 * Subclasses define `name`, `description`, `paramsSchema` (Zod) and implement `execute`.
 * The base class handles JSON Schema generation and parameter validation.
 */
export abstract class CallableTool<Params, Result> {
  /** Tool name exposed to the model */
  abstract readonly name: string;
  /** Tool description exposed to the model */
  abstract readonly description: string;
  /** Zod schema that validates and types the tool parameters */
  abstract readonly paramsSchema: ZodType<Params>;

  /** Cached LLM tool definition */
  private _toolDefinition: LLMTool | null = null;

  /**
   * Schema advertised to the model. Defaults to `paramsSchema`; a tool may advertise a
   * stricter shape than it accepts.
   */
  protected get inputSchema(): ZodType {
    return this.paramsSchema;
  }

  /**
   * Get the LLM Tool definition (lazily generated from Zod schema).
   */
  get toolDefinition(): LLMTool {
    if (!this._toolDefinition) {
      // Remove top-level $schema that Zod adds
      const { $schema: _, type: _type, properties, required, ...rest } = toJSONSchema(this.inputSchema);

      this._toolDefinition = {
        name: this.name,
        description: this.description,
        input_schema: {
          ...rest,
          type: 'object',
          properties: properties ?? {},
          ...(required ? { required } : {}),
        },
      };
    }
    return this._toolDefinition;
  }

  /**
   * Validate arguments and invoke the tool implementation.
   *
   * @param args - Raw JSON arguments from the controller
   * @throws ToolInputError when the arguments do not match `paramsSchema`
   */
  async call(args: unknown): Promise<Result> {
    const parseResult = this.paramsSchema.safeParse(args);
    if (!parseResult.success) {
      throw new ToolInputError(z.prettifyError(parseResult.error));
    }
    return this.execute(parseResult.data);
  }

  /**
   * Tool implementation. Subclasses must override this.
   */
  protected abstract execute(params: Params): Promise<Result>;
}
