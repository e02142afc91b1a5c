/**
 * 文本处理工具
 *
 * 核心导出：
 * - stripTrailingNewline(): 去掉一个结尾换行（只去一个）
 */

export function stripTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text.slice(0, -1) : text;
}
