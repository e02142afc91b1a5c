/**
 * 环境变量解析工具
 *
 * 功能：SHELLHOST_* 环境变量的解析，非法值一律视为未设置
 *
 * 核心导出：
 * - parseEnvPositiveInt(): 解析正整数环境变量
 * - parseEnvOptionalString(): 解析可选字符串环境变量
 */

/**
 * 解析正整数（整个值必须是十进制整数且大于 0，"12ms" 之类视为非法）
 */
export function parseEnvPositiveInt(value: string | undefined, fallback: number): number;
export function parseEnvPositiveInt(value: string | undefined, fallback?: undefined): number | undefined;
export function parseEnvPositiveInt(value: string | undefined, fallback?: number): number | undefined {
  const trimmed = value?.trim() ?? '';
  if (!/^\d+$/.test(trimmed)) {
    return fallback;
  }
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * 空字符串视为未设置
 */
export function parseEnvOptionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
