/**
 * shellhost — persistent shell sessions for agent loops.
 */

export * from './tools/index.ts';
export * from './common/index.ts';
export { loadSettings, readSettingsFile, settingsFromEnv, type LoadSettingsOptions } from './config/settings.ts';
export {
  ShellSettingsSchema,
  ShellSettingsOverridesSchema,
  DEFAULT_SETTINGS,
  type ShellSettings,
  type ShellSettingsOverrides,
} from './config/settings-schema.ts';
export type { LLMTool, ToolInvocation } from './types/tool.ts';
