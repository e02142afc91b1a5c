/**
 * Settings Schema
 *
 * Defines the schema and types for shell session settings.
 *
 * @module settings-schema
 *
 * Core Exports:
 * - ShellSettingsSchema: Zod schema for a complete, validated settings object
 * - ShellSettingsOverridesSchema: Zod schema for partial settings (file / env / CLI layers)
 * - DEFAULT_SETTINGS: Default settings values
 * - ShellSettings / ShellSettingsOverrides: TypeScript types
 */

import { z } from 'zod';
import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_COMPLETION_MARKER,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_SHELL_PATH,
} from '../common/constants.ts';

const settingsShape = {
  /** Shell executable spawned for each session */
  shellPath: z.string().min(1),
  /** Extra arguments passed to the shell */
  shellArgs: z.array(z.string()),
  /** Delay between two looks at the output buffer */
  pollIntervalMs: z.number().int().positive(),
  /** Overall per-command timeout; exceeding it poisons the session */
  timeoutMs: z.number().int().positive(),
  // 标记过短时容易与命令输出碰撞
  completionMarker: z.string().min(8).regex(/^[^'\n]+$/, 'must not contain single quotes or newlines'),
};

/**
 * Complete settings schema
 */
export const ShellSettingsSchema = z.object(settingsShape);

export type ShellSettings = z.infer<typeof ShellSettingsSchema>;

/**
 * One layer of overrides; every field optional
 */
export const ShellSettingsOverridesSchema = z.object(settingsShape).partial();

export type ShellSettingsOverrides = z.infer<typeof ShellSettingsOverridesSchema>;

/**
 * Default settings
 */
export const DEFAULT_SETTINGS: ShellSettings = {
  shellPath: DEFAULT_SHELL_PATH,
  shellArgs: [],
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  timeoutMs: DEFAULT_COMMAND_TIMEOUT_MS,
  completionMarker: DEFAULT_COMPLETION_MARKER,
};
