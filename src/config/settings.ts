/**
 * Settings Loader
 *
 * 按优先级（低 → 高）合并：默认值 → JSON 配置文件 → 环境变量 → 显式覆盖，
 * 最后整体用 zod 校验。
 *
 * @module settings
 *
 * Core Exports:
 * - loadSettings: Resolve the effective settings
 * - readSettingsFile: Parse one JSON settings file
 * - settingsFromEnv: Read the SHELLHOST_* environment variables
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../common/errors.ts';
import { createChildLogger, getRootLogger } from '../common/logger.ts';
import { parseEnvOptionalString, parseEnvPositiveInt } from '../utils/env.ts';
import {
  DEFAULT_SETTINGS,
  ShellSettingsOverridesSchema,
  ShellSettingsSchema,
  type ShellSettings,
  type ShellSettingsOverrides,
} from './settings-schema.ts';

const logger = createChildLogger(getRootLogger(), 'settings');

export interface LoadSettingsOptions {
  /** Environment to read from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Settings file path; falls back to SHELLHOST_SETTINGS_FILE */
  file?: string;
  /** Highest-priority overrides, e.g. from CLI flags */
  overrides?: ShellSettingsOverrides;
}

/**
 * Read the SHELLHOST_* environment variables. Invalid numbers are ignored.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): ShellSettingsOverrides {
  return {
    shellPath: parseEnvOptionalString(env.SHELLHOST_SHELL),
    pollIntervalMs: parseEnvPositiveInt(env.SHELLHOST_POLL_INTERVAL_MS),
    timeoutMs: parseEnvPositiveInt(env.SHELLHOST_COMMAND_TIMEOUT_MS),
    completionMarker: parseEnvOptionalString(env.SHELLHOST_COMPLETION_MARKER),
  };
}

/**
 * Parse a JSON settings file. A missing file yields no overrides.
 */
export function readSettingsFile(filePath: string): ShellSettingsOverrides {
  if (!fs.existsSync(filePath)) {
    logger.debug({ filePath }, 'Settings file not found, using defaults');
    return {};
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse settings file: ${filePath}`, { cause: error });
  }

  const result = ShellSettingsOverridesSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`Invalid settings file ${filePath}: ${z.prettifyError(result.error)}`);
  }
  return result.data;
}

function applyLayer(base: ShellSettings, layer: ShellSettingsOverrides): ShellSettings {
  return {
    shellPath: layer.shellPath ?? base.shellPath,
    shellArgs: layer.shellArgs ?? base.shellArgs,
    pollIntervalMs: layer.pollIntervalMs ?? base.pollIntervalMs,
    timeoutMs: layer.timeoutMs ?? base.timeoutMs,
    completionMarker: layer.completionMarker ?? base.completionMarker,
  };
}

/**
 * Resolve the effective settings.
 */
export function loadSettings(options: LoadSettingsOptions = {}): ShellSettings {
  const env = options.env ?? process.env;
  const file = options.file ?? parseEnvOptionalString(env.SHELLHOST_SETTINGS_FILE);

  const layers: ShellSettingsOverrides[] = [
    file ? readSettingsFile(file) : {},
    settingsFromEnv(env),
    options.overrides ?? {},
  ];
  const merged = layers.reduce(applyLayer, { ...DEFAULT_SETTINGS });

  const result = ShellSettingsSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(`Invalid settings: ${z.prettifyError(result.error)}`);
  }
  return result.data;
}
