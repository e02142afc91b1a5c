/**
 * Settings Schema Tests
 *
 * Tests for settings schema validation and default values.
 */

import { describe, expect, it } from 'vitest';
import {
  DEFAULT_SETTINGS,
  ShellSettingsOverridesSchema,
  ShellSettingsSchema,
} from '../../../src/config/settings-schema.ts';

describe('ShellSettingsSchema', () => {
  it('should validate default settings', () => {
    expect(ShellSettingsSchema.safeParse(DEFAULT_SETTINGS).success).toBe(true);
  });

  it('should have the documented defaults', () => {
    expect(DEFAULT_SETTINGS).toEqual({
      shellPath: '/bin/bash',
      shellArgs: [],
      pollIntervalMs: 200,
      timeoutMs: 120_000,
      completionMarker: '___SHELLHOST_COMMAND_END___',
    });
  });

  it('should reject non-positive intervals and timeouts', () => {
    expect(ShellSettingsSchema.safeParse({ ...DEFAULT_SETTINGS, pollIntervalMs: 0 }).success).toBe(false);
    expect(ShellSettingsSchema.safeParse({ ...DEFAULT_SETTINGS, timeoutMs: -1 }).success).toBe(false);
    expect(ShellSettingsSchema.safeParse({ ...DEFAULT_SETTINGS, timeoutMs: 1.5 }).success).toBe(false);
  });

  it('should reject markers that cannot be echoed inside single quotes', () => {
    expect(ShellSettingsSchema.safeParse({ ...DEFAULT_SETTINGS, completionMarker: "__it's_done__" }).success).toBe(false);
    expect(ShellSettingsSchema.safeParse({ ...DEFAULT_SETTINGS, completionMarker: '__done\n__' }).success).toBe(false);
  });

  it('should reject short markers', () => {
    expect(ShellSettingsSchema.safeParse({ ...DEFAULT_SETTINGS, completionMarker: 'END' }).success).toBe(false);
  });

  it('should reject an empty shell path', () => {
    expect(ShellSettingsSchema.safeParse({ ...DEFAULT_SETTINGS, shellPath: '' }).success).toBe(false);
  });
});

describe('ShellSettingsOverridesSchema', () => {
  it('should accept an empty layer', () => {
    expect(ShellSettingsOverridesSchema.safeParse({}).success).toBe(true);
  });

  it('should still validate the fields that are present', () => {
    expect(ShellSettingsOverridesSchema.safeParse({ timeoutMs: 'soon' }).success).toBe(false);
  });
});
