/**
 * Logger 单元测试 — 验证日志基础设施的核心功能。
 * 测试目标: createLogger / createChildLogger / withCorrelationId。
 */

import { describe, expect, it } from 'vitest';
import {
  createChildLogger,
  createLogger,
  getCorrelationId,
  getRootLogger,
  withCorrelationId,
} from '../../../src/common/logger.ts';

describe('createLogger', () => {
  it('should create a logger instance', () => {
    const logger = createLogger({ level: 'silent' });
    expect(typeof logger.info).toBe('function');
    expect(typeof logger.error).toBe('function');
    expect(typeof logger.warn).toBe('function');
    expect(typeof logger.debug).toBe('function');
  });

  it('should use the requested level', () => {
    const logger = createLogger({ name: 'test-logger', level: 'warn' });
    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });
});

describe('createChildLogger', () => {
  it('should attach the module name', () => {
    const parent = createLogger({ level: 'silent' });
    const child = createChildLogger(parent, 'bash-session');
    expect(child.bindings()).toMatchObject({ module: 'bash-session' });
  });
});

describe('getRootLogger', () => {
  it('should return the same instance every time', () => {
    expect(getRootLogger()).toBe(getRootLogger());
  });

  it('should follow SHELLHOST_LOG_LEVEL', () => {
    expect(getRootLogger().level).toBe('silent');
  });
});

describe('withCorrelationId', () => {
  it('should set and retrieve correlation ID within context', () => {
    withCorrelationId('corr-test-123', () => {
      expect(getCorrelationId()).toBe('corr-test-123');
    });
  });

  it('should return undefined outside of context', () => {
    expect(getCorrelationId()).toBeUndefined();
  });

  it('should support nested contexts', () => {
    withCorrelationId('outer-id', () => {
      expect(getCorrelationId()).toBe('outer-id');

      withCorrelationId('inner-id', () => {
        expect(getCorrelationId()).toBe('inner-id');
      });

      // 外层上下文恢复
      expect(getCorrelationId()).toBe('outer-id');
    });
  });

  it('should carry the ID across awaits', async () => {
    const seen = await withCorrelationId('async-id', async () => {
      await Promise.resolve();
      return getCorrelationId();
    });
    expect(seen).toBe('async-id');
  });
});
