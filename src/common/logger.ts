/**
 * 日志基础设施 — 基于 pino 的结构化日志工具。
 * 默认输出 JSON；交互式开发（NODE_ENV=development 且 stderr 为 TTY）时使用 pino-pretty。
 * 日志统一写入 stderr，避免与命令输出混在一起。
 * 通过 AsyncLocalStorage 传播关联 ID。
 *
 * 核心导出:
 * - Logger: pino Logger 类型别名
 * - createLogger: 创建根日志实例
 * - createChildLogger: 创建带模块上下文的子日志实例
 * - getRootLogger: 进程级共享根日志
 */

import pino from 'pino';
import { AsyncLocalStorage } from 'node:async_hooks';
import { DEFAULT_LOG_LEVEL } from './constants.ts';

// 关联 ID 上下文存储
const correlationStore = new AsyncLocalStorage<string>();

/** pino Logger 类型别名 */
export type Logger = pino.Logger;

let rootLogger: Logger | null = null;

/** 获取当前关联 ID */
export function getCorrelationId(): string | undefined {
  return correlationStore.getStore();
}

/** 在关联 ID 上下文中执行函数 */
export function withCorrelationId<T>(correlationId: string, fn: () => T): T {
  return correlationStore.run(correlationId, fn);
}

/**
 * 创建根日志实例。
 */
export function createLogger(options?: { level?: string; name?: string }): Logger {
  const level = options?.level ?? DEFAULT_LOG_LEVEL;
  const loggerOptions: pino.LoggerOptions = {
    name: options?.name ?? 'shellhost',
    level,
    // 注入关联 ID 到每条日志
    mixin() {
      const correlationId = getCorrelationId();
      return correlationId ? { correlationId } : {};
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const isDev = process.env.NODE_ENV === 'development' && process.stderr.isTTY === true;
  if (isDev) {
    return pino({
      ...loggerOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(loggerOptions, pino.destination({ dest: 2, sync: true }));
}

/**
 * 创建带模块上下文的子日志实例。
 * 子日志继承父日志配置，并自动附加模块名。
 */
export function createChildLogger(parent: Logger, module: string): Logger {
  return parent.child({ module });
}

/** 进程级共享根日志，首次调用时创建 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}
