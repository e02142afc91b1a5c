/**
 * Bash 会话管理
 *
 * 功能：管理一个持久的 shell 进程，保持环境变量、工作目录和后台进程状态。
 * 每条命令后追加 echo 完成标记，轮询自维护的 stdout 缓冲区直到标记出现。
 *
 * 核心导出：
 * - BashSession: 会话管理类（start / stop / run）
 * - BashSessionStatus: fresh / running / poisoned 三态
 * - BashSessionOptions: 构造选项
 */

import { spawn, type ChildProcess, type SpawnOptionsWithoutStdio } from 'node:child_process';
import type { Writable } from 'node:stream';
import {
  SessionBusyError,
  SessionNotStartedError,
  SessionTimeoutError,
  ToolError,
} from '../common/errors.ts';
import { createChildLogger, getRootLogger } from '../common/logger.ts';
import { DEFAULT_SETTINGS, type ShellSettings } from '../config/settings-schema.ts';
import { stripTrailingNewline } from '../utils/text.ts';
import { CommandResult } from './command-result.ts';

const logger = createChildLogger(getRootLogger(), 'bash-session');

export const RESTART_REQUIRED_MESSAGE = 'tool must be restarted';

/**
 * - fresh: 尚未 start
 * - running: 已启动，可接受命令
 * - poisoned: 有命令超时，必须通过 restart 替换会话
 */
export type BashSessionStatus = 'fresh' | 'running' | 'poisoned';

export type SpawnShellProcess = (
  command: string,
  args: readonly string[],
  options: SpawnOptionsWithoutStdio & { stdio: ['pipe', 'pipe', 'pipe'] }
) => ChildProcess;

export interface BashSessionOptions extends Partial<ShellSettings> {
  /** Working directory of the shell */
  cwd?: string;
  /** Variables added on top of the inherited environment */
  env?: NodeJS.ProcessEnv;
  /** Replaces child_process.spawn (tests inject a fake process here) */
  spawnProcess?: SpawnShellProcess;
}

interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process failed to spawn or errored */
  failure?: string;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isErrnoException(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * 管理一个持久的 shell 会话
 *
 * 同一时刻只允许一条命令在执行；stdout/stderr 由 data 事件累积到会话自己的缓冲区，
 * 每条命令完成后两个缓冲区都会被清空。
 */
export class BashSession {
  /** 宿主进程退出时需要终止的会话 */
  private static readonly liveSessions = new Set<BashSession>();
  private static exitHookInstalled = false;

  private process: ChildProcess | null = null;
  private stdoutBuffer = '';
  private stderrBuffer = '';
  private exitInfo: ProcessExit | null = null;
  private currentStatus: BashSessionStatus = 'fresh';
  /** 执行锁，防止并发命令 */
  private isExecuting = false;

  readonly shellPath: string;
  readonly shellArgs: readonly string[];
  readonly pollIntervalMs: number;
  readonly timeoutMs: number;
  readonly completionMarker: string;
  private readonly cwd: string | undefined;
  private readonly env: NodeJS.ProcessEnv | undefined;
  private readonly spawnProcess: SpawnShellProcess;

  constructor(options: BashSessionOptions = {}) {
    this.shellPath = options.shellPath ?? DEFAULT_SETTINGS.shellPath;
    this.shellArgs = options.shellArgs ?? DEFAULT_SETTINGS.shellArgs;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_SETTINGS.pollIntervalMs;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SETTINGS.timeoutMs;
    this.completionMarker = options.completionMarker ?? DEFAULT_SETTINGS.completionMarker;
    this.cwd = options.cwd;
    this.env = options.env;
    this.spawnProcess = options.spawnProcess ?? ((command, args, spawnOptions) => {
      return spawn(command, args, spawnOptions);
    });
  }

  get status(): BashSessionStatus {
    return this.currentStatus;
  }

  /** True while the shell process is running */
  get isAlive(): boolean {
    return this.process !== null && this.exitInfo === null;
  }

  get pid(): number | undefined {
    return this.process?.pid;
  }

  /**
   * 启动 shell 进程并绑定事件监听。进程存活时重复调用为 no-op；已退出则重新拉起。
   */
  start(): void {
    if (this.isAlive) {
      logger.debug('Session already started');
      return;
    }

    this.exitInfo = null;
    this.clearBuffers();

    const child = this.spawnProcess(this.shellPath, this.shellArgs, {
      stdio: ['pipe', 'pipe', 'pipe'],
      // 独立进程组，stop() 时整组一起发信号
      detached: true,
      cwd: this.cwd,
      env: { ...process.env, ...this.env },
    });

    if (!child.stdout || !child.stderr || !child.stdin) {
      throw new ToolError('Failed to create shell process streams');
    }

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    // 重新 start 之后，旧进程的事件一律忽略
    const isCurrent = (): boolean => this.process === child;

    child.stdout.on('data', (chunk: string | Buffer) => {
      if (isCurrent()) this.stdoutBuffer += chunk.toString();
    });

    child.stderr.on('data', (chunk: string | Buffer) => {
      if (isCurrent()) this.stderrBuffer += chunk.toString();
    });

    // 写入已退出进程的 stdin 会触发 EPIPE；退出本身由 exit 事件记录
    child.stdin.on('error', (error) => {
      logger.warn({ err: error }, 'Shell stdin error');
    });

    child.on('exit', (code, signal) => {
      logger.debug({ code, signal }, 'Shell process exited');
      if (!isCurrent()) return;
      this.exitInfo ??= { code, signal };
      BashSession.liveSessions.delete(this);
    });

    child.on('error', (error) => {
      logger.error({ err: error }, 'Shell process error');
      if (!isCurrent()) return;
      this.exitInfo ??= { code: null, signal: null, failure: error.message };
      BashSession.liveSessions.delete(this);
    });

    this.process = child;
    this.currentStatus = 'running';
    BashSession.track(this);
    logger.debug({ shellPath: this.shellPath, pid: child.pid }, 'Shell session started');
  }

  /**
   * 向进程组发送 SIGTERM。已退出时为 no-op。
   */
  stop(): void {
    if (!this.process) {
      logger.error('Attempting to stop session that hasn\'t started');
      throw new SessionNotStartedError();
    }
    if (this.exitInfo) {
      logger.debug('Process already terminated');
      return;
    }

    this.signalProcessGroup('SIGTERM');
    BashSession.liveSessions.delete(this);
    logger.debug({ pid: this.process.pid }, 'Shell process group signalled');
  }

  /**
   * 在会话中执行命令
   */
  async run(command: string): Promise<CommandResult> {
    const child = this.process;
    if (!child || !child.stdin) {
      throw new SessionNotStartedError();
    }
    // poisoned 优先：超时后即使进程退出也必须 restart
    if (this.currentStatus === 'poisoned') {
      throw new SessionTimeoutError(this.timeoutMs);
    }
    if (this.exitInfo) {
      logger.error({ exit: this.exitInfo }, 'Shell has exited');
      return this.exitedResult();
    }
    if (this.isExecuting) {
      throw new SessionBusyError();
    }

    this.isExecuting = true;
    try {
      logger.debug({ command }, 'Running command');
      try {
        await this.writeInput(child.stdin, `${command}\necho '${this.completionMarker}'\n`);
      } catch (error) {
        if (this.exitInfo) {
          return this.exitedResult();
        }
        throw new ToolError('Failed to write command to shell', 'TOOL_ERROR', { cause: error });
      }
      return await this.waitForMarker();
    } finally {
      this.isExecuting = false;
    }
  }

  /**
   * 轮询 stdout 缓冲区直到出现完成标记
   */
  private async waitForMarker(): Promise<CommandResult> {
    const deadline = Date.now() + this.timeoutMs;

    for (;;) {
      await sleep(this.pollIntervalMs);

      const markerIndex = this.stdoutBuffer.indexOf(this.completionMarker);
      if (markerIndex !== -1) {
        const output = stripTrailingNewline(this.stdoutBuffer.slice(0, markerIndex));
        const error = stripTrailingNewline(this.stderrBuffer);
        this.clearBuffers();
        logger.debug({ outputLength: output.length, errorLength: error.length }, 'Command completed');
        return new CommandResult({ output, error });
      }

      if (this.exitInfo) {
        return this.exitedResult();
      }

      if (Date.now() >= deadline) {
        this.currentStatus = 'poisoned';
        logger.warn({ timeoutMs: this.timeoutMs }, 'Command timed out, session poisoned');
        throw new SessionTimeoutError(this.timeoutMs);
      }
    }
  }

  /**
   * 进程已退出时的结果：保留退出前累积的输出，并提示必须重启
   */
  private exitedResult(): CommandResult {
    const output = stripTrailingNewline(this.stdoutBuffer);
    const stderr = stripTrailingNewline(this.stderrBuffer);
    this.clearBuffers();

    const exitLine = this.describeExit();
    return new CommandResult({
      output,
      error: stderr ? `${stderr}\n${exitLine}` : exitLine,
      systemMessage: RESTART_REQUIRED_MESSAGE,
    });
  }

  private describeExit(): string {
    const exit = this.exitInfo;
    if (exit?.failure) {
      return `bash process error: ${exit.failure}`;
    }
    if (exit && exit.code !== null) {
      return `bash has exited with returncode ${exit.code}`;
    }
    return `bash was terminated by signal ${exit?.signal ?? 'unknown'}`;
  }

  private clearBuffers(): void {
    this.stdoutBuffer = '';
    this.stderrBuffer = '';
  }

  private writeInput(stdin: Writable, text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      stdin.write(text, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  private signalProcessGroup(signal: NodeJS.Signals): void {
    const child = this.process;
    if (!child) return;

    const pid = child.pid;
    if (typeof pid === 'number' && pid > 0) {
      try {
        process.kill(-pid, signal);
        return;
      } catch (error) {
        if (!isErrnoException(error, 'ESRCH')) {
          throw error;
        }
        logger.debug({ pid }, 'Process group already gone');
        return;
      }
    }

    child.kill(signal);
  }

  private static track(session: BashSession): void {
    BashSession.liveSessions.add(session);
    if (BashSession.exitHookInstalled) return;

    BashSession.exitHookInstalled = true;
    process.once('exit', () => {
      for (const live of BashSession.liveSessions) {
        if (live.isAlive) {
          live.signalProcessGroup('SIGTERM');
        }
      }
      BashSession.liveSessions.clear();
    });
  }
}
