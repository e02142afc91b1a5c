/**
 * BashTool 单元测试 — 门面层：惰性启动、restart、参数校验、描述符与资源释放。
 */

import { describe, expect, it } from 'vitest';
import {
  SessionTimeoutError,
  ToolError,
  ToolInputError,
} from '../../../src/common/errors.ts';
import { BashTool, RESTARTED_MESSAGE, withBashTool } from '../../../src/tools/bash-tool.ts';
import { createFakeSpawner, echoResponder, type FakeResponder } from '../../helpers/fake-shell.ts';

function createTestTool(responder: FakeResponder = echoResponder, timeoutMs = 500) {
  const spawner = createFakeSpawner(responder);
  const tool = new BashTool({
    pollIntervalMs: 5,
    timeoutMs,
    spawnProcess: spawner.spawnProcess,
  });
  return { tool, ...spawner };
}

describe('BashTool', () => {
  describe('invoke', () => {
    it('starts a session lazily on first use', async () => {
      const { tool, spawnProcess } = createTestTool();
      expect(tool.getSession()).toBeNull();

      const result = await tool.invoke({ command: 'echo hello' });

      expect(result.toJSON()).toEqual({ output: 'hello', error: '', system: '' });
      expect(spawnProcess).toHaveBeenCalledTimes(1);
      expect(tool.getSession()?.status).toBe('running');
    });

    it('reuses the same session for later commands', async () => {
      const { tool, spawnProcess, shells } = createTestTool();

      await tool.invoke({ command: 'echo one' });
      await tool.invoke({ command: 'echo two' });

      expect(spawnProcess).toHaveBeenCalledTimes(1);
      expect(shells[0]?.commands).toEqual(['echo one', 'echo two']);
    });

    it('fails when neither command nor restart is given', async () => {
      const { tool } = createTestTool();

      const error = await tool.invoke({}).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ToolError);
      expect(error).toHaveProperty('code', 'NO_COMMAND');
      expect(error).toHaveProperty('message', 'no command provided.');
    });

    it('treats a blank command as no command', async () => {
      const { tool } = createTestTool();
      await expect(tool.invoke({ command: '   ' })).rejects.toThrow('no command provided.');
    });

    it('returns the exited-shell result instead of throwing', async () => {
      const { tool } = createTestTool((command) => (command === 'exit 1' ? { exitCode: 1 } : echoResponder(command)));

      const first = await tool.invoke({ command: 'exit 1' });
      const second = await tool.invoke({ command: 'echo hi' });

      expect(first.error).toBe('bash has exited with returncode 1');
      expect(first.systemMessage).toBe('tool must be restarted');
      expect(second.error).toBe('bash has exited with returncode 1');
      expect(second.systemMessage).toBe('tool must be restarted');
    });

    it('propagates session timeouts unchanged', async () => {
      const { tool } = createTestTool(() => ({ hang: true }), 50);
      await expect(tool.invoke({ command: 'sleep 100' })).rejects.toBeInstanceOf(SessionTimeoutError);
    });
  });

  describe('restart', () => {
    it('replaces the session and confirms with a system message', async () => {
      const { tool, shells } = createTestTool();
      await tool.invoke({ command: 'echo before' });
      const oldSession = tool.getSession();

      const result = await tool.invoke({ restart: true });

      expect(result.toJSON()).toEqual({ output: '', error: '', system: RESTARTED_MESSAGE });
      expect(shells).toHaveLength(2);
      expect(shells[0]?.kill).toHaveBeenCalledWith('SIGTERM');
      expect(tool.getSession()).not.toBe(oldSession);
      expect(tool.getSession()?.status).toBe('running');
    });

    it('starts a session when none exists yet', async () => {
      const { tool, shells } = createTestTool();

      await tool.invoke({ restart: true });

      expect(shells).toHaveLength(1);
      expect(shells[0]?.kill).not.toHaveBeenCalled();
    });

    it('does not run a command passed together with restart', async () => {
      const { tool, shells } = createTestTool();

      const result = await tool.invoke({ restart: true, command: 'echo ignored' });

      expect(result.systemMessage).toBe(RESTARTED_MESSAGE);
      expect(shells[0]?.commands).toEqual([]);
    });

    it('recovers a poisoned session', async () => {
      const { tool } = createTestTool(
        (command) => (command === 'sleep 100' ? { hang: true } : command === 'pwd' ? { stdout: '/work\n' } : {}),
        50
      );

      await expect(tool.invoke({ command: 'sleep 100' })).rejects.toBeInstanceOf(SessionTimeoutError);
      await expect(tool.invoke({ command: 'pwd' })).rejects.toBeInstanceOf(SessionTimeoutError);

      await tool.invoke({ restart: true });
      const result = await tool.invoke({ command: 'pwd' });

      expect(result.output).toBe('/work');
      expect(result.error).toBe('');
    });

    it('recovers after the shell exited without signalling it again', async () => {
      const { tool, shells } = createTestTool((command) => (command === 'exit 1' ? { exitCode: 1 } : echoResponder(command)));
      await tool.invoke({ command: 'exit 1' });

      await tool.invoke({ restart: true });
      const result = await tool.invoke({ command: 'echo back' });

      expect(shells[0]?.kill).not.toHaveBeenCalled();
      expect(result.output).toBe('back');
    });
  });

  describe('call', () => {
    it('validates raw controller input', async () => {
      const { tool } = createTestTool();
      await expect(tool.call({ command: 42 })).rejects.toBeInstanceOf(ToolInputError);
      await expect(tool.call('echo hi')).rejects.toBeInstanceOf(ToolInputError);
    });

    it('runs valid input', async () => {
      const { tool } = createTestTool();
      const result = await tool.call({ command: 'echo hello' });
      expect(result.output).toBe('hello');
    });

    it('accepts a restart without a command', async () => {
      const { tool } = createTestTool();
      const result = await tool.call({ restart: true });
      expect(result.systemMessage).toBe(RESTARTED_MESSAGE);
    });
  });

  describe('describe', () => {
    it('declares the bash tool with a required command string', () => {
      const { tool } = createTestTool();

      const definition = tool.describe();

      expect(definition.name).toBe('bash');
      expect(definition.input_schema.type).toBe('object');
      expect(definition.input_schema.required).toEqual(['command']);
      expect(definition.input_schema.properties?.command).toMatchObject({ type: 'string' });
      expect(definition.input_schema.properties?.restart).toMatchObject({ type: 'boolean' });
      expect(definition.input_schema).not.toHaveProperty('$schema');
    });

    it('mentions the configured timeout in the description', () => {
      const defaults = new BashTool();
      const short = new BashTool({ timeoutMs: 30_000 });

      expect(defaults.describe().description).toContain('after 120 seconds');
      expect(short.describe().description).toContain('after 30 seconds');
    });

    it('has no side effects', () => {
      const { tool, spawnProcess } = createTestTool();
      tool.describe();
      expect(spawnProcess).not.toHaveBeenCalled();
      expect(tool.getSession()).toBeNull();
    });
  });

  describe('invokeEach', () => {
    it('yields one result per command in order', async () => {
      const { tool } = createTestTool();
      const outputs: string[] = [];

      for await (const result of tool.invokeEach(['echo A', 'echo B'])) {
        outputs.push(result.output);
      }

      expect(outputs).toEqual(['A', 'B']);
    });
  });

  describe('disposal', () => {
    it('stops the running session and can be called twice', async () => {
      const { tool, shells } = createTestTool();
      await tool.invoke({ command: 'echo hi' });

      await tool.dispose();
      await tool.dispose();

      expect(shells[0]?.kill).toHaveBeenCalledTimes(1);
      expect(tool.getSession()).toBeNull();
    });

    it('withBashTool disposes when the callback throws', async () => {
      const { spawnProcess, shells } = createFakeSpawner();

      await expect(
        withBashTool({ pollIntervalMs: 5, spawnProcess }, async (tool) => {
          await tool.invoke({ command: 'echo hi' });
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(shells[0]?.kill).toHaveBeenCalledWith('SIGTERM');
    });

    it('withBashTool returns the callback value', async () => {
      const { spawnProcess } = createFakeSpawner();

      const output = await withBashTool({ pollIntervalMs: 5, spawnProcess }, async (tool) => {
        const result = await tool.invoke({ command: 'echo value' });
        return result.output;
      });

      expect(output).toBe('value');
    });
  });
});
