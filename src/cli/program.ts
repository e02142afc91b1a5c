/**
 * CLI program definition using Commander.js.
 *
 * Core commands:
 * - shellhost run <command...> - Run commands in one session
 * - shellhost repl - Interactive session
 * - shellhost describe - Print the tool descriptor
 */

import { Command } from 'commander';
import { describeCommand } from './commands/describe.ts';
import type { GlobalOptions } from './commands/options.ts';
import { replCommand } from './commands/repl.ts';
import { runCommand } from './commands/run.ts';

const version = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('shellhost')
    .description('Persistent shell session for agent loops')
    .version(version)
    .option('--shell <path>', 'Shell executable')
    .option('--timeout <seconds>', 'Per-command timeout in seconds')
    .option('--poll-interval <ms>', 'Output polling interval in milliseconds')
    .option('--config <file>', 'JSON settings file');

  program
    .command('run')
    .description('Run commands one after another in a single session')
    // 每个参数是一条完整命令，所以带参数的命令必须加引号
    .argument('<command...>', 'Commands to run, one per argument; quote each command, e.g. "ls -la"')
    .action(async (commands: string[]) => {
      await runCommand(commands, program.opts<GlobalOptions>());
    });

  program
    .command('repl')
    .description('Start an interactive session')
    .action(async () => {
      await replCommand(program.opts<GlobalOptions>());
    });

  program
    .command('describe')
    .description('Print the tool descriptor as JSON')
    .action(() => {
      describeCommand(program.opts<GlobalOptions>());
    });

  return program;
}
