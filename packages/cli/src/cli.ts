/**
 * Tether CLI メインクラス
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { SDK_VERSION, toError } from '@tether/shared';
import { listTools, manageConfig, runQuery } from './commands/index.js';
import type { ConfigCommandOptions } from './commands/index.js';
import type { QueryCommandOptions } from './config/index.js';

export class TetherCli {
  private program: Command;

  constructor() {
    this.program = new Command();
    this.setupCommands();
  }

  private setupCommands(): void {
    this.program
      .name('tether')
      .description('Drive an agent CLI over its control protocol')
      .version(SDK_VERSION);

    // Session commands
    this.program
      .command('query')
      .description('Send a prompt and stream the response')
      .argument('<prompt>', 'Prompt text')
      .option('-m, --model <model>', 'Model name')
      .option('--permission-mode <mode>', 'default | acceptEdits | plan | bypassPermissions')
      .option('--max-turns <n>', 'Maximum number of agent turns')
      .option('--cli-path <path>', 'Path to the agent CLI')
      .option('--cwd <dir>', 'Working directory for the agent')
      .option('-c, --config <path>', 'Config file path')
      .option('--calculator', 'Register the in-process calculator tools')
      .option('-v, --verbose', 'Enable debug logging')
      .action(this.query.bind(this));

    // Config commands
    this.program
      .command('config')
      .description('Configuration management')
      .option('--show', 'Show the effective configuration')
      .option('--validate', 'Validate the configuration')
      .option('--create-default', 'Write a default config file')
      .option('-c, --config <path>', 'Config file path')
      .action(this.config.bind(this));

    this.program
      .command('tools')
      .description('List the in-process calculator tools')
      .action(() => listTools());
  }

  private async query(prompt: string, options: QueryCommandOptions): Promise<void> {
    try {
      const succeeded = await runQuery(prompt, options);
      if (!succeeded) process.exitCode = 1;
    } catch (error) {
      console.error(chalk.red(`❌ Query failed: ${toError(error).message}`));
      process.exitCode = 1;
    }
  }

  private async config(options: ConfigCommandOptions): Promise<void> {
    try {
      await manageConfig(options);
    } catch (error) {
      console.error(chalk.red(`❌ Config command failed: ${toError(error).message}`));
      process.exitCode = 1;
    }
  }

  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }
}
