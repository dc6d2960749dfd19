/**
 * CLI コマンド実装
 */
import { existsSync } from 'fs';
import chalk from 'chalk';
import { AgentClient, ConfigManager, logger } from '@tether/sdk';
import type { Transport } from '@tether/sdk';
import { createCalculatorServer } from '../demo/calculator.js';
import { DEFAULT_CONFIG_PATH, toAgentOptions } from '../config/index.js';
import type { QueryCommandOptions } from '../config/index.js';
import { formatBytes, formatMessage, logError, logInfo, logSuccess, logWarning } from '../utils/index.js';

export type Output = (line: string) => void;

const stdout: Output = line => console.log(line);

export interface ConfigCommandOptions {
  show?: boolean;
  validate?: boolean;
  createDefault?: boolean;
  config?: string;
}

/**
 * 1ターン分の会話を実行し、結果メッセージまで表示する
 */
export async function runQuery(
  prompt: string,
  flags: QueryCommandOptions,
  out: Output = stdout,
  transport?: Transport
): Promise<boolean> {
  const configManager = new ConfigManager(flags.config ?? DEFAULT_CONFIG_PATH);
  if (flags.verbose) logger.configure({ level: 'debug' });

  const client = new AgentClient(toAgentOptions(flags), { configManager, transport });
  let succeeded = true;

  try {
    await client.connect();
    await client.query(prompt);

    for await (const message of client.receiveResponse()) {
      for (const line of formatMessage(message)) out(line);
      if (message.type === 'result' && message.isError) succeeded = false;
    }
  } finally {
    await client.disconnect();
  }

  return succeeded;
}

export async function manageConfig(options: ConfigCommandOptions, out: Output = stdout): Promise<void> {
  const path = options.config ?? DEFAULT_CONFIG_PATH;

  if (options.createDefault) {
    if (existsSync(path)) {
      logWarning(`Config already exists: ${path}`);
    } else {
      // 環境変数を無視して既定値のみを書き出す
      await new ConfigManager(path, {}).saveConfig(path);
      logSuccess(`Default config written to ${path}`);
    }
  }

  const configManager = new ConfigManager(path);

  if (options.validate) {
    const { valid, errors } = configManager.validate();
    if (valid) {
      logSuccess('Configuration is valid');
    } else {
      logError('Configuration is invalid:');
      for (const error of errors) out(`  - ${error}`);
      process.exitCode = 1;
    }
  }

  if (options.show || (!options.validate && !options.createDefault)) {
    const summary = configManager.getSummary();
    const { cli } = configManager.getConfig();
    out(chalk.blue('📋 Tether Configuration:'));
    out(`  CLI: ${summary.cli}`);
    out(`  Buffer: ${formatBytes(cli.maxBufferSize)}`);
    out(`  Protocol: ${summary.protocol}`);
    out(`  Logging: ${summary.logging}`);
    out(`  Model: ${summary.model}`);
  }
}

export function listTools(out: Output = stdout): void {
  const server = createCalculatorServer().instance;
  logInfo(`Tools provided by '${server.name}' v${server.version}:`);
  for (const listing of server.listTools()) {
    out(`  ${chalk.green(listing.name)} - ${listing.description}`);
  }
}
