/**
 * CLI 設定管理
 * コマンドラインフラグをエージェントオプションに変換する
 */
import { PermissionModeSchema, TetherError } from '@tether/shared';
import type { AgentOptions } from '@tether/sdk';
import { calculatorToolNames, createCalculatorServer, CALCULATOR_SERVER_NAME } from '../demo/calculator.js';

export interface QueryCommandOptions {
  model?: string;
  permissionMode?: string;
  maxTurns?: string;
  cliPath?: string;
  config?: string;
  cwd?: string;
  calculator?: boolean;
  verbose?: boolean;
}

export const DEFAULT_CONFIG_PATH = './tether.config.json';

export function toAgentOptions(flags: QueryCommandOptions): AgentOptions {
  const options: AgentOptions = {};

  if (flags.model) options.model = flags.model;
  if (flags.cliPath) options.cliPath = flags.cliPath;
  if (flags.cwd) options.cwd = flags.cwd;

  if (flags.permissionMode !== undefined) {
    const mode = PermissionModeSchema.safeParse(flags.permissionMode);
    if (!mode.success) {
      throw new TetherError(
        `Invalid permission mode: ${flags.permissionMode} (expected one of ${PermissionModeSchema.options.join(', ')})`,
        'CONFIG_ERROR'
      );
    }
    options.permissionMode = mode.data;
  }

  if (flags.maxTurns !== undefined) {
    const maxTurns = Number(flags.maxTurns);
    if (!Number.isInteger(maxTurns) || maxTurns < 1) {
      throw new TetherError(`Invalid max turns: ${flags.maxTurns}`, 'CONFIG_ERROR');
    }
    options.maxTurns = maxTurns;
  }

  if (flags.calculator) {
    options.mcpServers = { [CALCULATOR_SERVER_NAME]: createCalculatorServer() };
    options.allowedTools = calculatorToolNames();
  }

  return options;
}
