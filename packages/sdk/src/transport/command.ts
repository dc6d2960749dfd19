/**
 * CLI起動引数の組み立て
 */
import { isRecord } from '@tether/shared';
import type { JsonObject } from '@tether/shared';
import type { AgentOptions, McpServerConfig, SandboxSettings } from '../types/index.js';
import { logger } from '../logger/index.js';

const log = logger.child('command');

/**
 * prompt が文字列なら --print モード、null ならストリーミング入力モード
 */
export function buildCommand(cliPath: string, options: AgentOptions, prompt: string | null): string[] {
  const args = [cliPath, '--output-format', 'stream-json', '--verbose'];

  const { systemPrompt } = options;
  if (typeof systemPrompt === 'string') {
    args.push('--system-prompt', systemPrompt);
  } else if (systemPrompt) {
    args.push('--system-prompt-preset', systemPrompt.preset);
    if (systemPrompt.append) args.push('--append-system-prompt', systemPrompt.append);
  }

  if (options.allowedTools?.length) args.push('--allowedTools', options.allowedTools.join(','));
  if (options.maxTurns !== undefined) args.push('--max-turns', String(options.maxTurns));
  if (options.disallowedTools?.length) args.push('--disallowedTools', options.disallowedTools.join(','));
  if (options.model) args.push('--model', options.model);
  if (options.fallbackModel) args.push('--fallback-model', options.fallbackModel);
  if (options.permissionPromptToolName) args.push('--permission-prompt-tool', options.permissionPromptToolName);
  if (options.permissionMode) args.push('--permission-mode', options.permissionMode);
  if (options.continueConversation) args.push('--continue');
  if (options.resume) args.push('--resume', options.resume);

  const settings = resolveSettings(options.settings, options.sandbox);
  if (settings !== undefined) args.push('--settings', settings);

  if (options.maxBudgetUsd !== undefined) args.push('--max-budget-usd', String(options.maxBudgetUsd));
  if (options.maxThinkingTokens !== undefined) args.push('--max-thinking-tokens', String(options.maxThinkingTokens));
  if (options.betas?.length) args.push('--betas', options.betas.join(','));
  if (options.appendAllowedTools?.length) args.push('--append-allowed-tools', options.appendAllowedTools.join(','));
  if (options.enableFileCheckpointing) args.push('--enable-file-checkpointing');

  if (Array.isArray(options.tools)) {
    args.push('--tools', options.tools.join(','));
  } else if (options.tools) {
    args.push('--tools', JSON.stringify(options.tools));
  }

  if (options.outputFormat) {
    const schema = options.outputFormat.type === 'json_schema' ? options.outputFormat.schema : options.outputFormat;
    args.push('--json-schema', typeof schema === 'string' ? schema : JSON.stringify(schema));
  }

  for (const dir of options.addDirs ?? []) {
    args.push('--add-dir', dir);
  }

  const mcpServers = serializeMcpServers(options.mcpServers ?? {});
  if (Object.keys(mcpServers).length > 0) {
    args.push('--mcp-config', JSON.stringify({ mcpServers }));
  }

  if (options.includePartialMessages) args.push('--include-partial-messages');
  if (options.forkSession) args.push('--fork-session');

  if (options.agents && Object.keys(options.agents).length > 0) {
    args.push('--agents', JSON.stringify(options.agents));
  }

  if (options.plugins?.length) args.push('--plugins', JSON.stringify(options.plugins));

  args.push('--setting-sources', (options.settingSources ?? []).join(','));

  for (const [flag, value] of Object.entries(options.extraArgs ?? {})) {
    if (value === null) {
      args.push(`--${flag}`);
    } else {
      args.push(`--${flag}`, value);
    }
  }

  if (prompt === null) {
    args.push('--input-format', 'stream-json');
  } else {
    args.push('--print', '--', prompt);
  }

  log.debug(`Built command with ${args.length - 1} arguments`);
  return args;
}

function parseJsonObject(text: string): JsonObject | undefined {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/**
 * sandbox は settings の sandbox キーに合成する
 * settings がJSONとして読めない場合はファイルパスとみなし、sandbox は渡さない
 */
function resolveSettings(settings: string | JsonObject | undefined, sandbox: SandboxSettings | undefined): string | undefined {
  const hasSandbox = sandbox !== undefined && Object.keys(sandbox).length > 0;
  if (!hasSandbox) {
    if (settings === undefined) return undefined;
    return typeof settings === 'string' ? settings : JSON.stringify(settings);
  }

  let base: JsonObject = {};
  if (typeof settings === 'string') {
    const parsed = parseJsonObject(settings);
    if (!parsed) {
      log.warn('Settings is a file path, sandbox settings are ignored. Pass settings as an object or JSON string to merge them');
      return settings;
    }
    base = parsed;
  } else if (settings) {
    base = settings;
  }
  return JSON.stringify({ ...base, sandbox });
}

/**
 * インプロセスサーバーは instance を除いた設定だけを渡す
 */
function serializeMcpServers(servers: Record<string, McpServerConfig>): Record<string, JsonObject> {
  const result: Record<string, JsonObject> = {};
  for (const [name, config] of Object.entries(servers)) {
    if (config.type === 'sdk') {
      result[name] = { type: 'sdk', name: config.name };
    } else {
      result[name] = { ...config };
    }
  }
  return result;
}
