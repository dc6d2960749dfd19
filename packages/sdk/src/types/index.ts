/**
 * SDK公開型定義
 */
import type { JsonObject, PermissionMode } from '@tether/shared';
import type { HookConfig } from '../hooks/index.js';
import type { McpSdkServerConfig } from '../mcp/index.js';

// 権限関連型（ワイヤー形式そのまま）
export interface PermissionRuleValue {
  toolName: string;
  ruleContent?: string;
}

export type PermissionUpdateDestination = 'userSettings' | 'projectSettings' | 'localSettings' | 'session';

export interface PermissionUpdate {
  type: 'addRules' | 'replaceRules' | 'removeRules' | 'setMode' | 'addDirectories' | 'removeDirectories';
  rules?: PermissionRuleValue[];
  behavior?: 'allow' | 'deny' | 'ask';
  mode?: PermissionMode;
  directories?: string[];
  destination?: PermissionUpdateDestination;
}

export interface PermissionResultAllow {
  behavior: 'allow';
  updatedInput?: JsonObject;
  updatedPermissions?: PermissionUpdate[];
}

export interface PermissionResultDeny {
  behavior: 'deny';
  message: string;
  interrupt?: boolean;
}

export type PermissionResult = PermissionResultAllow | PermissionResultDeny;

export interface ToolPermissionContext {
  signal: AbortSignal;
  suggestions: JsonObject[];
  blockedPath?: string;
}

export type CanUseTool = (
  toolName: string,
  input: JsonObject,
  context: ToolPermissionContext
) => Promise<PermissionResult> | PermissionResult;

// 外部MCPサーバー設定
export interface McpStdioServerConfig {
  type?: 'stdio';
  command: string;
  args?: string[];
  env?: Record<string, string>;
}

export interface McpSSEServerConfig {
  type: 'sse';
  url: string;
  headers?: Record<string, string>;
}

export interface McpHttpServerConfig {
  type: 'http';
  url: string;
  headers?: Record<string, string>;
}

export type McpServerConfig =
  | McpStdioServerConfig
  | McpSSEServerConfig
  | McpHttpServerConfig
  | McpSdkServerConfig;

export interface AgentDefinition {
  description: string;
  prompt: string;
  tools?: string[];
  model?: string;
}

export interface SystemPromptPreset {
  type: 'preset';
  preset: string;
  append?: string;
}

export type SettingSource = 'user' | 'project' | 'local';

export interface ToolsPreset {
  type: 'preset';
  preset: string;
}

export interface PluginConfig {
  type: 'plugin';
  path: string;
}

export interface SandboxNetworkConfig {
  allowUnixSockets?: string[];
  allowAllUnixSockets?: boolean;
  allowLocalBinding?: boolean;
  httpProxyPort?: number;
  socksProxyPort?: number;
}

export interface SandboxSettings {
  enabled?: boolean;
  autoAllowBashIfSandboxed?: boolean;
  excludedCommands?: string[];
  allowUnsandboxedCommands?: boolean;
  network?: SandboxNetworkConfig;
  ignoreViolations?: { file?: string[]; network?: string[] };
  enableWeakerNestedSandbox?: boolean;
}

export interface AgentOptions {
  allowedTools?: string[];
  disallowedTools?: string[];
  systemPrompt?: string | SystemPromptPreset;
  mcpServers?: Record<string, McpServerConfig>;
  permissionMode?: PermissionMode;
  permissionPromptToolName?: string;
  continueConversation?: boolean;
  resume?: string;
  forkSession?: boolean;
  maxTurns?: number;
  maxBudgetUsd?: number;
  maxThinkingTokens?: number;
  model?: string;
  fallbackModel?: string;
  cwd?: string;
  cliPath?: string;
  /** JSON文字列、ファイルパス、またはオブジェクト */
  settings?: string | JsonObject;
  /** settings に sandbox キーとして合成する。settings がファイルパスの場合は無視される */
  sandbox?: SandboxSettings;
  addDirs?: string[];
  env?: Record<string, string>;
  /** 値が null のフラグは値なしで渡す */
  extraArgs?: Record<string, string | null>;
  maxBufferSize?: number;
  stderr?: (line: string) => void;
  canUseTool?: CanUseTool;
  hooks?: HookConfig;
  includePartialMessages?: boolean;
  agents?: Record<string, AgentDefinition>;
  settingSources?: SettingSource[];
  outputFormat?: JsonObject;
  betas?: string[];
  enableFileCheckpointing?: boolean;
  appendAllowedTools?: string[];
  /** 基本ツールの集合。名前の配列かプリセット */
  tools?: string[] | ToolsPreset;
  plugins?: PluginConfig[];
  /** CLIプロセスを実行するユーザーID */
  user?: number;
}

// メッセージ型
export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ThinkingBlock {
  type: 'thinking';
  thinking: string;
  signature: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: JsonObject;
}

export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  content?: string | JsonObject[];
  isError?: boolean;
}

export type ContentBlock = TextBlock | ThinkingBlock | ToolUseBlock | ToolResultBlock;

export interface UserMessage {
  type: 'user';
  content: string | ContentBlock[];
  uuid?: string;
  parentToolUseId?: string;
}

export type AssistantMessageError =
  | 'authentication_failed'
  | 'billing_error'
  | 'rate_limit'
  | 'invalid_request'
  | 'server_error'
  | 'unknown';

export interface AssistantMessage {
  type: 'assistant';
  content: ContentBlock[];
  model: string;
  parentToolUseId?: string;
  error?: AssistantMessageError;
}

export interface SystemMessage {
  type: 'system';
  subtype: string;
  data: JsonObject;
}

export interface ResultMessage {
  type: 'result';
  subtype: string;
  durationMs: number;
  durationApiMs: number;
  isError: boolean;
  numTurns: number;
  sessionId: string;
  totalCostUsd?: number;
  usage?: JsonObject;
  result?: string;
  structuredOutput?: unknown;
}

export interface StreamEvent {
  type: 'stream_event';
  uuid: string;
  sessionId: string;
  event: JsonObject;
  parentToolUseId?: string;
}

export type Message = UserMessage | AssistantMessage | SystemMessage | ResultMessage | StreamEvent;
