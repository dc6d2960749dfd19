/**
 * 共通定数定義
 */

// MCPプロトコル関連
export const MCP_PROTOCOL_VERSION = '2024-11-05';

// JSON-RPCエラーコード
export const ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  // tether固有エラー
  HANDLER_ERROR: -32000,
  TIMEOUT: -32001,
  CANCELLED: -32002,
  CONFIG_ERROR: -32003,
} as const;

// タイムアウト（ミリ秒）
export const DEFAULT_REQUEST_TIMEOUT = 60_000;
export const DEFAULT_INITIALIZE_TIMEOUT = 60_000;

// 長いエージェントターンに付随するリクエスト
export const DEFAULT_SUBTYPE_TIMEOUTS: Readonly<Record<string, number>> = {
  interrupt: 600_000,
  rewind_files: 600_000,
};

// NDJSONバッファ上限（1MB）
export const DEFAULT_MAX_BUFFER_SIZE = 1024 * 1024;

// エージェントCLI
export const DEFAULT_CLI_COMMAND = 'claude';

// サブプロセスに渡すエントリーポイント識別子
export const DEFAULT_ENTRYPOINT = 'sdk-ts';
export const ENTRYPOINT_ENV_VAR = 'CLAUDE_CODE_ENTRYPOINT';
export const SDK_VERSION_ENV_VAR = 'CLAUDE_AGENT_SDK_VERSION';

export const SDK_VERSION = '0.1.0';

export const PERMISSION_MODES = ['default', 'acceptEdits', 'plan', 'bypassPermissions'] as const;

export const HOOK_EVENTS = [
  'PreToolUse',
  'PostToolUse',
  'PostToolUseFailure',
  'UserPromptSubmit',
  'Stop',
  'SubagentStop',
  'SubagentStart',
  'Notification',
  'PermissionRequest',
  'PreCompact',
] as const;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

// フック出力のキー変換（予約語回避名 → CLI名）
export const HOOK_OUTPUT_KEY_MAP: Readonly<Record<string, string>> = {
  continue_: 'continue',
  async_: 'async',
  hook_specific_output: 'hookSpecificOutput',
  suppress_output: 'suppressOutput',
  stop_reason: 'stopReason',
  system_message: 'systemMessage',
  async_timeout: 'asyncTimeout',
};
