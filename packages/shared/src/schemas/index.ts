/**
 * Zodバリデーションスキーマ
 */
import { z } from 'zod';
import { LOG_LEVELS, PERMISSION_MODES } from '../constants/index.js';

export const PermissionModeSchema = z.enum(PERMISSION_MODES);
export const LogLevelSchema = z.enum(LOG_LEVELS);

// 設定スキーマ
export const TetherConfigSchema = z.object({
  cli: z.object({
    path: z.string().min(1).optional(),
    entrypoint: z.string().min(1),
    maxBufferSize: z.number().int().min(1024),
  }),
  protocol: z.object({
    requestTimeout: z.number().int().min(1),
    initializeTimeout: z.number().int().min(1),
    subtypeTimeouts: z.record(z.number().int().min(1)),
  }),
  logging: z.object({
    level: LogLevelSchema,
    console: z.boolean(),
    structured: z.boolean(),
  }),
  defaults: z.object({
    model: z.string().optional(),
    permissionMode: PermissionModeSchema.optional(),
    maxTurns: z.number().int().min(1).optional(),
    cwd: z.string().optional(),
  }),
});

export type TetherConfig = z.infer<typeof TetherConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

// MCPリクエストスキーマ
export const MCPRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number()]).optional(),
  method: z.string(),
  params: z.record(z.unknown()).optional(),
});

// 受信コントロールレスポンス（request_id / requestId の両表記を受け付ける）
export const ControlResponseMessageSchema = z.object({
  type: z.literal('control_response'),
  response: z
    .object({
      subtype: z.enum(['success', 'error']),
      request_id: z.string().optional(),
      requestId: z.string().optional(),
      response: z.record(z.unknown()).optional(),
      error: z.string().optional(),
    })
    .passthrough(),
});

export const ControlCancelMessageSchema = z.object({
  type: z.literal('control_cancel_request'),
  request_id: z.string().optional(),
  requestId: z.string().optional(),
});

// 受信コントロールリクエスト
export const CanUseToolRequestSchema = z.object({
  subtype: z.literal('can_use_tool'),
  tool_name: z.string(),
  input: z.record(z.unknown()),
  permission_suggestions: z.array(z.record(z.unknown())).optional(),
  blocked_path: z.string().nullable().optional(),
});

export const HookCallbackRequestSchema = z.object({
  subtype: z.literal('hook_callback'),
  callback_id: z.string(),
  input: z.record(z.unknown()).default({}),
  tool_use_id: z.string().nullable().optional(),
});

export const McpMessageRequestSchema = z.object({
  subtype: z.literal('mcp_message'),
  server_name: z.string(),
  message: z.record(z.unknown()),
});

export const InboundControlRequestSchema = z.discriminatedUnion('subtype', [
  CanUseToolRequestSchema,
  HookCallbackRequestSchema,
  McpMessageRequestSchema,
]);

export type CanUseToolRequest = z.infer<typeof CanUseToolRequestSchema>;
export type HookCallbackRequest = z.infer<typeof HookCallbackRequestSchema>;
export type McpMessageRequest = z.infer<typeof McpMessageRequestSchema>;
export type InboundControlRequest = z.infer<typeof InboundControlRequestSchema>;

// インプロセスサーバーのハンドラー戻り値（未知のフィールドはそのまま保持）
export const CallToolResultSchema = z.object({ content: z.array(z.unknown()) }).passthrough();
export const ReadResourceResultSchema = z.object({ contents: z.array(z.unknown()) }).passthrough();
export const GetPromptResultSchema = z.object({ messages: z.array(z.unknown()) }).passthrough();

export type CallToolResult = z.infer<typeof CallToolResultSchema>;
export type ReadResourceResult = z.infer<typeof ReadResourceResultSchema>;
export type GetPromptResult = z.infer<typeof GetPromptResultSchema>;
