/**
 * 共通型定義
 */

// デコード済みJSONオブジェクト
export type JsonObject = Record<string, unknown>;

// 権限モード
export type PermissionMode = 'default' | 'acceptEdits' | 'plan' | 'bypassPermissions';

// MCPプロトコル関連型
export type MCPRequestId = string | number;

export interface MCPResponse {
  jsonrpc: '2.0';
  id?: MCPRequestId | null;
  result?: JsonObject;
  error?: MCPError;
}

export interface MCPError {
  code: number;
  message: string;
  data?: unknown;
}

// コントロールプロトコル関連型
export interface ControlRequestPayload {
  subtype: string;
  [key: string]: unknown;
}

export interface ControlSuccessBody {
  subtype: 'success';
  request_id: string;
  requestId: string;
  response: JsonObject;
}

export interface ControlErrorBody {
  subtype: 'error';
  request_id: string;
  requestId: string;
  error: string;
}

// エラー型
export class TetherError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'TetherError';
  }
}
