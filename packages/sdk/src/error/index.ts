/**
 * エラーハンドリング
 * SDK例外階層とJSON-RPC / コントロールレスポンスへの変換
 */
import { TetherError, ERROR_CODES, isRecord } from '@tether/shared';
import type { MCPError, MCPRequestId, MCPResponse } from '@tether/shared';
import { logger } from '../logger/index.js';

// トランスポートが使用不能
export class CLIConnectionError extends TetherError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONNECTION_ERROR', details);
    this.name = 'CLIConnectionError';
  }
}

export class CLINotFoundError extends TetherError {
  constructor(message = 'Agent CLI not found', public readonly cliPath?: string) {
    super(cliPath ? `${message}: ${cliPath}` : message, 'CLI_NOT_FOUND');
    this.name = 'CLINotFoundError';
  }
}

export class ProcessError extends TetherError {
  constructor(
    message: string,
    public readonly exitCode?: number,
    public readonly stderr?: string
  ) {
    let full = message;
    if (exitCode !== undefined) full += ` (exit code: ${exitCode})`;
    if (stderr) full += `\nError output: ${stderr}`;
    super(full, 'PROCESS_ERROR', { exitCode, stderr });
    this.name = 'ProcessError';
  }
}

export class CLIJSONDecodeError extends TetherError {
  constructor(
    public readonly line: string,
    public readonly originalError: Error
  ) {
    super(`Failed to decode JSON: ${line.slice(0, 100)}...`, 'JSON_DECODE_ERROR', {
      cause: originalError.message,
    });
    this.name = 'CLIJSONDecodeError';
  }
}

export class MessageParseError extends TetherError {
  constructor(message: string, public readonly data?: unknown) {
    super(message, 'MESSAGE_PARSE_ERROR', data);
    this.name = 'MessageParseError';
  }
}

// 送信リクエストが上限時間内に応答しなかった
export class ControlTimeoutError extends TetherError {
  constructor(
    public readonly subtype: string,
    public readonly timeoutMs: number
  ) {
    super(`Control request timeout: ${subtype} (${timeoutMs}ms)`, 'CONTROL_TIMEOUT', {
      subtype,
      timeoutMs,
    });
    this.name = 'ControlTimeoutError';
  }
}

export class HookTimeoutError extends TetherError {
  constructor(
    public readonly callbackId: string,
    public readonly timeoutSeconds: number
  ) {
    super(`Hook callback ${callbackId} timed out after ${timeoutSeconds}s`, 'HOOK_TIMEOUT', {
      callbackId,
      timeoutSeconds,
    });
    this.name = 'HookTimeoutError';
  }
}

// ピアがエラーレスポンスを返した
export class ControlRequestError extends TetherError {
  constructor(message: string, public readonly subtype: string) {
    super(message, 'CONTROL_ERROR', { subtype });
    this.name = 'ControlRequestError';
  }
}

export class ProtocolError extends TetherError {
  constructor(message: string, details?: unknown) {
    super(message, 'PROTOCOL_ERROR', details);
    this.name = 'ProtocolError';
  }
}

export class NotFoundError extends TetherError {
  constructor(
    public readonly kind: 'Tool' | 'Resource' | 'Prompt',
    public readonly key: string
  ) {
    super(`${kind} '${key}' not found`, 'NOT_FOUND', { kind, key });
    this.name = 'NotFoundError';
  }
}

export class HandlerContractError extends TetherError {
  constructor(message: string) {
    super(message, 'HANDLER_CONTRACT');
    this.name = 'HandlerContractError';
  }
}

export class CancelledError extends TetherError {
  constructor(message = 'Cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export interface ErrorContext {
  source: string;
  method?: string;
  requestId?: MCPRequestId | null;
  timestamp?: Date;
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export interface ErrorLog {
  id: string;
  error: Error;
  context: ErrorContext;
  severity: ErrorSeverity;
  timestamp: Date;
}

export class ErrorHandler {
  private errorLog: ErrorLog[] = [];

  constructor(private readonly maxLogSize = 1000) {}

  /**
   * 例外をJSON-RPCエラーレスポンスに変換する
   */
  handleError(error: unknown, context: ErrorContext): MCPResponse {
    const normalizedError = this.record(error, context);
    return {
      jsonrpc: '2.0',
      id: context.requestId ?? null,
      error: this.toMCPError(normalizedError)
    };
  }

  /**
   * 例外をコントロールエラーレスポンス用の文字列に変換する
   */
  describe(error: unknown, context: ErrorContext): string {
    return this.record(error, context).message;
  }

  private record(error: unknown, context: ErrorContext): Error {
    const normalizedError = this.normalizeError(error);
    this.logError(normalizedError, context, this.classifyError(normalizedError));
    return normalizedError;
  }

  private normalizeError(error: unknown): Error {
    if (error instanceof Error) {
      return error;
    }

    if (typeof error === 'string') {
      return new Error(error);
    }

    if (isRecord(error)) {
      return new Error(JSON.stringify(error));
    }

    return new Error('Unknown error occurred');
  }

  classifyError(error: Error): ErrorSeverity {
    if (error instanceof TetherError) {
      switch (error.code) {
        case 'CONNECTION_ERROR':
        case 'CLI_NOT_FOUND':
        case 'PROCESS_ERROR':
          return ErrorSeverity.HIGH;
        case 'CONTROL_TIMEOUT':
        case 'HOOK_TIMEOUT':
        case 'PROTOCOL_ERROR':
        case 'HANDLER_CONTRACT':
          return ErrorSeverity.MEDIUM;
        default:
          return ErrorSeverity.LOW;
      }
    }

    const message = error.message.toLowerCase();

    if (message.includes('out of memory') || message.includes('maximum call stack')) {
      return ErrorSeverity.CRITICAL;
    }

    if (message.includes('timeout')) {
      return ErrorSeverity.MEDIUM;
    }

    return ErrorSeverity.LOW;
  }

  private logError(error: Error, context: ErrorContext, severity: ErrorSeverity): void {
    const entry: ErrorLog = {
      id: `error-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`,
      error,
      context: {
        ...context,
        timestamp: context.timestamp ?? new Date()
      },
      severity,
      timestamp: new Date()
    };

    this.errorLog.push(entry);

    if (this.errorLog.length > this.maxLogSize) {
      this.errorLog = this.errorLog.slice(-this.maxLogSize);
    }

    const line = `${getSeverityPrefix(severity)} [${context.source}] ${context.method ?? 'unknown'}: ${error.message}`;
    if (severity === ErrorSeverity.LOW) {
      logger.debug(line);
    } else {
      logger.error(line);
    }
    if (severity === ErrorSeverity.HIGH || severity === ErrorSeverity.CRITICAL) {
      logger.debug(`Stack: ${error.stack ?? '(none)'}`);
    }
  }

  private toMCPError(error: Error): MCPError {
    return {
      code: error instanceof TetherError ? mapErrorCode(error) : ERROR_CODES.INTERNAL_ERROR,
      message: error.message,
      data: {
        type: error instanceof TetherError ? error.code : 'INTERNAL_ERROR'
      }
    };
  }

  // Public API
  getRecentErrors(limit = 50): ErrorLog[] {
    return this.errorLog.slice(-limit);
  }

  getErrorStats(): {
    total: number;
    bySeverity: Record<ErrorSeverity, number>;
    recentCount: number;
  } {
    const recentThreshold = Date.now() - 300000; // 5分前
    const bySeverity: Record<ErrorSeverity, number> = {
      [ErrorSeverity.LOW]: 0,
      [ErrorSeverity.MEDIUM]: 0,
      [ErrorSeverity.HIGH]: 0,
      [ErrorSeverity.CRITICAL]: 0
    };

    let recentCount = 0;

    for (const log of this.errorLog) {
      bySeverity[log.severity]++;

      if (log.timestamp.getTime() > recentThreshold) {
        recentCount++;
      }
    }

    return {
      total: this.errorLog.length,
      bySeverity,
      recentCount
    };
  }

  clearErrorLog(): void {
    this.errorLog = [];
  }
}

function mapErrorCode(error: TetherError): number {
  switch (error.code) {
    case 'NOT_FOUND':
      return ERROR_CODES.INVALID_PARAMS;
    case 'PROTOCOL_ERROR':
      return ERROR_CODES.INVALID_REQUEST;
    case 'HANDLER_CONTRACT':
      return ERROR_CODES.HANDLER_ERROR;
    case 'HOOK_TIMEOUT':
    case 'CONTROL_TIMEOUT':
      return ERROR_CODES.TIMEOUT;
    case 'CANCELLED':
      return ERROR_CODES.CANCELLED;
    case 'CONFIG_ERROR':
      return ERROR_CODES.CONFIG_ERROR;
    default:
      return ERROR_CODES.INTERNAL_ERROR;
  }
}

function getSeverityPrefix(severity: ErrorSeverity): string {
  switch (severity) {
    case ErrorSeverity.LOW:
      return '⚠️ ';
    case ErrorSeverity.MEDIUM:
      return '🔴';
    case ErrorSeverity.HIGH:
      return '💥';
    case ErrorSeverity.CRITICAL:
      return '🚨';
  }
}
