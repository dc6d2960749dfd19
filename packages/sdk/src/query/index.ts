/**
 * コントロールプロトコル多重化
 * 1本の改行区切りJSONチャネル上で、データメッセージ・送信リクエスト・受信リクエストを振り分ける
 */
import { z } from 'zod';
import {
  ControlCancelMessageSchema,
  ControlResponseMessageSchema,
  DEFAULT_INITIALIZE_TIMEOUT,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_SUBTYPE_TIMEOUTS,
  ERROR_CODES,
  InboundControlRequestSchema,
  TetherError,
  isRecord,
  randomHex,
  toError
} from '@tether/shared';
import type {
  CanUseToolRequest,
  ControlErrorBody,
  ControlRequestPayload,
  ControlSuccessBody,
  JsonObject,
  McpMessageRequest,
  PermissionMode
} from '@tether/shared';
import {
  CLIConnectionError,
  CancelledError,
  ControlRequestError,
  ControlTimeoutError,
  ErrorHandler,
  ProtocolError
} from '../error/index.js';
import { HookDispatcher } from '../hooks/index.js';
import type { HookConfig } from '../hooks/index.js';
import { logger as rootLogger } from '../logger/index.js';
import type { Logger } from '../logger/index.js';
import { requestIdOf } from '../mcp/index.js';
import type { SdkMcpServer } from '../mcp/index.js';
import { MessageQueue } from '../queue/index.js';
import type { Transport } from '../transport/index.js';
import type { CanUseTool } from '../types/index.js';

export interface ProtocolTimeouts {
  /** ミリ秒 */
  requestTimeout: number;
  initializeTimeout: number;
  subtypeTimeouts: Record<string, number>;
  /** ストリーミング入力を閉じる前に最初の結果を待つ上限 */
  streamCloseTimeout: number;
}

export interface QueryOptions {
  transport: Transport;
  isStreamingMode: boolean;
  canUseTool?: CanUseTool;
  hooks?: HookConfig;
  sdkMcpServers?: Map<string, SdkMcpServer>;
  timeouts?: Partial<ProtocolTimeouts>;
  logger?: Logger;
}

export interface SendOptions {
  timeoutMs?: number;
}

interface PendingRequest {
  subtype: string;
  resolve: (response: JsonObject) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

interface InFlightHandler {
  controller: AbortController;
  task: Promise<void>;
}

const PermissionUpdateSchema = z.object({ type: z.string() }).passthrough();

const PermissionResultSchema = z.discriminatedUnion('behavior', [
  z.object({
    behavior: z.literal('allow'),
    updatedInput: z.record(z.unknown()).optional(),
    updatedPermissions: z.array(PermissionUpdateSchema).optional()
  }),
  z.object({
    behavior: z.literal('deny'),
    message: z.string(),
    interrupt: z.boolean().optional()
  })
]);

const INBOUND_SUBTYPES = ['can_use_tool', 'hook_callback', 'mcp_message'];

/**
 * スキーマに合わない応答からも、読めればリクエストIDを取り出す
 */
function responseIdOf(message: JsonObject): string | undefined {
  const body = message.response;
  if (!isRecord(body)) return undefined;
  const id = body.request_id ?? body.requestId;
  return typeof id === 'string' ? id : undefined;
}

/**
 * 中断シグナルとの競争。中断時は CancelledError で失敗する
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(new CancelledError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });

    void work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class Query {
  private readonly transport: Transport;
  private readonly isStreamingMode: boolean;
  private readonly canUseTool?: CanUseTool;
  private readonly hookDispatcher: HookDispatcher;
  private readonly sdkMcpServers: Map<string, SdkMcpServer>;
  private readonly timeouts: ProtocolTimeouts;
  private readonly log: Logger;
  private readonly errorHandler = new ErrorHandler();

  private readonly pendingRequests = new Map<string, PendingRequest>();
  private readonly inFlight = new Map<string, InFlightHandler>();
  private readonly queue = new MessageQueue<JsonObject>();

  private requestCounter = 0;
  private writeChain: Promise<void> = Promise.resolve();
  private readLoop?: Promise<void>;
  private closed = false;
  /** 読み取りループ終了後は新しい送信リクエストをこのエラーで即座に失敗させる */
  private terminalError?: Error;
  private initializationResult: JsonObject | null = null;
  private resolveFirstResult?: () => void;
  private readonly firstResult: Promise<void>;

  constructor(options: QueryOptions) {
    this.transport = options.transport;
    this.isStreamingMode = options.isStreamingMode;
    this.canUseTool = options.canUseTool;
    this.hookDispatcher = new HookDispatcher(options.hooks);
    this.sdkMcpServers = options.sdkMcpServers ?? new Map();
    this.timeouts = {
      requestTimeout: options.timeouts?.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT,
      initializeTimeout: options.timeouts?.initializeTimeout ?? DEFAULT_INITIALIZE_TIMEOUT,
      subtypeTimeouts: { ...DEFAULT_SUBTYPE_TIMEOUTS, ...options.timeouts?.subtypeTimeouts },
      streamCloseTimeout: options.timeouts?.streamCloseTimeout ?? DEFAULT_REQUEST_TIMEOUT
    };
    this.log = (options.logger ?? rootLogger).child('query');
    this.firstResult = new Promise(resolve => {
      this.resolveFirstResult = resolve;
    });
  }

  /**
   * 読み取りループを開始する（多重呼び出しは無視）
   */
  start(): void {
    if (this.readLoop) return;
    this.readLoop = this.readMessages();
  }

  /**
   * フック設定とインプロセスサーバー名を送り、ピアの能力を受け取る
   */
  async initialize(): Promise<JsonObject | null> {
    if (!this.isStreamingMode) return null;

    const request: ControlRequestPayload = { subtype: 'initialize' };
    const hooks = this.hookDispatcher.initializePayload();
    if (hooks) request.hooks = hooks;
    if (this.sdkMcpServers.size > 0) request.sdkMcpServers = Array.from(this.sdkMcpServers.keys());

    const response = await this.sendControlRequest(request, { timeoutMs: this.timeouts.initializeTimeout });
    this.initializationResult = response;
    this.log.debug('Control protocol initialized');
    return response;
  }

  getInitializationResult(): JsonObject | null {
    return this.initializationResult;
  }

  async sendControlRequest(payload: ControlRequestPayload, options: SendOptions = {}): Promise<JsonObject> {
    if (!this.isStreamingMode) {
      throw new TetherError('Control requests require streaming mode', 'NOT_STREAMING');
    }
    if (this.closed) {
      throw new CLIConnectionError('Query is closed');
    }
    if (this.terminalError) {
      throw this.terminalError;
    }

    const { subtype } = payload;
    const requestId = `req_${++this.requestCounter}_${randomHex(4)}`;
    const timeoutMs = options.timeoutMs ?? this.timeoutFor(subtype);

    const response = new Promise<JsonObject>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRequests.delete(requestId);
        reject(new ControlTimeoutError(subtype, timeoutMs));
      }, timeoutMs);
      this.pendingRequests.set(requestId, { subtype, resolve, reject, timer });
    });

    try {
      await this.writeMessage({ type: 'control_request', request_id: requestId, request: payload });
    } catch (error) {
      this.dropPending(requestId);
      throw error;
    }

    return response;
  }

  private timeoutFor(subtype: string): number {
    return this.timeouts.subtypeTimeouts[subtype] ?? this.timeouts.requestTimeout;
  }

  private dropPending(requestId: string): PendingRequest | undefined {
    const pending = this.pendingRequests.get(requestId);
    if (pending) {
      clearTimeout(pending.timer);
      this.pendingRequests.delete(requestId);
    }
    return pending;
  }

  // 送信リクエスト
  async interrupt(): Promise<void> {
    await this.sendControlRequest({ subtype: 'interrupt' });
  }

  async setPermissionMode(mode: PermissionMode): Promise<void> {
    await this.sendControlRequest({ subtype: 'set_permission_mode', mode });
  }

  async setModel(model?: string): Promise<void> {
    await this.sendControlRequest({ subtype: 'set_model', model: model ?? null });
  }

  async getMcpStatus(): Promise<JsonObject> {
    return this.sendControlRequest({ subtype: 'mcp_status' });
  }

  async rewindFiles(userMessageUuid: string): Promise<void> {
    await this.sendControlRequest({ subtype: 'rewind_files', userMessageUuid });
  }

  /**
   * 入力メッセージを書き込み、送信方向を閉じる。
   * フックやインプロセスサーバーがある場合は最初の結果を待ってから閉じる
   */
  async streamInput(stream: AsyncIterable<JsonObject> | Iterable<JsonObject>): Promise<void> {
    try {
      for await (const message of stream) {
        if (this.closed) break;
        await this.writeMessage(message);
      }

      if (this.hookDispatcher.size > 0 || this.sdkMcpServers.size > 0) {
        await this.waitForFirstResult();
      }
      if (!this.closed) await this.transport.endInput();
    } catch (error) {
      this.log.warn(`Error streaming input: ${toError(error).message}`);
    }
  }

  private async waitForFirstResult(): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>(resolve => {
      timer = setTimeout(resolve, this.timeouts.streamCloseTimeout);
    });
    await Promise.race([this.firstResult, timeout]);
    clearTimeout(timer);
  }

  /**
   * データメッセージの非同期イテレーター。終端で必ず終了する
   */
  receiveMessages(): AsyncIterable<JsonObject> {
    return this.queue;
  }

  get pendingCount(): number {
    return this.pendingRequests.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const handler of this.inFlight.values()) {
      handler.controller.abort();
    }
    this.rejectPending(new CLIConnectionError('Query closed'));
    this.queue.end();
    this.resolveFirstResult?.();

    await this.transport.close();
  }

  // 読み取りループ
  private async readMessages(): Promise<void> {
    let failure: Error | undefined;

    try {
      for await (const message of this.transport.readMessages()) {
        if (this.closed) break;
        this.route(message);
      }
    } catch (error) {
      failure = toError(error);
      if (!this.closed) this.log.error(`Reading loop terminated: ${failure.message}`);
    }

    this.terminalError = failure ?? new CLIConnectionError('Stream ended before a control response was received');
    this.rejectPending(this.terminalError);
    if (failure) this.queue.fail(failure);
    this.queue.end();
    this.resolveFirstResult?.();
  }

  private rejectPending(error: Error): void {
    for (const [requestId, pending] of this.pendingRequests) {
      clearTimeout(pending.timer);
      this.pendingRequests.delete(requestId);
      pending.reject(error);
    }
  }

  private route(message: JsonObject): void {
    switch (message.type) {
      case 'control_response':
        this.handleControlResponse(message);
        return;
      case 'control_request':
        this.spawnHandler(message);
        return;
      case 'control_cancel_request':
        this.handleCancel(message);
        return;
      default:
        if (message.type === 'result') this.resolveFirstResult?.();
        this.queue.enqueue(message);
    }
  }

  private handleControlResponse(message: JsonObject): void {
    const parsed = ControlResponseMessageSchema.safeParse(message);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
      const requestId = responseIdOf(message);
      const pending = requestId === undefined ? undefined : this.dropPending(requestId);
      if (pending) {
        pending.reject(new ProtocolError(`Malformed control response for ${pending.subtype}: ${issues}`, message));
      } else {
        this.log.warn(`Ignoring malformed control response: ${issues}`);
      }
      return;
    }

    const body = parsed.data.response;
    const requestId = body.request_id ?? body.requestId;
    const pending = requestId === undefined ? undefined : this.dropPending(requestId);
    if (!pending) {
      // タイムアウト・キャンセル後の遅延応答
      this.log.debug(`Ignoring control response for unknown request ${requestId ?? '(none)'}`);
      return;
    }

    if (body.subtype === 'error') {
      pending.reject(new ControlRequestError(body.error ?? 'Unknown error', pending.subtype));
    } else {
      pending.resolve(body.response ?? {});
    }
  }

  private handleCancel(message: JsonObject): void {
    const parsed = ControlCancelMessageSchema.safeParse(message);
    const requestId = parsed.success ? parsed.data.request_id ?? parsed.data.requestId : undefined;
    if (requestId === undefined) return;

    this.inFlight.get(requestId)?.controller.abort();
  }

  private spawnHandler(message: JsonObject): void {
    const rawId = message.request_id;
    if (typeof rawId !== 'string' && typeof rawId !== 'number') {
      this.log.warn('Ignoring control request without request_id');
      return;
    }
    const requestId = String(rawId);
    if (this.inFlight.has(requestId)) {
      this.log.warn(`Ignoring duplicate control request ${requestId}`);
      return;
    }

    const controller = new AbortController();
    const task = this.handleControlRequest(requestId, message.request, controller.signal)
      .finally(() => this.inFlight.delete(requestId));
    this.inFlight.set(requestId, { controller, task });
  }

  /**
   * 受信リクエストを処理し、必ず1つのコントロールレスポンスを返す
   */
  private async handleControlRequest(requestId: string, request: unknown, signal: AbortSignal): Promise<void> {
    let body: ControlSuccessBody | ControlErrorBody;

    try {
      const response = await raceAbort(this.dispatch(request, signal), signal);
      body = { subtype: 'success', request_id: requestId, requestId, response };
    } catch (error) {
      const message = signal.aborted
        ? 'Cancelled'
        : this.errorHandler.describe(error, {
          source: 'query',
          method: isRecord(request) && typeof request.subtype === 'string' ? request.subtype : undefined,
          requestId
        });
      body = { subtype: 'error', request_id: requestId, requestId, error: message };
    }

    try {
      await this.writeMessage({ type: 'control_response', response: body });
    } catch (error) {
      this.log.warn(`Failed to send control response for ${requestId}: ${toError(error).message}`);
    }
  }

  private async dispatch(request: unknown, signal: AbortSignal): Promise<JsonObject> {
    const parsed = InboundControlRequestSchema.safeParse(request);
    if (!parsed.success) {
      const subtype = isRecord(request) ? request.subtype : undefined;
      if (typeof subtype !== 'string' || !INBOUND_SUBTYPES.includes(subtype)) {
        throw new ProtocolError(`Unsupported control request subtype: ${String(subtype)}`);
      }
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
      throw new ProtocolError(`Malformed ${subtype} request: ${issues}`);
    }

    const inbound = parsed.data;
    switch (inbound.subtype) {
      case 'can_use_tool':
        return this.handlePermissionRequest(inbound, signal);
      case 'hook_callback':
        return this.hookDispatcher.dispatch(inbound, signal);
      case 'mcp_message':
        return this.handleMcpMessage(inbound, signal);
    }
  }

  private async handlePermissionRequest(request: CanUseToolRequest, signal: AbortSignal): Promise<JsonObject> {
    if (!this.canUseTool) {
      throw new ProtocolError('canUseTool callback is not provided');
    }

    const result = PermissionResultSchema.safeParse(
      await this.canUseTool(request.tool_name, request.input, {
        signal,
        suggestions: request.permission_suggestions ?? [],
        blockedPath: request.blocked_path ?? undefined
      })
    );
    if (!result.success) {
      throw new ProtocolError('Tool permission callback must return a PermissionResult');
    }

    const decision = result.data;
    if (decision.behavior === 'allow') {
      const response: JsonObject = {
        behavior: 'allow',
        updatedInput: decision.updatedInput ?? request.input
      };
      if (decision.updatedPermissions) response.updatedPermissions = decision.updatedPermissions;
      return response;
    }

    const response: JsonObject = { behavior: 'deny', message: decision.message };
    if (decision.interrupt) response.interrupt = decision.interrupt;
    return response;
  }

  private async handleMcpMessage(request: McpMessageRequest, signal: AbortSignal): Promise<JsonObject> {
    const server = this.sdkMcpServers.get(request.server_name);
    if (!server) {
      return {
        mcp_response: {
          jsonrpc: '2.0',
          id: requestIdOf(request.message),
          error: {
            code: ERROR_CODES.METHOD_NOT_FOUND,
            message: `Server '${request.server_name}' not found`
          }
        }
      };
    }

    return { mcp_response: await server.handleMessage(request.message, { signal }) };
  }

  /**
   * 書き込みを直列化する。失敗は呼び出し元に返し、チェーンは継続する
   */
  private writeMessage(message: object): Promise<void> {
    const line = `${JSON.stringify(message)}\n`;
    const write = this.writeChain.then(() => this.transport.write(line));
    this.writeChain = write.catch(() => undefined);
    return write;
  }
}
