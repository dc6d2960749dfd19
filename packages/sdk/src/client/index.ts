/**
 * エージェントクライアント
 * トランスポート・コントロールプロトコル・メッセージパーサーを束ねた公開API
 */
import { TetherError } from '@tether/shared';
import type { JsonObject, PermissionMode, TetherConfig } from '@tether/shared';
import { ConfigManager } from '../config/index.js';
import { logger } from '../logger/index.js';
import type { SdkMcpServer } from '../mcp/index.js';
import { parseMessage } from '../messages/index.js';
import { Query } from '../query/index.js';
import { SubprocessCLITransport } from '../transport/index.js';
import type { Transport } from '../transport/index.js';
import type { AgentOptions, Message } from '../types/index.js';

const log = logger.child('client');

export type PromptInput = string | AsyncIterable<JsonObject> | Iterable<JsonObject>;

export interface ClientDependencies {
  /** 指定がなければサブプロセスを起動する */
  transport?: Transport;
  configManager?: ConfigManager;
}

/**
 * ユーザーメッセージを作る
 */
export function userMessage(content: string | JsonObject[], sessionId = 'default'): JsonObject {
  return {
    type: 'user',
    message: { role: 'user', content },
    parent_tool_use_id: null,
    session_id: sessionId
  };
}

/**
 * 配列をストリーミング入力に変換する
 */
export async function* fromArray(messages: JsonObject[]): AsyncGenerator<JsonObject> {
  for (const message of messages) {
    yield message;
  }
}

/**
 * 設定ファイルの defaults を下敷きにしてオプションを確定する
 */
export function resolveOptions(options: AgentOptions, config: TetherConfig, streaming: boolean): AgentOptions {
  const { defaults } = config;
  const resolved: AgentOptions = {
    model: defaults.model,
    permissionMode: defaults.permissionMode,
    maxTurns: defaults.maxTurns,
    cwd: defaults.cwd,
    cliPath: config.cli.path,
    maxBufferSize: config.cli.maxBufferSize,
    ...options
  };

  if (resolved.canUseTool) {
    if (!streaming) {
      throw new TetherError(
        'canUseTool callback requires streaming mode. Please provide prompt as an AsyncIterable instead of a string.',
        'CONFIG_ERROR'
      );
    }
    if (resolved.permissionPromptToolName) {
      throw new TetherError(
        'canUseTool callback cannot be used with permissionPromptToolName. Please use one or the other.',
        'CONFIG_ERROR'
      );
    }
    resolved.permissionPromptToolName = 'stdio';
  }

  return resolved;
}

/**
 * mcpServers のうちインプロセスサーバーだけを取り出す
 */
export function extractSdkServers(options: AgentOptions): Map<string, SdkMcpServer> {
  const servers = new Map<string, SdkMcpServer>();
  for (const [name, config] of Object.entries(options.mcpServers ?? {})) {
    if (config.type === 'sdk') servers.set(name, config.instance);
  }
  return servers;
}

function createQuery(
  options: AgentOptions,
  config: TetherConfig,
  transport: Transport,
  isStreamingMode: boolean
): Query {
  return new Query({
    transport,
    isStreamingMode,
    canUseTool: options.canUseTool,
    hooks: options.hooks,
    sdkMcpServers: extractSdkServers(options),
    timeouts: config.protocol
  });
}

export class AgentClient {
  private readonly configManager: ConfigManager;
  private readonly customTransport?: Transport;
  private transport?: Transport;
  private session?: Query;
  private messages?: AsyncIterator<JsonObject, undefined>;

  constructor(
    private readonly options: AgentOptions = {},
    dependencies: ClientDependencies = {}
  ) {
    this.configManager = dependencies.configManager ?? new ConfigManager();
    this.customTransport = dependencies.transport;
  }

  get isConnected(): boolean {
    return this.session !== undefined;
  }

  /**
   * CLIと接続し、コントロールプロトコルを初期化する。
   * prompt を渡した場合はその内容を送信する
   */
  async connect(prompt?: PromptInput): Promise<void> {
    if (this.session) return;

    const config = this.configManager.getConfig();
    const options = resolveOptions(this.options, config, true);
    const transport = this.customTransport ?? new SubprocessCLITransport(null, options, {
      cliPath: config.cli.path,
      entrypoint: config.cli.entrypoint,
      maxBufferSize: config.cli.maxBufferSize
    });

    await transport.connect();
    const session = createQuery(options, config, transport, true);
    session.start();

    try {
      await session.initialize();
    } catch (error) {
      await session.close();
      throw error;
    }

    this.transport = transport;
    this.session = session;
    this.messages = session.receiveMessages()[Symbol.asyncIterator]();
    log.debug('Connected');

    if (typeof prompt === 'string') {
      await this.query(prompt);
    } else if (prompt) {
      // 入力ストリームのエラーは streamInput 内で記録される
      void session.streamInput(prompt);
    }
  }

  private requireSession(): Query {
    if (!this.session) {
      throw new TetherError('Not connected. Call connect() first.', 'CONNECTION_ERROR');
    }
    return this.session;
  }

  /**
   * 会話に新しい入力を送る
   */
  async query(prompt: string | AsyncIterable<JsonObject> | Iterable<JsonObject>, sessionId = 'default'): Promise<void> {
    this.requireSession();
    const transport = this.transport;
    if (!transport) {
      throw new TetherError('Not connected. Call connect() first.', 'CONNECTION_ERROR');
    }

    if (typeof prompt === 'string') {
      await transport.write(`${JSON.stringify(userMessage(prompt, sessionId))}\n`);
      return;
    }

    for await (const message of prompt) {
      const withSession = 'session_id' in message ? message : { ...message, session_id: sessionId };
      await transport.write(`${JSON.stringify(withSession)}\n`);
    }
  }

  /**
   * 型付きメッセージを受信する。途中で抜けても後続の呼び出しで続きから読める
   */
  async *receiveMessages(): AsyncGenerator<Message> {
    this.requireSession();
    const messages = this.messages;
    if (!messages) return;

    while (true) {
      const next = await messages.next();
      if (next.done) return;

      const message = parseMessage(next.value);
      if (message) yield message;
    }
  }

  /**
   * result メッセージまで（それを含む）受信する
   */
  async *receiveResponse(): AsyncGenerator<Message> {
    for await (const message of this.receiveMessages()) {
      yield message;
      if (message.type === 'result') return;
    }
  }

  async interrupt(): Promise<void> {
    await this.requireSession().interrupt();
  }

  async setPermissionMode(mode: PermissionMode): Promise<void> {
    await this.requireSession().setPermissionMode(mode);
  }

  async setModel(model?: string): Promise<void> {
    await this.requireSession().setModel(model);
  }

  async rewindFiles(userMessageUuid: string): Promise<void> {
    await this.requireSession().rewindFiles(userMessageUuid);
  }

  async getMcpStatus(): Promise<JsonObject> {
    return this.requireSession().getMcpStatus();
  }

  getServerInfo(): JsonObject | null {
    return this.session?.getInitializationResult() ?? null;
  }

  async disconnect(): Promise<void> {
    const session = this.session;
    this.session = undefined;
    this.transport = undefined;
    this.messages = undefined;
    if (session) {
      await session.close();
      log.debug('Disconnected');
    }
  }
}

export interface QueryParams {
  prompt: PromptInput;
  options?: AgentOptions;
  transport?: Transport;
  configManager?: ConfigManager;
}

/**
 * 単発の問い合わせ。文字列なら --print モード、イテラブルならストリーミング入力
 */
export async function* query(params: QueryParams): AsyncGenerator<Message> {
  const { prompt } = params;
  const streaming = typeof prompt !== 'string';
  const config = (params.configManager ?? new ConfigManager()).getConfig();
  const options = resolveOptions(params.options ?? {}, config, streaming);

  const transport = params.transport ?? new SubprocessCLITransport(typeof prompt === 'string' ? prompt : null, options, {
    cliPath: config.cli.path,
    entrypoint: config.cli.entrypoint,
    maxBufferSize: config.cli.maxBufferSize
  });

  await transport.connect();
  const session = createQuery(options, config, transport, streaming);
  session.start();

  try {
    if (typeof prompt !== 'string') {
      await session.initialize();
      void session.streamInput(prompt);
    }

    for await (const data of session.receiveMessages()) {
      const message = parseMessage(data);
      if (message) yield message;
    }
  } finally {
    await session.close();
  }
}
