/**
 * インプロセスMCPサーバー
 * ツール・リソース・プロンプトのレジストリとJSON-RPCディスパッチ
 */
import {
  CallToolResultSchema,
  ERROR_CODES,
  GetPromptResultSchema,
  MCPRequestSchema,
  MCP_PROTOCOL_VERSION,
  ReadResourceResultSchema,
  isRecord
} from '@tether/shared';
import type {
  CallToolResult,
  GetPromptResult,
  JsonObject,
  MCPRequestId,
  MCPResponse,
  ReadResourceResult
} from '@tether/shared';
import { ErrorHandler, HandlerContractError, NotFoundError, ProtocolError } from '../error/index.js';

export type SimpleSchemaType = 'string' | 'integer' | 'number' | 'float' | 'boolean';

// JSONスキーマ、または「引数名 → 型名」の簡易マップ
export type ToolInputSchema = JsonObject | Record<string, SimpleSchemaType>;

export interface ToolAnnotations {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

export interface HandlerExtra {
  signal: AbortSignal;
}

export type ToolHandler = (args: JsonObject, extra: HandlerExtra) => Promise<unknown> | unknown;
export type ResourceReader = (extra: HandlerExtra) => Promise<unknown> | unknown;
export type PromptGenerator = (args: JsonObject, extra: HandlerExtra) => Promise<unknown> | unknown;

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  handler: ToolHandler;
  annotations?: ToolAnnotations;
}

export interface ResourceDefinition {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
  reader: ResourceReader;
}

export interface PromptArgument {
  name: string;
  description?: string;
  required?: boolean;
}

export interface PromptDefinition {
  name: string;
  description?: string;
  arguments?: PromptArgument[];
  generator: PromptGenerator;
}

export interface ToolListing {
  name: string;
  description: string;
  inputSchema: JsonObject;
  annotations?: ToolAnnotations;
}

export interface ResourceListing {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export interface PromptListing {
  name: string;
  description?: string;
  arguments?: PromptArgument[];
}

export interface SdkMcpServerOptions {
  name: string;
  version?: string;
  tools?: ToolDefinition[];
  resources?: ResourceDefinition[];
  prompts?: PromptDefinition[];
}

const noSignal = (): HandlerExtra => ({ signal: new AbortController().signal });

export class SdkMcpServer {
  readonly name: string;
  readonly version: string;
  private readonly tools = new Map<string, ToolDefinition>();
  private readonly resources = new Map<string, ResourceDefinition>();
  private readonly prompts = new Map<string, PromptDefinition>();
  private readonly errorHandler = new ErrorHandler();

  constructor(options: SdkMcpServerOptions) {
    this.name = options.name;
    this.version = options.version ?? '1.0.0';

    for (const tool of options.tools ?? []) this.tools.set(tool.name, tool);
    for (const resource of options.resources ?? []) this.resources.set(resource.uri, resource);
    for (const prompt of options.prompts ?? []) this.prompts.set(prompt.name, prompt);
  }

  listTools(): ToolListing[] {
    return Array.from(this.tools.values()).map(tool => {
      const listing: ToolListing = {
        name: tool.name,
        description: tool.description,
        inputSchema: expandInputSchema(tool.inputSchema)
      };
      if (tool.annotations) listing.annotations = tool.annotations;
      return listing;
    });
  }

  async callTool(name: string, args: JsonObject, extra: HandlerExtra = noSignal()): Promise<CallToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new NotFoundError('Tool', name);
    }

    const parsed = CallToolResultSchema.safeParse(await tool.handler(args, extra));
    if (!parsed.success) {
      throw new HandlerContractError(`Tool '${name}' must return an object with a content array`);
    }

    const result = parsed.data;
    // is_error のみの場合は isError を併記する
    if (result.is_error !== undefined && result.isError === undefined) {
      return { ...result, isError: result.is_error };
    }
    return result;
  }

  listResources(): ResourceListing[] {
    return Array.from(this.resources.values()).map(resource => {
      const listing: ResourceListing = { uri: resource.uri, name: resource.name };
      if (resource.description !== undefined) listing.description = resource.description;
      if (resource.mimeType !== undefined) listing.mimeType = resource.mimeType;
      return listing;
    });
  }

  async readResource(uri: string, extra: HandlerExtra = noSignal()): Promise<ReadResourceResult> {
    const resource = this.resources.get(uri);
    if (!resource) {
      throw new NotFoundError('Resource', uri);
    }

    const parsed = ReadResourceResultSchema.safeParse(await resource.reader(extra));
    if (!parsed.success) {
      throw new HandlerContractError(`Resource '${uri}' must return an object with a contents array`);
    }
    return parsed.data;
  }

  listPrompts(): PromptListing[] {
    return Array.from(this.prompts.values()).map(prompt => {
      const listing: PromptListing = { name: prompt.name };
      if (prompt.description !== undefined) listing.description = prompt.description;
      if (prompt.arguments !== undefined) listing.arguments = prompt.arguments;
      return listing;
    });
  }

  async getPrompt(name: string, args: JsonObject = {}, extra: HandlerExtra = noSignal()): Promise<GetPromptResult> {
    const prompt = this.prompts.get(name);
    if (!prompt) {
      throw new NotFoundError('Prompt', name);
    }

    const parsed = GetPromptResultSchema.safeParse(await prompt.generator(args, extra));
    if (!parsed.success) {
      throw new HandlerContractError(`Prompt '${name}' must return an object with a messages array`);
    }
    return parsed.data;
  }

  capabilities(): JsonObject {
    const capabilities: JsonObject = {};
    if (this.tools.size > 0) capabilities.tools = {};
    if (this.resources.size > 0) capabilities.resources = {};
    if (this.prompts.size > 0) capabilities.prompts = {};
    return capabilities;
  }

  /**
   * JSON-RPCメッセージを処理する。ハンドラーの例外はエラーオブジェクトとして返す
   */
  async handleMessage(message: JsonObject, extra: HandlerExtra = noSignal()): Promise<MCPResponse> {
    const id = requestIdOf(message);
    const parsed = MCPRequestSchema.safeParse(message);
    if (!parsed.success) {
      return this.errorHandler.handleError(new ProtocolError('Invalid JSON-RPC request'), {
        source: `mcp:${this.name}`,
        requestId: id
      });
    }

    const { method } = parsed.data;
    const params = parsed.data.params ?? {};

    try {
      switch (method) {
        case 'initialize':
          return this.respond(id, {
            protocolVersion: MCP_PROTOCOL_VERSION,
            capabilities: this.capabilities(),
            serverInfo: { name: this.name, version: this.version }
          });

        case 'notifications/initialized':
          return { jsonrpc: '2.0', result: {} };

        case 'tools/list':
          return this.respond(id, { tools: this.listTools() });

        case 'tools/call': {
          const name = requireString(params, 'name', method);
          const args = isRecord(params.arguments) ? params.arguments : {};
          return this.respond(id, await this.callTool(name, args, extra));
        }

        case 'resources/list':
          return this.respond(id, { resources: this.listResources() });

        case 'resources/read':
          return this.respond(id, await this.readResource(requireString(params, 'uri', method), extra));

        case 'prompts/list':
          return this.respond(id, { prompts: this.listPrompts() });

        case 'prompts/get': {
          const name = requireString(params, 'name', method);
          const args = isRecord(params.arguments) ? params.arguments : {};
          return this.respond(id, await this.getPrompt(name, args, extra));
        }

        default:
          return {
            jsonrpc: '2.0',
            id,
            error: { code: ERROR_CODES.METHOD_NOT_FOUND, message: `Method '${method}' not found` }
          };
      }
    } catch (error) {
      return this.errorHandler.handleError(error, { source: `mcp:${this.name}`, method, requestId: id });
    }
  }

  private respond(id: MCPRequestId | null, result: JsonObject): MCPResponse {
    return { jsonrpc: '2.0', id, result };
  }

  // Public API
  getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }
}

export function requestIdOf(message: JsonObject): MCPRequestId | null {
  const id = message.id;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

function requireString(params: JsonObject, key: string, method: string): string {
  const value = params[key];
  if (typeof value !== 'string') {
    throw new ProtocolError(`Missing ${key} parameter for ${method}`);
  }
  return value;
}

const SIMPLE_TYPES: Record<SimpleSchemaType, string> = {
  string: 'string',
  integer: 'integer',
  number: 'number',
  float: 'number',
  boolean: 'boolean'
};

function isSimpleSchemaType(value: unknown): value is SimpleSchemaType {
  return typeof value === 'string' && Object.hasOwn(SIMPLE_TYPES, value);
}

/**
 * 簡易マップを object スキーマに展開する（全キー必須）
 */
export function expandInputSchema(schema: ToolInputSchema): JsonObject {
  if ('type' in schema && 'properties' in schema) {
    return schema;
  }

  const properties: JsonObject = {};
  for (const [name, type] of Object.entries(schema)) {
    properties[name] = { type: isSimpleSchemaType(type) ? SIMPLE_TYPES[type] : 'string' };
  }

  return {
    type: 'object',
    properties,
    required: Object.keys(properties)
  };
}

/**
 * ツール定義を作成する
 */
export function tool(
  name: string,
  description: string,
  inputSchema: ToolInputSchema,
  handler: ToolHandler,
  annotations?: ToolAnnotations
): ToolDefinition {
  return { name, description, inputSchema, handler, annotations };
}

export function createResource(options: ResourceDefinition): ResourceDefinition {
  return options;
}

export function createPrompt(options: PromptDefinition): PromptDefinition {
  return options;
}

export interface McpSdkServerConfig {
  type: 'sdk';
  name: string;
  instance: SdkMcpServer;
}

export function createSdkMcpServer(options: SdkMcpServerOptions): McpSdkServerConfig {
  return {
    type: 'sdk',
    name: options.name,
    instance: new SdkMcpServer(options)
  };
}
