/**
 * メッセージパーサー
 * CLIが送るスネークケースのメッセージを型付きメッセージに変換する
 */
import { isRecord } from '@tether/shared';
import type { JsonObject } from '@tether/shared';
import { MessageParseError } from '../error/index.js';
import { logger } from '../logger/index.js';
import type {
  AssistantMessage,
  AssistantMessageError,
  ContentBlock,
  Message,
  ResultMessage,
  StreamEvent,
  SystemMessage,
  ToolResultBlock,
  UserMessage
} from '../types/index.js';

const log = logger.child('messages');

const ASSISTANT_ERRORS: readonly string[] = [
  'authentication_failed',
  'billing_error',
  'rate_limit',
  'invalid_request',
  'server_error',
  'unknown'
];

function isAssistantError(value: unknown): value is AssistantMessageError {
  return typeof value === 'string' && ASSISTANT_ERRORS.includes(value);
}

function requireField<T>(
  data: JsonObject,
  key: string,
  guard: (value: unknown) => value is T,
  messageType: string
): T {
  const value = data[key];
  if (!guard(value)) {
    throw new MessageParseError(`Missing required field in ${messageType} message: ${key}`, data);
  }
  return value;
}

const isString = (value: unknown): value is string => typeof value === 'string';
const isNumber = (value: unknown): value is number => typeof value === 'number';
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseContentBlock(block: unknown, messageType: string): ContentBlock | null {
  if (!isRecord(block)) {
    throw new MessageParseError(`Invalid content block in ${messageType} message`, block);
  }

  switch (block.type) {
    case 'text':
      return { type: 'text', text: requireField(block, 'text', isString, messageType) };
    case 'thinking':
      return {
        type: 'thinking',
        thinking: requireField(block, 'thinking', isString, messageType),
        signature: optionalString(block.signature) ?? ''
      };
    case 'tool_use':
      return {
        type: 'tool_use',
        id: requireField(block, 'id', isString, messageType),
        name: requireField(block, 'name', isString, messageType),
        input: isRecord(block.input) ? block.input : {}
      };
    case 'tool_result': {
      const result: ToolResultBlock = {
        type: 'tool_result',
        toolUseId: requireField(block, 'tool_use_id', isString, messageType)
      };
      if (typeof block.content === 'string') {
        result.content = block.content;
      } else if (Array.isArray(block.content)) {
        result.content = block.content.filter(isRecord);
      }
      if (typeof block.is_error === 'boolean') result.isError = block.is_error;
      return result;
    }
    default:
      // 未知のブロックは読み飛ばす
      log.debug(`Skipping unknown content block type: ${String(block.type)}`);
      return null;
  }
}

function parseContent(content: unknown, messageType: string): ContentBlock[] {
  if (!Array.isArray(content)) {
    throw new MessageParseError(`Missing required field in ${messageType} message: content`, content);
  }
  const blocks: ContentBlock[] = [];
  for (const block of content) {
    const parsed = parseContentBlock(block, messageType);
    if (parsed) blocks.push(parsed);
  }
  return blocks;
}

function parseUser(data: JsonObject): UserMessage {
  const message = requireField(data, 'message', isRecord, 'user');
  const content = message.content;

  const parsed: UserMessage = {
    type: 'user',
    content: typeof content === 'string' ? content : parseContent(content, 'user')
  };
  const uuid = optionalString(data.uuid);
  if (uuid) parsed.uuid = uuid;
  const parent = optionalString(data.parent_tool_use_id);
  if (parent) parsed.parentToolUseId = parent;
  return parsed;
}

function parseAssistant(data: JsonObject): AssistantMessage {
  const message = requireField(data, 'message', isRecord, 'assistant');

  const parsed: AssistantMessage = {
    type: 'assistant',
    content: parseContent(message.content, 'assistant'),
    model: requireField(message, 'model', isString, 'assistant')
  };
  const parent = optionalString(data.parent_tool_use_id);
  if (parent) parsed.parentToolUseId = parent;
  if (isAssistantError(data.error)) parsed.error = data.error;
  return parsed;
}

function parseSystem(data: JsonObject): SystemMessage {
  return {
    type: 'system',
    subtype: requireField(data, 'subtype', isString, 'system'),
    data
  };
}

function parseResult(data: JsonObject): ResultMessage {
  const parsed: ResultMessage = {
    type: 'result',
    subtype: requireField(data, 'subtype', isString, 'result'),
    durationMs: requireField(data, 'duration_ms', isNumber, 'result'),
    durationApiMs: requireField(data, 'duration_api_ms', isNumber, 'result'),
    isError: requireField(data, 'is_error', isBoolean, 'result'),
    numTurns: requireField(data, 'num_turns', isNumber, 'result'),
    sessionId: requireField(data, 'session_id', isString, 'result')
  };
  if (typeof data.total_cost_usd === 'number') parsed.totalCostUsd = data.total_cost_usd;
  if (isRecord(data.usage)) parsed.usage = data.usage;
  if (typeof data.result === 'string') parsed.result = data.result;
  if (data.structured_output !== undefined) parsed.structuredOutput = data.structured_output;
  return parsed;
}

function parseStreamEvent(data: JsonObject): StreamEvent {
  const parsed: StreamEvent = {
    type: 'stream_event',
    uuid: requireField(data, 'uuid', isString, 'stream_event'),
    sessionId: requireField(data, 'session_id', isString, 'stream_event'),
    event: requireField(data, 'event', isRecord, 'stream_event')
  };
  const parent = optionalString(data.parent_tool_use_id);
  if (parent) parsed.parentToolUseId = parent;
  return parsed;
}

/**
 * 未知のメッセージ種別は null を返す（呼び出し側で読み飛ばす）
 */
export function parseMessage(data: unknown): Message | null {
  if (!isRecord(data)) {
    throw new MessageParseError(`Invalid message data type (expected object, got ${typeof data})`, data);
  }

  switch (data.type) {
    case 'user':
      return parseUser(data);
    case 'assistant':
      return parseAssistant(data);
    case 'system':
      return parseSystem(data);
    case 'result':
      return parseResult(data);
    case 'stream_event':
      return parseStreamEvent(data);
    case undefined:
      throw new MessageParseError("Message missing 'type' field", data);
    default:
      log.debug(`Skipping unknown message type: ${String(data.type)}`);
      return null;
  }
}

/**
 * 生メッセージの列を型付きメッセージの列に変換する
 */
export async function* parseMessages(source: AsyncIterable<JsonObject>): AsyncGenerator<Message> {
  for await (const data of source) {
    const message = parseMessage(data);
    if (message) yield message;
  }
}
