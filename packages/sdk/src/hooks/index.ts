/**
 * フックディスパッチ
 * hook_callback リクエストを型付き入力に変換し、登録済みコールバックを呼び出す
 */
import { z } from 'zod';
import { HOOK_EVENTS, HOOK_OUTPUT_KEY_MAP, isRecord, withTimeout } from '@tether/shared';
import type { HookCallbackRequest, JsonObject } from '@tether/shared';
import { HookTimeoutError, ProtocolError } from '../error/index.js';
import { logger } from '../logger/index.js';

const log = logger.child('hooks');

export type HookEvent = (typeof HOOK_EVENTS)[number];

// 共通フィールドは型が合わなければ未設定として扱う
const BaseHookInputSchema = z.object({
  session_id: z.string().optional().catch(undefined),
  transcript_path: z.string().optional().catch(undefined),
  cwd: z.string().optional().catch(undefined),
  permission_mode: z.string().optional().catch(undefined)
});

const toolFields = {
  tool_name: z.string(),
  tool_input: z.record(z.unknown())
};

const HOOK_INPUT_SCHEMAS = {
  PreToolUse: BaseHookInputSchema.extend({
    hook_event_name: z.literal('PreToolUse'),
    ...toolFields
  }),
  PostToolUse: BaseHookInputSchema.extend({
    hook_event_name: z.literal('PostToolUse'),
    ...toolFields,
    tool_response: z.unknown()
  }),
  PostToolUseFailure: BaseHookInputSchema.extend({
    hook_event_name: z.literal('PostToolUseFailure'),
    ...toolFields,
    tool_use_id: z.string().optional(),
    error: z.string(),
    is_interrupt: z.boolean().optional()
  }),
  UserPromptSubmit: BaseHookInputSchema.extend({
    hook_event_name: z.literal('UserPromptSubmit'),
    prompt: z.string()
  }),
  Stop: BaseHookInputSchema.extend({
    hook_event_name: z.literal('Stop'),
    stop_hook_active: z.boolean()
  }),
  SubagentStop: BaseHookInputSchema.extend({
    hook_event_name: z.literal('SubagentStop'),
    stop_hook_active: z.boolean(),
    agent_id: z.string().optional(),
    agent_transcript_path: z.string().optional(),
    agent_type: z.string().optional()
  }),
  SubagentStart: BaseHookInputSchema.extend({
    hook_event_name: z.literal('SubagentStart'),
    agent_id: z.string(),
    agent_type: z.string()
  }),
  Notification: BaseHookInputSchema.extend({
    hook_event_name: z.literal('Notification'),
    message: z.string(),
    title: z.string().optional(),
    notification_type: z.string().optional()
  }),
  PermissionRequest: BaseHookInputSchema.extend({
    hook_event_name: z.literal('PermissionRequest'),
    ...toolFields,
    permission_suggestions: z.array(z.record(z.unknown())).optional()
  }),
  PreCompact: BaseHookInputSchema.extend({
    hook_event_name: z.literal('PreCompact'),
    // 'manual' | 'auto'。新しい値もそのまま渡す
    trigger: z.string(),
    custom_instructions: z.string().nullable().optional()
  })
} satisfies Record<HookEvent, z.ZodTypeAny>;

export type BaseHookInput = z.infer<typeof BaseHookInputSchema>;

export type HookInputMap = {
  [E in HookEvent]: z.infer<(typeof HOOK_INPUT_SCHEMAS)[E]>;
};

// 未知のイベントは共通フィールドのみ
export type HookInput = HookInputMap[HookEvent] | BaseHookInput;

export interface HookContext {
  signal: AbortSignal;
}

export interface JsonSerializable {
  toJSON(): unknown;
}

/**
 * フックの戻り値。`continue_` などの予約語回避名はCLI名に変換される
 */
export type HookJSONOutput = Record<string, unknown>;

export type HookOutput = HookJSONOutput | JsonSerializable | undefined | void;

export type HookCallback = (
  input: HookInput,
  toolUseId: string | undefined,
  context: HookContext
) => Promise<HookOutput> | HookOutput;

export interface HookMatcher {
  matcher?: string;
  hooks: HookCallback[];
  /** 秒 */
  timeout?: number;
}

export type HookConfig = Partial<Record<HookEvent, HookMatcher[]>>;

export interface HookMatcherPayload {
  matcher?: string;
  hookCallbackIds: string[];
  timeout?: number;
}

export type HooksInitializePayload = Partial<Record<HookEvent, HookMatcherPayload[]>>;

interface HookRegistration {
  event: HookEvent;
  callback: HookCallback;
  timeout?: number;
}

export function isHookEvent(value: unknown): value is HookEvent {
  return typeof value === 'string' && HOOK_EVENTS.some(event => event === value);
}

export function isHookInputOf<E extends HookEvent>(input: HookInput, event: E): input is HookInputMap[E] {
  return 'hook_event_name' in input && input.hook_event_name === event;
}

/**
 * 生の入力マップをイベント別の型付き入力に変換する。
 * 既知のイベントでもフィールドが揃わなければ共通フィールドのみの入力になる
 */
export function parseHookInput(raw: JsonObject): HookInput {
  const event = raw.hook_event_name;

  if (isHookEvent(event)) {
    const result = HOOK_INPUT_SCHEMAS[event].safeParse(raw);
    if (result.success) return result.data;
    log.warn(`Incomplete ${event} hook input, passing base fields only: ${formatIssues(result.error)}`);
  }

  return BaseHookInputSchema.parse(raw);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
}

function hasToJSON(value: unknown): value is JsonSerializable {
  return isRecord(value) && typeof value.toJSON === 'function';
}

/**
 * フック出力をCLIが期待する形式に変換する
 */
export function convertHookOutput(output: unknown): JsonObject {
  if (hasToJSON(output)) {
    const serialized = output.toJSON();
    return isRecord(serialized) ? serialized : {};
  }

  if (!isRecord(output)) return {};

  const converted: JsonObject = {};
  for (const [key, value] of Object.entries(output)) {
    converted[HOOK_OUTPUT_KEY_MAP[key] ?? key] = hasToJSON(value) ? value.toJSON() : value;
  }
  return converted;
}

export class HookDispatcher {
  private readonly registrations = new Map<string, HookRegistration>();
  private readonly payload: HooksInitializePayload = {};
  private nextCallbackId = 0;

  constructor(hooks: HookConfig = {}) {
    for (const event of HOOK_EVENTS) {
      const matchers = hooks[event];
      if (!matchers || matchers.length === 0) continue;

      this.payload[event] = matchers.map(matcher => this.registerMatcher(event, matcher));
    }
  }

  private registerMatcher(event: HookEvent, matcher: HookMatcher): HookMatcherPayload {
    const hookCallbackIds = matcher.hooks.map(callback => {
      const id = `hook_${this.nextCallbackId++}`;
      this.registrations.set(id, { event, callback, timeout: matcher.timeout });
      return id;
    });

    const entry: HookMatcherPayload = { matcher: matcher.matcher, hookCallbackIds };
    if (matcher.timeout !== undefined) entry.timeout = matcher.timeout;
    return entry;
  }

  get size(): number {
    return this.registrations.size;
  }

  /**
   * initialize リクエストに載せるフック設定。登録がなければ undefined
   */
  initializePayload(): HooksInitializePayload | undefined {
    return this.registrations.size > 0 ? this.payload : undefined;
  }

  async dispatch(request: HookCallbackRequest, signal: AbortSignal): Promise<JsonObject> {
    const registration = this.registrations.get(request.callback_id);
    if (!registration) {
      throw new ProtocolError(`No hook callback found for ID: ${request.callback_id}`);
    }

    const input = parseHookInput(request.input);
    const invocation = Promise.resolve().then(() =>
      registration.callback(input, request.tool_use_id ?? undefined, { signal })
    );

    const timeout = registration.timeout;
    const output = timeout === undefined
      ? await invocation
      : await withTimeout(invocation, timeout * 1000, () => new HookTimeoutError(request.callback_id, timeout));

    return convertHookOutput(output);
  }
}

/**
 * PreToolUse の判定結果（hook_specific_output に入れて返す）
 */
export class PreToolUseDecision implements JsonSerializable {
  constructor(
    readonly permissionDecision: 'allow' | 'deny' | 'ask',
    readonly permissionDecisionReason?: string,
    readonly updatedInput?: JsonObject
  ) {}

  toJSON(): JsonObject {
    const json: JsonObject = {
      hookEventName: 'PreToolUse',
      permissionDecision: this.permissionDecision
    };
    if (this.permissionDecisionReason !== undefined) json.permissionDecisionReason = this.permissionDecisionReason;
    if (this.updatedInput !== undefined) json.updatedInput = this.updatedInput;
    return json;
  }
}

/**
 * 追加コンテキストを返すフック出力（PostToolUse / UserPromptSubmit など）
 */
export class AdditionalContext implements JsonSerializable {
  constructor(
    readonly hookEventName: HookEvent,
    readonly additionalContext: string
  ) {}

  toJSON(): JsonObject {
    return { hookEventName: this.hookEventName, additionalContext: this.additionalContext };
  }
}
