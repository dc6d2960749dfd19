/**
 * フックディスパッチ テストスイート
 */
import { describe, it, expect, vi } from 'vitest';
import {
  AdditionalContext,
  HookDispatcher,
  PreToolUseDecision,
  convertHookOutput,
  isHookInputOf,
  parseHookInput
} from '../src/hooks/index.js';
import type { HookCallback, HookOutput } from '../src/hooks/index.js';
import { HookTimeoutError } from '../src/error/index.js';

const signal = new AbortController().signal;

describe('parseHookInput', () => {
  it('イベント別の型付き入力に変換する', () => {
    const input = parseHookInput({
      hook_event_name: 'UserPromptSubmit',
      session_id: 'session-1',
      prompt: 'hello'
    });

    expect(isHookInputOf(input, 'UserPromptSubmit')).toBe(true);
    if (isHookInputOf(input, 'UserPromptSubmit')) {
      expect(input.prompt).toBe('hello');
      expect(input.session_id).toBe('session-1');
    }
  });

  it('必須フィールドが欠けた既知イベントは共通フィールドのみになる', () => {
    expect(parseHookInput({ hook_event_name: 'PreToolUse', session_id: 'session-1', tool_input: {} }))
      .toEqual({ session_id: 'session-1' });
    expect(parseHookInput({ hook_event_name: 'Stop', cwd: '/work' })).toEqual({ cwd: '/work' });
    expect(parseHookInput({ hook_event_name: 'Notification' })).toEqual({});
  });

  it('共通フィールドの型違いは未設定として扱う', () => {
    const input = parseHookInput({ hook_event_name: 'Stop', session_id: 42, stop_hook_active: true });

    expect(input).toEqual({ hook_event_name: 'Stop', stop_hook_active: true });
    expect(isHookInputOf(input, 'Stop')).toBe(true);
  });

  it('PreCompact の trigger は未知の値もそのまま渡す', () => {
    expect(parseHookInput({ hook_event_name: 'PreCompact', trigger: 'scheduled' }))
      .toEqual({ hook_event_name: 'PreCompact', trigger: 'scheduled' });
    expect(parseHookInput({ hook_event_name: 'PreCompact', trigger: 'auto', custom_instructions: null }))
      .toEqual({ hook_event_name: 'PreCompact', trigger: 'auto', custom_instructions: null });
  });

  it('未知のイベントは共通フィールドのみ残す', () => {
    expect(parseHookInput({ hook_event_name: 'FutureEvent', cwd: '/work', extra: 1 })).toEqual({ cwd: '/work' });
  });
});

describe('convertHookOutput', () => {
  it('予約語回避名をCLIのキー名に変換する', () => {
    expect(convertHookOutput({
      continue_: true,
      async_: true,
      async_timeout: 30,
      suppress_output: false,
      stop_reason: 'done',
      system_message: 'note',
      decision: 'block'
    })).toEqual({
      continue: true,
      async: true,
      asyncTimeout: 30,
      suppressOutput: false,
      stopReason: 'done',
      systemMessage: 'note',
      decision: 'block'
    });
  });

  it('toJSON を持つ値はシリアライズする', () => {
    expect(convertHookOutput({ hook_specific_output: new AdditionalContext('PostToolUse', 'ok') })).toEqual({
      hookSpecificOutput: { hookEventName: 'PostToolUse', additionalContext: 'ok' }
    });
    expect(convertHookOutput(new PreToolUseDecision('allow', undefined, { path: '/tmp/a' }))).toEqual({
      hookEventName: 'PreToolUse',
      permissionDecision: 'allow',
      updatedInput: { path: '/tmp/a' }
    });
  });

  it('オブジェクト以外は空の出力になる', () => {
    expect(convertHookOutput(undefined)).toEqual({});
    expect(convertHookOutput('text')).toEqual({});
    expect(convertHookOutput([1, 2])).toEqual({});
  });
});

describe('HookDispatcher', () => {
  it('イベント順にコールバックIDを割り当てる', () => {
    const noop: HookCallback = () => undefined;
    const dispatcher = new HookDispatcher({
      Stop: [{ hooks: [noop] }],
      PreToolUse: [
        { matcher: 'Bash', hooks: [noop, noop] },
        { matcher: 'Write', hooks: [noop], timeout: 10 }
      ]
    });

    expect(dispatcher.size).toBe(4);
    expect(dispatcher.initializePayload()).toEqual({
      PreToolUse: [
        { matcher: 'Bash', hookCallbackIds: ['hook_0', 'hook_1'] },
        { matcher: 'Write', hookCallbackIds: ['hook_2'], timeout: 10 }
      ],
      Stop: [{ hookCallbackIds: ['hook_3'] }]
    });
  });

  it('登録が無ければ initialize に載せない', () => {
    expect(new HookDispatcher().initializePayload()).toBeUndefined();
    expect(new HookDispatcher({ Stop: [] }).initializePayload()).toBeUndefined();
  });

  it('型付き入力と tool_use_id でコールバックを呼ぶ', async () => {
    const callback = vi.fn<HookCallback>(async () => ({ continue_: false, stop_reason: 'blocked' }));
    const dispatcher = new HookDispatcher({ PostToolUse: [{ hooks: [callback] }] });

    const output = await dispatcher.dispatch({
      subtype: 'hook_callback',
      callback_id: 'hook_0',
      input: { hook_event_name: 'PostToolUse', tool_name: 'Read', tool_input: {}, tool_response: 'contents' },
      tool_use_id: null
    }, signal);

    expect(output).toEqual({ continue: false, stopReason: 'blocked' });
    expect(callback).toHaveBeenCalledWith(
      { hook_event_name: 'PostToolUse', tool_name: 'Read', tool_input: {}, tool_response: 'contents' },
      undefined,
      { signal }
    );
  });

  it('入力が不完全でもコールバックを呼ぶ', async () => {
    const callback = vi.fn<HookCallback>(() => ({ continue_: true }));
    const dispatcher = new HookDispatcher({ Stop: [{ hooks: [callback] }] });

    const output = await dispatcher.dispatch({
      subtype: 'hook_callback',
      callback_id: 'hook_0',
      input: { hook_event_name: 'Stop', session_id: 'session-2' }
    }, signal);

    expect(output).toEqual({ continue: true });
    expect(callback).toHaveBeenCalledWith({ session_id: 'session-2' }, undefined, { signal });
  });

  it('戻り値なしのコールバックは空の出力', async () => {
    const dispatcher = new HookDispatcher({ Notification: [{ hooks: [async () => undefined] }] });

    await expect(dispatcher.dispatch({
      subtype: 'hook_callback',
      callback_id: 'hook_0',
      input: { hook_event_name: 'Notification', message: 'waiting' }
    }, signal)).resolves.toEqual({});
  });

  it('未登録のIDは ProtocolError', async () => {
    const dispatcher = new HookDispatcher();

    await expect(dispatcher.dispatch({ subtype: 'hook_callback', callback_id: 'hook_3', input: {} }, signal))
      .rejects.toThrow('No hook callback found for ID: hook_3');
  });

  it('コールバックの例外はそのまま伝播する', async () => {
    const dispatcher = new HookDispatcher({
      Stop: [{ hooks: [() => { throw new Error('hook crashed'); }] }]
    });

    await expect(dispatcher.dispatch({
      subtype: 'hook_callback',
      callback_id: 'hook_0',
      input: { hook_event_name: 'Stop', stop_hook_active: false }
    }, signal)).rejects.toThrow('hook crashed');
  });

  it('マッチャーの timeout（秒）を超えると HookTimeoutError', async () => {
    vi.useFakeTimers();
    try {
      const dispatcher = new HookDispatcher({
        Stop: [{ hooks: [() => new Promise<HookOutput>(() => undefined)], timeout: 2 }]
      });

      const pending = dispatcher.dispatch({
        subtype: 'hook_callback',
        callback_id: 'hook_0',
        input: { hook_event_name: 'Stop', stop_hook_active: true }
      }, signal);
      const assertions = Promise.all([
        expect(pending).rejects.toBeInstanceOf(HookTimeoutError),
        expect(pending).rejects.toThrow('Hook callback hook_0 timed out after 2s')
      ]);

      await vi.advanceTimersByTimeAsync(2000);
      await assertions;
    } finally {
      vi.useRealTimers();
    }
  });
});
