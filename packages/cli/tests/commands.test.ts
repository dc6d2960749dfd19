/**
 * CLI コマンド テストスイート
 */
import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import chalk from 'chalk';
import { isRecord } from '@tether/shared';
import type { Message } from '@tether/sdk';
import { toAgentOptions } from '../src/config/index.js';
import { runQuery } from '../src/commands/index.js';
import { formatBytes, formatDuration, formatMessage } from '../src/utils/index.js';
import { FakeTransport } from '../../sdk/tests/helpers/fake-transport.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('toAgentOptions', () => {
  it('フラグをオプションに変換する', () => {
    expect(toAgentOptions({ model: 'model-a', permissionMode: 'plan', maxTurns: '3', cwd: '/work' })).toEqual({
      model: 'model-a',
      permissionMode: 'plan',
      maxTurns: 3,
      cwd: '/work'
    });
  });

  it('不正な権限モードを拒否する', () => {
    expect(() => toAgentOptions({ permissionMode: 'yolo' })).toThrow(
      'Invalid permission mode: yolo (expected one of default, acceptEdits, plan, bypassPermissions)'
    );
  });

  it('不正なターン数を拒否する', () => {
    expect(() => toAgentOptions({ maxTurns: '0' })).toThrow('Invalid max turns: 0');
    expect(() => toAgentOptions({ maxTurns: 'many' })).toThrow('Invalid max turns: many');
  });

  it('--calculator で電卓サーバーと許可ツールを追加する', () => {
    const options = toAgentOptions({ calculator: true });

    expect(Object.keys(options.mcpServers ?? {})).toEqual(['calculator']);
    expect(options.allowedTools).toContain('mcp__calculator__divide');
  });
});

describe('formatMessage', () => {
  it('assistant のブロックを行に変換する', () => {
    const message: Message = {
      type: 'assistant',
      model: 'model-a',
      content: [
        { type: 'text', text: 'Let me check.' },
        { type: 'tool_use', id: 'tool-1', name: 'Read', input: { path: 'a.ts' } },
        { type: 'thinking', thinking: 'considering', signature: '' }
      ]
    };

    expect(formatMessage(message)).toEqual(['Let me check.', '🔧 Read {"path":"a.ts"}', '💭 considering']);
  });

  it('ツール結果と文字列の user メッセージ', () => {
    expect(formatMessage({
      type: 'user',
      content: [{ type: 'tool_result', toolUseId: 'tool-1', content: 'file body', isError: false }]
    })).toEqual(['↳ file body']);
    expect(formatMessage({ type: 'user', content: 'plain' })).toEqual([]);
  });

  it('result は成否・ターン数・時間・コストを表示する', () => {
    expect(formatMessage({
      type: 'result',
      subtype: 'success',
      durationMs: 65000,
      durationApiMs: 1,
      isError: false,
      numTurns: 2,
      sessionId: 's',
      totalCostUsd: 0.25
    })).toEqual(['✅ 2 turns in 1.1m $0.2500']);
    expect(formatMessage({
      type: 'result',
      subtype: 'error_max_turns',
      durationMs: 900,
      durationApiMs: 1,
      isError: true,
      numTurns: 5,
      sessionId: 's'
    })).toEqual(['❌ 5 turns in 900ms']);
  });

  it('system init のみ表示する', () => {
    expect(formatMessage({ type: 'system', subtype: 'init', data: {} })).toEqual(['📋 Session initialized (init)']);
    expect(formatMessage({ type: 'system', subtype: 'compact_boundary', data: {} })).toEqual([]);
  });
});

describe('format helpers', () => {
  it('バイト数と時間を整形する', () => {
    expect(formatBytes(0)).toBe('0 Bytes');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(1024 * 1024)).toBe('1 MB');
    expect(formatDuration(1500)).toBe('1.5s');
  });
});

describe('runQuery', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tether-cli-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('1ターン実行して結果まで表示する', async () => {
    const transport = new FakeTransport();
    const lines: string[] = [];

    const running = runQuery('2+2?', { config: join(dir, 'missing.json'), calculator: true }, line => lines.push(line), transport);
    const init = await transport.controlRequest();
    transport.respond(init);
    await transport.waitForWrite(message => message.type === 'user');
    transport.push({ type: 'assistant', message: { model: 'model-a', content: [{ type: 'text', text: '4' }] } });
    transport.push({
      type: 'result',
      subtype: 'success',
      duration_ms: 1500,
      duration_api_ms: 1000,
      is_error: false,
      num_turns: 1,
      session_id: 'session-1',
      total_cost_usd: 0.5
    });

    await expect(running).resolves.toBe(true);
    expect(lines).toEqual(['4', '✅ 1 turns in 1.5s $0.5000']);
    expect(isRecord(init.request) && init.request.sdkMcpServers).toEqual(['calculator']);
    expect(transport.closed).toBe(true);
  });

  it('エラー結果なら false を返す', async () => {
    const transport = new FakeTransport();

    const running = runQuery('fail', { config: join(dir, 'missing.json') }, () => undefined, transport);
    transport.respond(await transport.controlRequest());
    await transport.waitForWrite(message => message.type === 'user');
    transport.push({
      type: 'result',
      subtype: 'error_during_execution',
      duration_ms: 10,
      duration_api_ms: 5,
      is_error: true,
      num_turns: 1,
      session_id: 'session-1'
    });

    await expect(running).resolves.toBe(false);
  });
});
