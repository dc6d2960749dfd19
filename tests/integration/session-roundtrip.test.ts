/**
 * セッション往復の統合テスト
 * 権限確認・フック・インプロセスツール呼び出しを1セッションで通す
 */
import { describe, it, expect, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { AgentClient, ConfigManager } from '@tether/sdk';
import type { CanUseTool, HookCallback, Message } from '@tether/sdk';
import { toAgentOptions } from '@tether/cli';
import { FakeTransport } from '../../packages/sdk/tests/helpers/fake-transport.js';

describe('Session roundtrip', () => {
  it('CLIからの要求にすべて応答し、結果まで受信する', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'tether-roundtrip-'));
    const transport = new FakeTransport();
    const canUseTool = vi.fn<CanUseTool>(async () => ({ behavior: 'allow' }));
    const guard = vi.fn<HookCallback>(async () => ({ decision: 'block', system_message: 'blocked by policy' }));

    const client = new AgentClient(
      {
        ...toAgentOptions({ calculator: true }),
        canUseTool,
        hooks: { PreToolUse: [{ matcher: 'Bash', hooks: [guard] }] }
      },
      { transport, configManager: new ConfigManager(join(dir, 'missing.json'), {}) }
    );

    try {
      const connecting = client.connect();
      const init = await transport.controlRequest();
      expect(init.request).toEqual({
        subtype: 'initialize',
        hooks: { PreToolUse: [{ matcher: 'Bash', hookCallbackIds: ['hook_0'] }] },
        sdkMcpServers: ['calculator']
      });
      transport.respond(init, { commands: [] });
      await connecting;

      await client.query('divide 6 by 3');

      transport.push({
        type: 'control_request',
        request_id: 'cli_1',
        request: { subtype: 'can_use_tool', tool_name: 'mcp__calculator__divide', input: { a: 6, b: 3 } }
      });
      await expect(transport.responseFor('cli_1')).resolves.toEqual({
        subtype: 'success',
        request_id: 'cli_1',
        requestId: 'cli_1',
        response: { behavior: 'allow', updatedInput: { a: 6, b: 3 } }
      });
      expect(canUseTool).toHaveBeenCalledWith(
        'mcp__calculator__divide',
        { a: 6, b: 3 },
        expect.objectContaining({ suggestions: [] })
      );

      transport.push({
        type: 'control_request',
        request_id: 'cli_2',
        request: {
          subtype: 'hook_callback',
          callback_id: 'hook_0',
          input: { hook_event_name: 'PreToolUse', tool_name: 'Bash', tool_input: { command: 'ls' } },
          tool_use_id: 'tool-7'
        }
      });
      await expect(transport.responseFor('cli_2')).resolves.toMatchObject({
        subtype: 'success',
        response: { decision: 'block', systemMessage: 'blocked by policy' }
      });
      expect(guard.mock.calls[0][1]).toBe('tool-7');

      transport.push({
        type: 'control_request',
        request_id: 'cli_3',
        request: {
          subtype: 'mcp_message',
          server_name: 'calculator',
          message: { jsonrpc: '2.0', id: 7, method: 'tools/call', params: { name: 'divide', arguments: { a: 6, b: 3 } } }
        }
      });
      await expect(transport.responseFor('cli_3')).resolves.toMatchObject({
        subtype: 'success',
        response: {
          mcp_response: { jsonrpc: '2.0', id: 7, result: { content: [{ type: 'text', text: '6 ÷ 3 = 2' }] } }
        }
      });

      transport.push({
        type: 'control_request',
        request_id: 'cli_4',
        request: { subtype: 'mcp_message', server_name: 'weather', message: { jsonrpc: '2.0', id: 8, method: 'tools/list' } }
      });
      await expect(transport.responseFor('cli_4')).resolves.toMatchObject({
        response: {
          mcp_response: { jsonrpc: '2.0', id: 8, error: { code: -32601, message: "Server 'weather' not found" } }
        }
      });

      transport.push({ type: 'assistant', message: { model: 'model-a', content: [{ type: 'text', text: '2' }] } });
      transport.push({
        type: 'result',
        subtype: 'success',
        duration_ms: 20,
        duration_api_ms: 10,
        is_error: false,
        num_turns: 1,
        session_id: 'session-1'
      });

      const messages: Message[] = [];
      for await (const message of client.receiveResponse()) messages.push(message);

      expect(messages.map(message => message.type)).toEqual(['assistant', 'result']);
    } finally {
      await client.disconnect();
      rmSync(dir, { recursive: true, force: true });
    }

    expect(transport.closed).toBe(true);
  });
});
