/**
 * デモ用電卓サーバー（インプロセス）
 */
import { createSdkMcpServer, tool } from '@tether/sdk';
import type { McpSdkServerConfig, ToolDefinition } from '@tether/sdk';
import type { JsonObject } from '@tether/shared';

export const CALCULATOR_SERVER_NAME = 'calculator';

function text(value: string, isError = false): JsonObject {
  const result: JsonObject = { content: [{ type: 'text', text: value }] };
  if (isError) result.is_error = true;
  return result;
}

function numberArg(args: JsonObject, key: string): number {
  const value = args[key];
  return typeof value === 'number' ? value : Number(value);
}

const BINARY = { a: 'number', b: 'number' } as const;

export const CALCULATOR_TOOLS: ToolDefinition[] = [
  tool('add', 'Add two numbers', BINARY, args => {
    const a = numberArg(args, 'a');
    const b = numberArg(args, 'b');
    return text(`${a} + ${b} = ${a + b}`);
  }),
  tool('subtract', 'Subtract one number from another', BINARY, args => {
    const a = numberArg(args, 'a');
    const b = numberArg(args, 'b');
    return text(`${a} - ${b} = ${a - b}`);
  }),
  tool('multiply', 'Multiply two numbers', BINARY, args => {
    const a = numberArg(args, 'a');
    const b = numberArg(args, 'b');
    return text(`${a} × ${b} = ${a * b}`);
  }),
  tool('divide', 'Divide one number by another', BINARY, args => {
    const a = numberArg(args, 'a');
    const b = numberArg(args, 'b');
    if (b === 0) return text('Error: Division by zero is not allowed', true);
    return text(`${a} ÷ ${b} = ${a / b}`);
  }),
  tool('sqrt', 'Calculate square root', { n: 'number' }, args => {
    const n = numberArg(args, 'n');
    if (n < 0) return text(`Error: Cannot calculate square root of negative number ${n}`, true);
    return text(`√${n} = ${Math.sqrt(n)}`);
  }),
  tool('power', 'Raise a number to a power', { base: 'number', exponent: 'number' }, args => {
    const base = numberArg(args, 'base');
    const exponent = numberArg(args, 'exponent');
    return text(`${base}^${exponent} = ${base ** exponent}`);
  }, { readOnlyHint: true })
];

export function createCalculatorServer(): McpSdkServerConfig {
  return createSdkMcpServer({ name: CALCULATOR_SERVER_NAME, version: '2.0.0', tools: CALCULATOR_TOOLS });
}

// CLIに許可するツール名（mcp__<server>__<tool>）
export function calculatorToolNames(): string[] {
  return CALCULATOR_TOOLS.map(definition => `mcp__${CALCULATOR_SERVER_NAME}__${definition.name}`);
}
