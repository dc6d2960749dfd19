/**
 * CLI ユーティリティ関数
 */
import chalk from 'chalk';
import type { ContentBlock, Message } from '@tether/sdk';

export function logSuccess(message: string): void {
  console.log(chalk.green(`✅ ${message}`));
}

export function logError(message: string): void {
  console.error(chalk.red(`❌ ${message}`));
}

export function logWarning(message: string): void {
  console.warn(chalk.yellow(`⚠️  ${message}`));
}

export function logInfo(message: string): void {
  console.log(chalk.blue(`ℹ️  ${message}`));
}

export function formatBytes(bytes: number): string {
  const sizes = ['Bytes', 'KB', 'MB', 'GB'];
  if (bytes === 0) return '0 Bytes';

  const i = Math.floor(Math.log(bytes) / Math.log(1024));
  return Math.round(bytes / Math.pow(1024, i) * 100) / 100 + ' ' + sizes[i];
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}

function formatBlock(block: ContentBlock): string {
  switch (block.type) {
    case 'text':
      return block.text;
    case 'thinking':
      return chalk.gray(`💭 ${block.thinking}`);
    case 'tool_use':
      return chalk.cyan(`🔧 ${block.name} ${JSON.stringify(block.input)}`);
    case 'tool_result': {
      const body = typeof block.content === 'string' ? block.content : JSON.stringify(block.content ?? []);
      return block.isError ? chalk.red(`↳ ${body}`) : chalk.gray(`↳ ${body}`);
    }
  }
}

/**
 * 受信メッセージを表示用の行に変換する
 */
export function formatMessage(message: Message): string[] {
  switch (message.type) {
    case 'assistant':
      return message.content.map(formatBlock);
    case 'user':
      return typeof message.content === 'string' ? [] : message.content.map(formatBlock);
    case 'system':
      return message.subtype === 'init' ? [chalk.gray(`📋 Session initialized (${message.subtype})`)] : [];
    case 'result': {
      const cost = message.totalCostUsd !== undefined ? ` $${message.totalCostUsd.toFixed(4)}` : '';
      const summary = `${message.numTurns} turns in ${formatDuration(message.durationMs)}${cost}`;
      return [message.isError ? chalk.red(`❌ ${summary}`) : chalk.green(`✅ ${summary}`)];
    }
    case 'stream_event':
      return [];
  }
}
