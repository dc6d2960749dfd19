/**
 * @tether/sdk - エージェントCLI制御SDK
 *
 * コントロールプロトコルの多重化、フック、インプロセスツールサーバー、
 * サブプロセストランスポートを提供
 */

export * from './client/index.js';
export * from './config/index.js';
export * from './error/index.js';
export * from './hooks/index.js';
export * from './logger/index.js';
export * from './mcp/index.js';
export * from './messages/index.js';
export * from './query/index.js';
export * from './queue/index.js';
export * from './transport/index.js';
export * from './types/index.js';

// デフォルトエクスポート
export { AgentClient as default } from './client/index.js';
