/**
 * @tether/cli - コマンドラインインターフェース
 *
 * セッション実行、設定管理、デモ用ツールの一覧を提供
 */

export * from './commands/index.js';
export * from './utils/index.js';
export * from './config/index.js';
export * from './demo/calculator.js';

// デフォルトエクスポート
export { TetherCli } from './cli.js';
