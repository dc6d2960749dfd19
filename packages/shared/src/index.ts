/**
 * @tether/shared - 共通型定義・ユーティリティ
 *
 * tether全体で使用される共通の型定義、
 * バリデーションスキーマ、ユーティリティ関数を提供
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './utils/index.js';
export * from './constants/index.js';
