/**
 * 共通ユーティリティ関数
 */
import { randomBytes } from 'crypto';

/**
 * プレーンオブジェクト判定
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * オブジェクトのディープマージ（配列は置き換え、undefinedは無視）
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;

    const existing = result[key];
    result[key] = isRecord(value) && isRecord(existing) ? deepMerge(existing, value) : value;
  }

  return result;
}

/**
 * ランダムな16進文字列
 */
export function randomHex(bytes = 4): string {
  return randomBytes(bytes).toString('hex');
}

/**
 * エラーの安全な変換
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === 'string') {
    return new Error(error);
  }

  if (isRecord(error)) {
    return new Error(JSON.stringify(error));
  }

  return new Error('Unknown error occurred');
}

/**
 * Promiseと制限時間の競争。期限切れ時は onTimeout の例外で失敗する
 */
export function withTimeout<T>(work: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);

    void work.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      error => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
