/**
 * トランスポート層
 */
import type { JsonObject } from '@tether/shared';

export interface Transport {
  connect(): Promise<void>;
  /** 1行分（末尾改行込み）を書き込む */
  write(data: string): Promise<void>;
  readMessages(): AsyncIterable<JsonObject>;
  /** 送信方向のみ閉じる */
  endInput(): Promise<void>;
  close(): Promise<void>;
  isReady(): boolean;
}

export * from './ndjson.js';
export * from './stream.js';
export * from './command.js';
export * from './subprocess.js';
