/**
 * 改行区切りJSONのデコード
 */
import type { Writable } from 'stream';
import type { StringDecoder } from 'string_decoder';
import { DEFAULT_MAX_BUFFER_SIZE, isRecord } from '@tether/shared';
import type { JsonObject } from '@tether/shared';
import { CLIConnectionError, CLIJSONDecodeError } from '../error/index.js';

/**
 * チャンク列を JSON オブジェクト列に変換する。
 * 1行で完結しないJSONは次の行と連結して再試行する
 */
export class NdjsonDecoder {
  private partialLine = '';
  private jsonBuffer = '';

  constructor(private readonly maxBufferSize = DEFAULT_MAX_BUFFER_SIZE) {}

  push(chunk: string): JsonObject[] {
    this.partialLine += chunk;
    const lines = this.partialLine.split('\n');
    this.partialLine = lines.pop() ?? '';

    const messages = lines.flatMap(line => this.decodeLine(line));
    this.checkSize(this.jsonBuffer + this.partialLine);
    return messages;
  }

  /**
   * ストリーム終端。未完のJSONが残っていればエラー
   */
  flush(): JsonObject[] {
    const rest = this.partialLine;
    this.partialLine = '';
    const messages = this.decodeLine(rest);

    if (this.jsonBuffer) {
      const incomplete = this.jsonBuffer;
      this.jsonBuffer = '';
      throw new CLIJSONDecodeError(incomplete, new Error('Stream ended inside a JSON message'));
    }
    return messages;
  }

  private decodeLine(line: string): JsonObject[] {
    const trimmed = line.trim();
    if (!trimmed) return [];

    this.jsonBuffer += trimmed;
    this.checkSize(this.jsonBuffer);

    let value: unknown;
    try {
      value = JSON.parse(this.jsonBuffer);
    } catch {
      // 続きの行を待つ
      return [];
    }

    const text = this.jsonBuffer;
    this.jsonBuffer = '';
    if (!isRecord(value)) {
      throw new CLIJSONDecodeError(text, new Error('Expected a JSON object'));
    }
    return [value];
  }

  private checkSize(buffered: string): void {
    const size = Buffer.byteLength(buffered, 'utf8');
    if (size > this.maxBufferSize) {
      this.jsonBuffer = '';
      this.partialLine = '';
      throw new CLIJSONDecodeError(
        buffered,
        new Error(`Buffer size ${size} exceeds limit ${this.maxBufferSize}`)
      );
    }
  }
}

export function chunkToString(chunk: unknown, decoder: StringDecoder): string {
  if (typeof chunk === 'string') return chunk;
  if (Buffer.isBuffer(chunk)) return decoder.write(chunk);
  return String(chunk);
}

export function writeChunk(output: Writable, data: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    output.write(data, error => {
      if (error) {
        reject(new CLIConnectionError(`Failed to write: ${error.message}`, error));
      } else {
        resolve();
      }
    });
  });
}
