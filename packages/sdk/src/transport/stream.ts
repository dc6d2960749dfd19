/**
 * Readable / Writable 上のトランスポート
 */
import type { Readable, Writable } from 'stream';
import { StringDecoder } from 'string_decoder';
import { DEFAULT_MAX_BUFFER_SIZE } from '@tether/shared';
import type { JsonObject } from '@tether/shared';
import { CLIConnectionError } from '../error/index.js';
import type { Transport } from './index.js';
import { NdjsonDecoder, chunkToString, writeChunk } from './ndjson.js';

export interface StreamTransportOptions {
  maxBufferSize?: number;
}

/**
 * Readable / Writable の組に対するトランスポート
 */
export class StreamTransport implements Transport {
  private ready = false;
  private closed = false;
  private inputEnded = false;
  private readonly maxBufferSize: number;

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    options: StreamTransportOptions = {}
  ) {
    this.maxBufferSize = options.maxBufferSize ?? DEFAULT_MAX_BUFFER_SIZE;
  }

  async connect(): Promise<void> {
    if (this.closed) {
      throw new CLIConnectionError('Transport has been closed');
    }
    this.ready = true;
  }

  async write(data: string): Promise<void> {
    if (!this.ready || this.inputEnded) {
      throw new CLIConnectionError('Transport is not ready for writing');
    }
    await writeChunk(this.output, data);
  }

  async *readMessages(): AsyncGenerator<JsonObject> {
    if (!this.ready) {
      throw new CLIConnectionError('Not connected');
    }

    const decoder = new NdjsonDecoder(this.maxBufferSize);
    const text = new StringDecoder('utf8');

    try {
      for await (const chunk of this.input) {
        yield* decoder.push(chunkToString(chunk, text));
      }
    } catch (error) {
      // close() による中断は正常終了
      if (this.closed) return;
      throw error;
    }

    yield* decoder.flush();
  }

  async endInput(): Promise<void> {
    if (this.inputEnded) return;
    this.inputEnded = true;
    await new Promise<void>(resolve => {
      this.output.end(() => resolve());
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.ready = false;
    if (!this.inputEnded) {
      this.inputEnded = true;
      this.output.end();
    }
    this.input.destroy();
  }

  isReady(): boolean {
    return this.ready;
  }
}
