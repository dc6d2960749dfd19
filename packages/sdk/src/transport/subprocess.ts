/**
 * サブプロセストランスポート
 * エージェントCLIを起動し、標準入出力で通信する
 */
import { spawn } from 'child_process';
import type { ChildProcessWithoutNullStreams } from 'child_process';
import { once } from 'events';
import { existsSync, statSync } from 'fs';
import { homedir } from 'os';
import { delimiter, join } from 'path';
import { createInterface } from 'readline';
import { StringDecoder } from 'string_decoder';
import {
  DEFAULT_CLI_COMMAND,
  DEFAULT_ENTRYPOINT,
  DEFAULT_MAX_BUFFER_SIZE,
  ENTRYPOINT_ENV_VAR,
  SDK_VERSION,
  SDK_VERSION_ENV_VAR,
  isRecord,
  withTimeout
} from '@tether/shared';
import type { JsonObject } from '@tether/shared';
import { CLIConnectionError, CLINotFoundError, ProcessError } from '../error/index.js';
import { logger } from '../logger/index.js';
import type { AgentOptions } from '../types/index.js';
import type { Transport } from './index.js';
import { buildCommand } from './command.js';
import { NdjsonDecoder, chunkToString, writeChunk } from './ndjson.js';

const log = logger.child('subprocess');

const STDERR_TAIL_LINES = 20;
const TERMINATE_GRACE_MS = 5000;

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/**
 * PATH と既知のインストール先からCLIを探す
 */
export function findCli(command = DEFAULT_CLI_COMMAND, env: NodeJS.ProcessEnv = process.env): string {
  for (const dir of (env.PATH ?? '').split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, command);
    if (isFile(candidate)) return candidate;
  }

  const home = homedir();
  const locations = [
    join(home, `.${command}/local/${command}`),
    join(home, '.npm-global/bin', command),
    join('/usr/local/bin', command),
    join(home, '.local/bin', command),
    join(home, 'node_modules/.bin', command)
  ];

  const found = locations.find(isFile);
  if (found) return found;

  throw new CLINotFoundError(
    `Agent CLI '${command}' not found on PATH or in common install locations. ` +
    'Set cli.path in the configuration or pass cliPath in the options'
  );
}

export interface SubprocessTransportSettings {
  cliPath?: string;
  cliCommand?: string;
  entrypoint?: string;
  maxBufferSize?: number;
}

export class SubprocessCLITransport implements Transport {
  private child?: ChildProcessWithoutNullStreams;
  private exited?: Promise<number | null>;
  private ready = false;
  private closing = false;
  private exitError?: Error;
  private readonly stderrTail: string[] = [];
  private readonly cliPath: string;
  private readonly maxBufferSize: number;

  constructor(
    private readonly prompt: string | null,
    private readonly options: AgentOptions,
    private readonly settings: SubprocessTransportSettings = {}
  ) {
    this.cliPath = options.cliPath ?? settings.cliPath ?? findCli(settings.cliCommand);
    this.maxBufferSize = options.maxBufferSize ?? settings.maxBufferSize ?? DEFAULT_MAX_BUFFER_SIZE;
  }

  get isStreaming(): boolean {
    return this.prompt === null;
  }

  async connect(): Promise<void> {
    if (this.child) return;

    const [command, ...args] = buildCommand(this.cliPath, this.options, this.prompt);
    const env: NodeJS.ProcessEnv = {
      ...process.env,
      ...this.options.env,
      [ENTRYPOINT_ENV_VAR]: this.settings.entrypoint ?? DEFAULT_ENTRYPOINT,
      [SDK_VERSION_ENV_VAR]: SDK_VERSION
    };
    if (this.options.cwd) env.PWD = this.options.cwd;

    const child = spawn(command, args, {
      cwd: this.options.cwd,
      env,
      uid: this.options.user,
      stdio: ['pipe', 'pipe', 'pipe']
    });

    try {
      await once(child, 'spawn');
    } catch (error) {
      this.exitError = this.spawnError(error);
      throw this.exitError;
    }

    this.child = child;
    this.exited = new Promise(resolve => {
      child.once('close', code => resolve(code));
    });
    this.watchStderr(child);

    if (!this.isStreaming) {
      child.stdin.end();
    }

    this.ready = true;
    log.debug(`Started ${this.cliPath} (pid ${child.pid ?? 'unknown'})`);
  }

  private spawnError(error: unknown): Error {
    const code = isRecord(error) ? error.code : undefined;
    if (code === 'ENOENT') {
      if (this.options.cwd && !existsSync(this.options.cwd)) {
        return new CLIConnectionError(`Working directory does not exist: ${this.options.cwd}`);
      }
      return new CLINotFoundError('Agent CLI not found at', this.cliPath);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new CLIConnectionError(`Failed to start agent CLI: ${message}`, error);
  }

  private watchStderr(child: ChildProcessWithoutNullStreams): void {
    const lines = createInterface({ input: child.stderr });
    lines.on('line', line => {
      if (!line) return;

      this.stderrTail.push(line);
      if (this.stderrTail.length > STDERR_TAIL_LINES) this.stderrTail.shift();

      try {
        this.options.stderr?.(line);
      } catch (error) {
        log.warn(`stderr callback failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    });
  }

  async write(data: string): Promise<void> {
    const child = this.child;
    if (!this.ready || !child) {
      throw new CLIConnectionError('Transport is not ready for writing');
    }
    if (this.exitError) {
      throw new CLIConnectionError(`Cannot write to process that exited with error: ${this.exitError.message}`);
    }
    if (child.exitCode !== null) {
      throw new CLIConnectionError(`Cannot write to terminated process (exit code: ${child.exitCode})`);
    }
    if (!child.stdin.writable) {
      throw new CLIConnectionError('Process stdin is closed');
    }

    try {
      await writeChunk(child.stdin, data);
    } catch (error) {
      this.ready = false;
      this.exitError = error instanceof Error ? error : new CLIConnectionError(String(error));
      throw this.exitError;
    }
  }

  async *readMessages(): AsyncGenerator<JsonObject> {
    const child = this.child;
    const exited = this.exited;
    if (!child || !exited) {
      throw new CLIConnectionError('Not connected');
    }

    const decoder = new NdjsonDecoder(this.maxBufferSize);
    const text = new StringDecoder('utf8');

    try {
      for await (const chunk of child.stdout) {
        yield* decoder.push(chunkToString(chunk, text));
      }
    } catch (error) {
      if (this.closing) return;
      throw error;
    }
    yield* decoder.flush();

    const exitCode = await exited;
    if (exitCode !== null && exitCode !== 0 && !this.closing) {
      const stderr = this.stderrTail.length > 0 ? this.stderrTail.join('\n') : undefined;
      this.exitError = new ProcessError('Command failed', exitCode, stderr);
      throw this.exitError;
    }
  }

  async endInput(): Promise<void> {
    const child = this.child;
    if (!child || child.stdin.writableEnded) return;
    await new Promise<void>(resolve => {
      child.stdin.end(() => resolve());
    });
  }

  async close(): Promise<void> {
    this.ready = false;
    const child = this.child;
    const exited = this.exited;
    if (!child || !exited) return;

    this.closing = true;
    if (!child.stdin.writableEnded) child.stdin.end();

    if (child.exitCode === null && child.signalCode === null) {
      child.kill('SIGTERM');
      try {
        await withTimeout(exited, TERMINATE_GRACE_MS, () => new Error('Process did not exit after SIGTERM'));
      } catch (error) {
        log.warn(`${error instanceof Error ? error.message : String(error)}; sending SIGKILL`);
        child.kill('SIGKILL');
      }
    }

    this.child = undefined;
    this.exited = undefined;
  }

  isReady(): boolean {
    return this.ready;
  }
}
