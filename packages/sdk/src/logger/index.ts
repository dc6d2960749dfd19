/**
 * ロガー
 * 標準出力はプロトコル通信に使うため、出力先は標準エラー
 */
import type { LogLevel } from '@tether/shared';

export interface LoggerOptions {
  level: LogLevel;
  console: boolean;
  structured: boolean;
}

export type LogSink = (line: string) => void;

interface LoggerState {
  options: LoggerOptions;
  sink: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const LEVEL_PREFIX: Record<LogLevel, string> = {
  debug: '🔍',
  info: '📋',
  warn: '⚠️ ',
  error: '❌'
};

const defaultSink: LogSink = line => {
  process.stderr.write(`${line}\n`);
};

export class Logger {
  constructor(
    private readonly state: LoggerState,
    private readonly scope?: string
  ) {}

  configure(options: Partial<LoggerOptions>): void {
    this.state.options = { ...this.state.options, ...options };
  }

  setSink(sink: LogSink): void {
    this.state.sink = sink;
  }

  isEnabled(level: LogLevel): boolean {
    return this.state.options.console && LEVEL_ORDER[level] >= LEVEL_ORDER[this.state.options.level];
  }

  child(scope: string): Logger {
    return new Logger(this.state, this.scope ? `${this.scope}:${scope}` : scope);
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.write('warn', message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.write('error', message, fields);
  }

  private write(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    if (this.state.options.structured) {
      this.state.sink(JSON.stringify({
        time: new Date().toISOString(),
        level,
        scope: this.scope,
        message,
        ...fields
      }));
      return;
    }

    const scope = this.scope ? ` [${this.scope}]` : '';
    const extra = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
    this.state.sink(`${LEVEL_PREFIX[level]}${scope} ${message}${extra}`);
  }
}

export function createLogger(options: Partial<LoggerOptions> = {}, sink: LogSink = defaultSink): Logger {
  return new Logger({
    options: { level: 'info', console: true, structured: false, ...options },
    sink
  });
}

// SDK全体で共有するロガー
export const logger = createLogger();
