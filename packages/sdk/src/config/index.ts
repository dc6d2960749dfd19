/**
 * 設定管理
 * 環境変数、設定ファイル、動的設定の統合管理
 */
import { readFileSync, existsSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { mkdir } from 'fs/promises';
import {
  DEFAULT_ENTRYPOINT,
  DEFAULT_INITIALIZE_TIMEOUT,
  DEFAULT_MAX_BUFFER_SIZE,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_SUBTYPE_TIMEOUTS,
  TetherConfigSchema,
  deepMerge,
  isRecord,
  toError
} from '@tether/shared';
import type { TetherConfig } from '@tether/shared';
import { logger } from '../logger/index.js';

const log = logger.child('config');

export const DEFAULT_CONFIG: TetherConfig = {
  cli: {
    entrypoint: DEFAULT_ENTRYPOINT,
    maxBufferSize: DEFAULT_MAX_BUFFER_SIZE
  },
  protocol: {
    requestTimeout: DEFAULT_REQUEST_TIMEOUT,
    initializeTimeout: DEFAULT_INITIALIZE_TIMEOUT,
    subtypeTimeouts: { ...DEFAULT_SUBTYPE_TIMEOUTS }
  },
  logging: {
    level: 'info',
    console: true,
    structured: false
  },
  defaults: {}
};

type RawConfig = Record<string, unknown>;

function cloneDefaults(): TetherConfig {
  return TetherConfigSchema.parse(DEFAULT_CONFIG);
}

// 'a.b.c' 形式のパスからネストしたパッチを作る
function patchFor(path: string, value: unknown): RawConfig {
  const keys = path.split('.');
  let patch: unknown = value;
  for (let i = keys.length - 1; i >= 0; i--) {
    patch = { [keys[i]]: patch };
  }
  return isRecord(patch) ? patch : {};
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

export class ConfigManager {
  private raw: RawConfig;
  private config: TetherConfig;
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private watchers: Array<(config: TetherConfig) => void> = [];

  constructor(configPath = './tether.config.json', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
    this.raw = this.loadRaw();
    this.config = this.resolve(cloneDefaults());
  }

  private loadRaw(): RawConfig {
    let fileConfig: RawConfig = {};

    // 設定ファイルの読み込み
    if (existsSync(this.configPath)) {
      try {
        const parsed: unknown = JSON.parse(readFileSync(this.configPath, 'utf-8'));
        if (isRecord(parsed)) {
          fileConfig = parsed;
          log.debug(`Loaded config from: ${this.configPath}`);
        } else {
          log.warn(`Ignoring ${this.configPath}: top level must be an object`);
        }
      } catch (error) {
        log.warn(`Failed to load config from ${this.configPath}: ${toError(error).message}`);
      }
    } else {
      log.debug(`Using default config (${this.configPath} not found)`);
    }

    // 設定をマージ（環境変数 > ファイル > デフォルト）
    return deepMerge(deepMerge(cloneDefaults(), fileConfig), this.loadFromEnvironment());
  }

  private loadFromEnvironment(): RawConfig {
    const env = this.env;
    const cli: RawConfig = {};
    const protocol: RawConfig = {};
    const logging: RawConfig = {};
    const defaults: RawConfig = {};

    if (env.TETHER_CLI_PATH) cli.path = env.TETHER_CLI_PATH;
    if (env.TETHER_ENTRYPOINT) cli.entrypoint = env.TETHER_ENTRYPOINT;

    protocol.requestTimeout = parseInteger(env.TETHER_REQUEST_TIMEOUT);
    protocol.initializeTimeout = parseInteger(env.TETHER_INITIALIZE_TIMEOUT);

    // 不正値はスキーマ検証で弾く
    if (env.TETHER_LOG_LEVEL) logging.level = env.TETHER_LOG_LEVEL;
    if (env.TETHER_MODEL) defaults.model = env.TETHER_MODEL;

    return { cli, protocol, logging, defaults };
  }

  /**
   * 検証に通った場合のみ有効な設定を差し替える
   */
  private resolve(previous: TetherConfig = this.config): TetherConfig {
    const result = TetherConfigSchema.safeParse(this.raw);
    const config = result.success ? result.data : previous;
    if (!result.success) {
      log.warn(`Invalid configuration, keeping previous values: ${this.describeIssues(result.error.issues).join('; ')}`);
    }

    logger.configure(config.logging);
    return config;
  }

  private describeIssues(issues: Array<{ path: Array<string | number>; message: string }>): string[] {
    return issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
  }

  getConfig(): TetherConfig {
    return TetherConfigSchema.parse(this.config);
  }

  get(path: string): unknown {
    let current: unknown = this.config;

    for (const key of path.split('.')) {
      if (isRecord(current) && key in current) {
        current = current[key];
      } else {
        return undefined;
      }
    }

    return current;
  }

  set(path: string, value: unknown): void {
    this.raw = deepMerge(this.raw, patchFor(path, value));
    this.config = this.resolve();
    this.notifyWatchers();
  }

  update(updates: RawConfig): void {
    this.raw = deepMerge(this.raw, updates);
    this.config = this.resolve();
    this.notifyWatchers();
  }

  async saveConfig(path?: string): Promise<void> {
    const targetPath = path || this.configPath;

    try {
      // ディレクトリが存在しない場合は作成
      const dir = dirname(targetPath);
      if (!existsSync(dir)) {
        await mkdir(dir, { recursive: true });
      }

      writeFileSync(targetPath, JSON.stringify(this.config, null, 2), 'utf-8');
      log.info(`💾 Config saved to: ${targetPath}`);
    } catch (error) {
      log.error(`Failed to save config to ${targetPath}: ${toError(error).message}`);
      throw error;
    }
  }

  reload(): void {
    log.info('🔄 Reloading configuration...');
    this.raw = this.loadRaw();
    this.config = this.resolve();
    this.notifyWatchers();
  }

  // 設定変更の監視
  watch(callback: (config: TetherConfig) => void): () => void {
    this.watchers.push(callback);

    // unwatch関数を返す
    return () => {
      const index = this.watchers.indexOf(callback);
      if (index > -1) {
        this.watchers.splice(index, 1);
      }
    };
  }

  private notifyWatchers(): void {
    for (const watcher of this.watchers) {
      try {
        watcher(this.config);
      } catch (error) {
        log.error(`Config watcher error: ${toError(error).message}`);
      }
    }
  }

  // バリデーション（マージ済みの生の値に対して行う）
  validate(): {
    valid: boolean;
    errors: string[];
  } {
    const result = TetherConfigSchema.safeParse(this.raw);
    return {
      valid: result.success,
      errors: result.success ? [] : this.describeIssues(result.error.issues)
    };
  }

  // 設定の概要表示
  getSummary(): {
    cli: string;
    protocol: string;
    logging: string;
    model: string;
  } {
    const { cli, protocol, logging, defaults } = this.config;
    return {
      cli: `${cli.path ?? '(auto)'} entrypoint:${cli.entrypoint} buffer:${cli.maxBufferSize}`,
      protocol: `request:${protocol.requestTimeout}ms initialize:${protocol.initializeTimeout}ms`,
      logging: `${logging.level}${logging.structured ? ' (structured)' : ''}`,
      model: defaults.model ?? '(default)'
    };
  }
}
