import { readFile } from 'node:fs/promises';
import type { ConfigSource } from '@/application/interfaces/ConfigSource';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { ConfigError, FatalStartupError, isAbortError, toError } from '@/domain/errors/CollectorErrors';
import { type CollectorConfig, sameSymbols } from '@/domain/models/CollectorConfig';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { sleep } from '@/shared/sleep';
import { parseCollectorConfig } from './ConfigParser';

export interface ConfigWatcherOptions {
  path: string;
  pollIntervalMs?: number;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  /** テストで差し替えるためのファイル読み込み関数 */
  readFile?: (path: string) => Promise<string>;
}

/**
 * インフラ層: 設定ファイルの監視
 *
 * 責務: 設定ファイルを一定間隔で読み直し、収集対象が実質的に変わったときだけ新しい設定を流す。
 * 不正な内容や取引所の変更は ConfigError としてログに残し、直前の設定を維持する。
 */
export class ConfigWatcher implements ConfigSource {
  private readonly path: string;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private readonly read: (path: string) => Promise<string>;

  private current: CollectorConfig | null = null;
  private lastRaw: string | null = null;
  private lastReadError: string | null = null;

  constructor(options: ConfigWatcherOptions) {
    this.path = options.path;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.logger = options.logger ?? LoggerFactory.forComponent('ConfigWatcher');
    this.metricsCollector = options.metricsCollector;
    this.read = options.readFile ?? ((path) => readFile(path, 'utf8'));
  }

  async load(): Promise<CollectorConfig> {
    let raw: string;
    try {
      raw = await this.read(this.path);
    } catch (error) {
      throw new FatalStartupError(`cannot read config file ${this.path}`, { cause: error });
    }

    const result = parseCollectorConfig(raw);
    if (!result.ok) {
      throw new FatalStartupError(`invalid config file ${this.path}: ${result.error.message}`, {
        cause: result.error,
      });
    }

    this.reportSkipped(result.skipped);
    this.current = result.config;
    this.lastRaw = raw;
    this.logger.info('Config loaded', {
      path: this.path,
      exchange: result.config.exchange,
      symbols: [...result.config.symbols],
    });
    return result.config;
  }

  async *watch(signal: AbortSignal): AsyncGenerator<CollectorConfig> {
    yield this.current ?? (await this.load());

    while (!signal.aborted) {
      try {
        await sleep(this.pollIntervalMs, signal);
      } catch (error) {
        if (isAbortError(error)) {
          return;
        }
        throw error;
      }

      const next = await this.poll();
      if (next) {
        yield next;
      }
    }
  }

  /**
   * 設定ファイルを1回読み直す。
   * @returns 収集対象が変わった場合のみ新しい設定、それ以外は null
   */
  async poll(): Promise<CollectorConfig | null> {
    const current = this.current;
    if (!current) {
      throw new ConfigError('config has not been loaded yet');
    }

    let raw: string;
    try {
      raw = await this.read(this.path);
    } catch (error) {
      const message = toError(error).message;
      // 同じ失敗は1回だけ記録する
      if (message !== this.lastReadError) {
        this.logger.warn('Config file unreadable; keeping previous config', { path: this.path, err: error });
        this.metricsCollector?.incrementConfigReload('rejected');
      }
      this.lastReadError = message;
      return null;
    }
    this.lastReadError = null;

    if (raw === this.lastRaw) {
      return null;
    }
    this.lastRaw = raw;

    const result = parseCollectorConfig(raw);
    if (!result.ok) {
      this.reject(result.error);
      return null;
    }
    this.reportSkipped(result.skipped);

    if (result.config.exchange !== current.exchange) {
      this.reject(
        new ConfigError(
          `exchange cannot change while running (${current.exchange} -> ${result.config.exchange}); restart required`
        )
      );
      return null;
    }

    if (sameSymbols(result.config.symbols, current.symbols)) {
      this.metricsCollector?.incrementConfigReload('unchanged');
      return null;
    }

    this.current = result.config;
    this.metricsCollector?.incrementConfigReload('applied');
    this.logger.info('Config changed', { symbols: [...result.config.symbols] });
    return result.config;
  }

  private reject(error: ConfigError): void {
    this.logger.error('Config rejected; keeping previous config', { path: this.path, err: error });
    this.metricsCollector?.incrementError('config_error');
    this.metricsCollector?.incrementConfigReload('rejected');
  }

  private reportSkipped(skipped: readonly string[]): void {
    for (const ticker of skipped) {
      this.logger.warn('Invalid symbol format; skipped', { ticker });
    }
  }
}
