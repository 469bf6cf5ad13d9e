import { describe, expect, it } from 'vitest';
import { FatalStartupError } from '@/domain/errors/CollectorErrors';
import { loadAppEnv } from '@/infra/config/AppEnv';

describe('loadAppEnv', () => {
  it('未設定の変数には既定値を使う', () => {
    const env = loadAppEnv({});

    expect(env).toEqual({
      CONFIG_PATH: 'config.json',
      DATA_DIR: 'data',
      SNAPSHOT_INTERVAL_MS: 1000,
      CONFIG_POLL_INTERVAL_MS: 1000,
      RETRY_MAX_FAILURES: 5,
      RETRY_WINDOW_MS: 60000,
      RESTART_DELAY_MS: 60000,
      LOG_LEVEL: 'info',
      NODE_ENV: 'development',
    });
  });

  it('数値の変数を変換する', () => {
    const env = loadAppEnv({
      SNAPSHOT_INTERVAL_MS: '250',
      SNAPSHOT_DEPTH: '20',
      METRICS_PORT: '9464',
      RESTART_DELAY_MS: '0',
    });

    expect(env.SNAPSHOT_INTERVAL_MS).toBe(250);
    expect(env.SNAPSHOT_DEPTH).toBe(20);
    expect(env.METRICS_PORT).toBe(9464);
    expect(env.RESTART_DELAY_MS).toBe(0);
  });

  it('空文字の変数は未設定として扱う', () => {
    const env = loadAppEnv({ SNAPSHOT_DEPTH: '', REDIS_URL: '  ' });

    expect(env.SNAPSHOT_DEPTH).toBeUndefined();
    expect(env.REDIS_URL).toBeUndefined();
  });

  it.each([
    ['SNAPSHOT_INTERVAL_MS', '0'],
    ['SNAPSHOT_INTERVAL_MS', 'fast'],
    ['METRICS_PORT', '70000'],
    ['REDIS_URL', 'not a url'],
    ['LOG_LEVEL', 'verbose'],
    ['RESTART_DELAY_MS', '-1'],
  ])('%s=%s は FatalStartupError', (key, value) => {
    expect(() => loadAppEnv({ [key]: value })).toThrow(FatalStartupError);
  });
});
