import process from 'node:process';
import { z } from 'zod';
import { FatalStartupError } from '@/domain/errors/CollectorErrors';
import { describeZodError } from '@/shared/zod';

const AppEnvSchema = z.object({
  CONFIG_PATH: z.string().default('config.json'),
  DATA_DIR: z.string().default('data'),
  SNAPSHOT_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  /** 未設定なら板全体を書き込む */
  SNAPSHOT_DEPTH: z.coerce.number().int().positive().optional(),
  CONFIG_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  RETRY_MAX_FAILURES: z.coerce.number().int().positive().default(5),
  RETRY_WINDOW_MS: z.coerce.number().int().positive().default(60000),
  /** 0 で自動再起動を無効化 */
  RESTART_DELAY_MS: z.coerce.number().int().nonnegative().default(60000),
  /** 未設定なら HTTP サーバーを起動しない */
  METRICS_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  /** 未設定なら Redis への配信を行わない */
  REDIS_URL: z.string().url().optional(),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  NODE_ENV: z.string().default('development'),
});

export type AppEnv = z.infer<typeof AppEnvSchema>;

/**
 * 環境変数を検証して読み込む。空文字の変数は未設定として扱う。
 * @throws {FatalStartupError} 値が不正な場合
 */
export function loadAppEnv(env: NodeJS.ProcessEnv = process.env): AppEnv {
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => {
      const [, value] = entry;
      return value !== undefined && value.trim() !== '';
    })
  );

  const parsed = AppEnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new FatalStartupError(`invalid environment: ${describeZodError(parsed.error)}`);
  }
  return parsed.data;
}
