import type { Logger } from '@/application/interfaces/Logger';
import { PinoLogger, type PinoLoggerOptions } from './PinoLogger';

/**
 * ロガーファクトリー
 *
 * アプリケーション全体で同じルートロガーを使い、コンポーネントごとに child() で文脈を付与する。
 * configure() より前に create() された場合は環境変数 `LOG_LEVEL` / `NODE_ENV` から作る。
 */
class LoggerFactory {
  private static instance: Logger | null = null;
  private static options: PinoLoggerOptions | null = null;

  /**
   * 検証済みの設定でルートロガーを作り直す。起動直後に一度だけ呼ぶ。
   */
  static configure(options: PinoLoggerOptions): Logger {
    LoggerFactory.options = options;
    LoggerFactory.instance = new PinoLogger(options);
    return LoggerFactory.instance;
  }

  static create(): Logger {
    if (LoggerFactory.instance === null) {
      LoggerFactory.instance = new PinoLogger(
        LoggerFactory.options ?? {
          level: process.env.LOG_LEVEL,
          pretty: process.env.NODE_ENV !== 'production',
        }
      );
    }

    return LoggerFactory.instance;
  }

  /**
   * component を付与した子ロガーを返す。
   */
  static forComponent(component: string, bindings: object = {}): Logger {
    return LoggerFactory.create().child({ component, ...bindings });
  }

  /**
   * ロガーインスタンスをリセット（主にテスト用）
   */
  static reset(): void {
    LoggerFactory.instance = null;
    LoggerFactory.options = null;
  }
}

export { LoggerFactory };
