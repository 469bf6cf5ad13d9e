import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ConfigSource } from '@/application/interfaces/ConfigSource';
import type { CollectorExit } from '@/application/services/Collector';
import { Orchestrator } from '@/application/services/Orchestrator';
import { CollectOrderBooksUsecase } from '@/application/usecases/CollectOrderBooksUsecase';
import type { CollectorConfig } from '@/domain/models/CollectorConfig';

class StaticConfigSource implements ConfigSource {
  readonly watchedWith: AbortSignal[] = [];

  constructor(private readonly configs: CollectorConfig[]) {}

  async load(): Promise<CollectorConfig> {
    const [first] = this.configs;
    if (!first) {
      throw new Error('no config');
    }
    return first;
  }

  async *watch(signal: AbortSignal): AsyncIterable<CollectorConfig> {
    this.watchedWith.push(signal);
    for (const config of this.configs) {
      yield config;
    }
  }
}

/**
 * 単体テスト: CollectOrderBooksUsecase
 */
describe('CollectOrderBooksUsecase', () => {
  let loggerMock: LoggerMock;
  let orchestrator: Orchestrator;

  beforeEach(() => {
    loggerMock = new LoggerMock();
    orchestrator = new Orchestrator({
      exchange: 'BINANCE',
      logger: loggerMock,
      createCollector: () => ({
        status: {
          symbol: 'BTC_USDT',
          health: 'streaming',
          bookState: 'CONSISTENT',
          sequence: null,
          lastError: null,
          updatesApplied: 0,
          snapshotsWritten: 0,
          lastSnapshotAt: null,
        },
        run: (signal: AbortSignal) =>
          new Promise<CollectorExit>((resolve) => {
            signal.addEventListener('abort', () => resolve({ status: 'stopped' }), { once: true });
          }),
      }),
    });
  });

  it('設定の変更を Orchestrator に渡し、終了時にすべて止める', async () => {
    const source = new StaticConfigSource([
      { exchange: 'BINANCE', symbols: new Set(['BTC_USDT']) },
      { exchange: 'BINANCE', symbols: new Set(['BTC_USDT', 'ETH_USDT']) },
    ]);
    const applySpy = vi.spyOn(orchestrator, 'apply');
    const controller = new AbortController();
    const usecase = new CollectOrderBooksUsecase(source, orchestrator, loggerMock);

    await usecase.execute(controller.signal);

    expect(source.watchedWith).toEqual([controller.signal]);
    expect(applySpy).toHaveBeenCalledTimes(2);
    expect(orchestrator.activeSymbols).toEqual([]);
    expect(loggerMock.messages('info')).toEqual([
      'Collection started',
      'Collectors reconciled',
      'Collectors reconciled',
      'Collector stop acknowledged',
      'Collector stop acknowledged',
      'All collectors stopped',
      'Collection finished',
    ]);
  });

  it('中断済みの signal では設定を反映しない', async () => {
    const source = new StaticConfigSource([{ exchange: 'BINANCE', symbols: new Set(['BTC_USDT']) }]);
    const applySpy = vi.spyOn(orchestrator, 'apply');
    const controller = new AbortController();
    controller.abort();

    await new CollectOrderBooksUsecase(source, orchestrator, loggerMock).execute(controller.signal);

    expect(applySpy).not.toHaveBeenCalled();
    expect(loggerMock.info).toHaveBeenLastCalledWith('Collection finished');
  });
});
