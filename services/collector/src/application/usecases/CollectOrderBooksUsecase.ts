import type { ConfigSource } from '@/application/interfaces/ConfigSource';
import type { Logger } from '@/application/interfaces/Logger';
import type { Orchestrator } from '@/application/services/Orchestrator';

/**
 * アプリケーション層: 板収集ユースケース
 *
 * 責務: 設定の変更を Orchestrator に流し込む司令塔。signal が中断されるまで続き、最後に全 Collector を止める。
 */
export class CollectOrderBooksUsecase {
  constructor(
    private readonly configSource: ConfigSource,
    private readonly orchestrator: Orchestrator,
    private readonly logger: Logger
  ) {}

  async execute(signal: AbortSignal): Promise<void> {
    this.logger.info('Collection started');
    await this.orchestrator.run(this.configSource.watch(signal), signal);
    this.logger.info('Collection finished');
  }
}
