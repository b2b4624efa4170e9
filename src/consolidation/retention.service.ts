import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import { errorMessage } from '../common/utils/errors';
import { ConsolidationService } from './consolidation.service';

/**
 * Window boundaries, in UTC. The short window is pruned just before midnight
 * so the daily report still sees the whole day.
 */
@Injectable()
export class RetentionService {
  private readonly logger = new Logger(RetentionService.name);

  constructor(
    private readonly consolidation: ConsolidationService,
    private readonly config: ConfigService,
  ) {}

  @Cron('0 59 23 * * *', { name: 'prune-short-window', timeZone: 'UTC' })
  async pruneShortWindow(): Promise<void> {
    await this.run('short window prune', () => this.consolidation.pruneShortWindow());
  }

  @Cron('0 0 0 * * 1', { name: 'reset-medium-window', timeZone: 'UTC' })
  async resetMediumWindow(): Promise<void> {
    await this.run('medium window reset', () => this.consolidation.resetMediumWindow());
  }

  @Cron('0 0 0 1 * *', { name: 'reset-long-window', timeZone: 'UTC' })
  async resetLongWindow(): Promise<void> {
    await this.run('long window reset', () => this.consolidation.resetLongWindow());
  }

  private async run(job: string, task: () => Promise<unknown>): Promise<void> {
    if (this.config.get<boolean>('retention.enabled') === false) {
      this.logger.log(`[RETENTION] Disabled, skipping ${job}`);
      return;
    }
    try {
      await task();
    } catch (error) {
      this.logger.error(`[RETENTION] ${job} failed: ${errorMessage(error)}`);
    }
  }
}
