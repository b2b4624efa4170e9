import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { Mutex } from 'async-mutex';
import { firstValueFrom } from 'rxjs';
import { errorMessage } from '../common/utils/errors';
import { ConsolidationService, IngestResult } from '../consolidation/consolidation.service';
import { LiveStatisticsGateway } from '../consolidation/live-statistics.gateway';
import { WhazzupData } from './types';
import { parseWhazzup } from './whazzup.parser';

const DEFAULT_TIMEOUT_MS = 20000;

/**
 * Samples the network once a minute: fetch, parse, ingest, then push the
 * refreshed live statistics to connected clients.
 */
@Injectable()
export class NetworkCollectorService {
  private readonly logger = new Logger(NetworkCollectorService.name);

  private readonly mutex = new Mutex();

  constructor(
    private readonly httpService: HttpService,
    private readonly config: ConfigService,
    private readonly consolidation: ConsolidationService,
    private readonly gateway: LiveStatisticsGateway,
  ) {}

  @Cron(CronExpression.EVERY_MINUTE, { name: 'network-collector' })
  async collect(): Promise<IngestResult | null> {
    if (this.config.get<boolean>('collector.enabled') === false) {
      return null;
    }
    if (this.mutex.isLocked()) {
      this.logger.warn('[COLLECTOR] Previous run still in progress, skipping');
      return null;
    }

    const release = await this.mutex.acquire();
    try {
      const url = this.config.get<string>('collector.url') ?? '';
      const response = await firstValueFrom(
        this.httpService.get<WhazzupData>(url, {
          timeout: this.config.get<number>('collector.timeout_ms') ?? DEFAULT_TIMEOUT_MS,
        }),
      );

      const { flights, sessions } = parseWhazzup(response.data);
      const timestamp = new Date();
      const result = await this.consolidation.ingest(timestamp, flights, sessions);
      this.logger.log(
        `[COLLECTOR] ${timestamp.toISOString()} | Pilots: ${result.flights}, ATCs: ${result.sessions}`,
      );

      if (result.success) {
        await this.broadcastLive(timestamp);
      }
      return result;
    } catch (err) {
      this.logger.error(`[COLLECTOR] Error collecting network data: ${errorMessage(err)}`);
      return null;
    } finally {
      release();
    }
  }

  private async broadcastLive(now: Date): Promise<void> {
    try {
      const stats = await this.consolidation.getLiveStatistics('short', now);
      if (stats) {
        this.gateway.broadcast(stats);
      }
    } catch (err) {
      this.logger.error(`[COLLECTOR] Live broadcast failed: ${errorMessage(err)}`);
    }
  }
}
