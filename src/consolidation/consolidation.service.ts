import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChartSeries } from '../charts/chart-renderer';
import { ChartSeriesService } from '../charts/chart-series.service';
import { ChartColors, ChartWindow } from '../charts/chart.constants';
import {
  HOUR_MS,
  startOfUtcDay,
  startOfUtcMonth,
  startOfUtcWeek,
} from '../common/utils/time';
import { involvesRegion, isInScopeController } from '../region/region-classifier';
import { RegionService } from '../region/region.service';
import { SnapshotStoreService } from '../snapshots/snapshot-store.service';
import {
  ParticipantFlight,
  ParticipantSession,
  Partition,
  PARTITIONS,
  StoreResult,
} from '../snapshots/types';
import { SessionContinuityService } from '../statistics/session-continuity.service';
import { Statistics } from '../statistics/statistics';
import { StatisticsAggregatorService } from '../statistics/statistics-aggregator.service';
import { MetarService } from '../weather/metar.service';

export const REPORT_WINDOWS = ['daily', 'weekly', 'monthly'] as const;

export type ReportWindow = (typeof REPORT_WINDOWS)[number];

export interface IngestResult extends StoreResult {
  flights: number;
  sessions: number;
}

const DEFAULT_SHORT_WINDOW_HOURS = 36;

/** Partition and start instant backing each report window. */
export function reportWindowBounds(
  window: ReportWindow,
  now: Date,
): { partition: Partition; start: Date } {
  switch (window) {
    case 'daily':
      return { partition: 'short', start: startOfUtcDay(now) };
    case 'weekly':
      return { partition: 'medium', start: startOfUtcWeek(now) };
    case 'monthly':
      return { partition: 'long', start: startOfUtcMonth(now) };
  }
}

@Injectable()
export class ConsolidationService {
  private readonly logger = new Logger(ConsolidationService.name);

  constructor(
    private readonly store: SnapshotStoreService,
    private readonly aggregator: StatisticsAggregatorService,
    private readonly continuity: SessionContinuityService,
    private readonly charts: ChartSeriesService,
    private readonly region: RegionService,
    private readonly metar: MetarService,
    private readonly config: ConfigService,
  ) {}

  /**
   * Normalizes one capture and writes it to every partition. Records without
   * a callsign or outside the region are dropped, never stored.
   */
  async ingest(
    timestamp: Date,
    flights: ParticipantFlight[],
    sessions: ParticipantSession[],
  ): Promise<IngestResult> {
    const scope = this.region.current();
    const keptFlights = flights
      .map(normalizeFlight)
      .filter((flight) => flight.callsign.length > 0 && involvesRegion(scope, flight));
    const keptSessions = sessions
      .map(normalizeSession)
      .filter((session) => session.callsign.length > 0 && isInScopeController(scope, session));

    const result = await this.store.store({
      timestamp,
      flights: keptFlights,
      sessions: keptSessions,
    });

    if (!result.success) {
      const failed = PARTITIONS.filter((partition) => !result.partitions[partition]);
      this.logger.warn(`[INGEST] Sample stored partially, failed: ${failed.join(', ')}`);
    }

    return { ...result, flights: keptFlights.length, sessions: keptSessions.length };
  }

  /**
   * Latest sample of the partition plus today's minutes. Null until the
   * partition holds a sample.
   */
  async getLiveStatistics(partition: Partition = 'short', now: Date = new Date()): Promise<Statistics | null> {
    const latest = await this.store.latest(partition);
    if (!latest) {
      return null;
    }

    const scope = this.region.current();
    const day = await this.aggregator.aggregate(partition, startOfUtcDay(now), scope);
    const live = this.aggregator.composeLive(latest, scope, day);

    const weather = await this.metar.getMetar();
    return weather ? live.with({ weather }) : live;
  }

  getWindowStatistics(partition: Partition, windowStart: Date): Promise<Statistics | null> {
    return this.aggregator.aggregate(partition, windowStart, this.region.current());
  }

  getReport(window: ReportWindow, now: Date = new Date()): Promise<Statistics | null> {
    const { partition, start } = reportWindowBounds(window, now);
    return this.getWindowStatistics(partition, start);
  }

  getControllerSessionMinutes(callsigns: string[], now: Date = new Date()): Promise<Record<string, number>> {
    return this.continuity.getSessionMinutes(callsigns, now);
  }

  getChartSeries(window: ChartWindow): Promise<ChartSeries> {
    return this.charts.getChartSeries(window);
  }

  /** Path of the rendered artifact, or null when the window has no points. */
  renderChart(
    window: ChartWindow,
    artifactName: string,
    colors: Partial<ChartColors> = {},
  ): Promise<string | null> {
    return this.charts.renderChart(window, artifactName, colors);
  }

  /** Drops short-partition samples older than the retention horizon. */
  async pruneShortWindow(now: Date = new Date()): Promise<number> {
    const hours =
      this.config.get<number>('retention.short_window_hours') ?? DEFAULT_SHORT_WINDOW_HOURS;
    const cutoff = new Date(now.getTime() - hours * HOUR_MS);
    const removed = await this.store.prune('short', cutoff);
    this.logger.log(`[RETENTION] Pruned ${removed} short-window sample(s) before ${cutoff.toISOString()}`);
    return removed;
  }

  async resetMediumWindow(): Promise<void> {
    await this.store.reset('medium');
    this.logger.log('[RETENTION] Medium window reset');
  }

  async resetLongWindow(): Promise<void> {
    await this.store.reset('long');
    this.logger.log('[RETENTION] Long window reset');
  }
}

function normalizeFlight(flight: ParticipantFlight): ParticipantFlight {
  return {
    subjectId: flight.subjectId?.trim() || null,
    callsign: flight.callsign.trim().toUpperCase(),
    departure: flight.departure.trim().toUpperCase(),
    arrival: flight.arrival.trim().toUpperCase(),
    route: flight.route.trim(),
    seats: Math.max(0, Math.floor(flight.seats)),
    aircraft: flight.aircraft.trim().toUpperCase(),
  };
}

function normalizeSession(session: ParticipantSession): ParticipantSession {
  return {
    subjectId: session.subjectId?.trim() || null,
    callsign: session.callsign.trim().toUpperCase(),
    frequency: session.frequency,
    status: session.status,
  };
}
