import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Mutex } from 'async-mutex';
import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from '../common/utils/errors';
import {
  DAY_MS,
  formatUtcDayMonth,
  formatUtcTime,
  HOUR_MS,
  startOfUtcDay,
  startOfUtcMonth,
  startOfUtcWeek,
  utcDateKey,
} from '../common/utils/time';
import { SnapshotStoreService } from '../snapshots/snapshot-store.service';
import { Partition } from '../snapshots/types';
import { ChartRenderer, ChartSeries } from './chart-renderer';
import {
  CHART_COLORS,
  CHART_RENDERER,
  ChartColors,
  ChartWindow,
  REALTIME_LOOKBACK_HOURS,
} from './chart.constants';
import { TtlCache } from './ttl-cache';

const DEFAULT_TTL_SECONDS = 60;
const DEFAULT_SWEEP_SECONDS = 300;

const WINDOW_PARTITIONS: Record<ChartWindow, Partition> = {
  realtime: 'short',
  daily: 'short',
  weekly: 'medium',
  monthly: 'long',
};

@Injectable()
export class ChartSeriesService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ChartSeriesService.name);
  private readonly ttlMs: number;
  private readonly outputDir: string;
  private readonly series: TtlCache<ChartSeries>;
  private readonly artifacts: TtlCache<string | null>;
  private readonly renderMutex = new Mutex();
  private sweepInterval?: NodeJS.Timeout;

  constructor(
    private readonly store: SnapshotStoreService,
    private readonly config: ConfigService,
    @Inject(CHART_RENDERER) private readonly renderer: ChartRenderer,
  ) {
    this.ttlMs = (this.config.get<number>('charts.cache_ttl_seconds') ?? DEFAULT_TTL_SECONDS) * 1000;
    this.outputDir = this.config.get<string>('charts.output_dir') ?? './charts';
    this.series = new TtlCache<ChartSeries>(this.ttlMs);
    this.artifacts = new TtlCache<string | null>(this.ttlMs);
  }

  onModuleInit() {
    const sweepMs =
      (this.config.get<number>('charts.sweep_interval_seconds') ?? DEFAULT_SWEEP_SECONDS) * 1000;
    this.sweepInterval = setInterval(() => {
      this.sweep().catch((error) => {
        this.logger.error(`[CHARTS] Cache sweep failed: ${errorMessage(error)}`);
      });
    }, sweepMs);
  }

  onModuleDestroy() {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
    }
  }

  /** Chart-ready series for a window, served from cache within the TTL. */
  getChartSeries(window: ChartWindow): Promise<ChartSeries> {
    return this.series.getOrCompute(window, () => this.buildSeries(window, new Date()));
  }

  /**
   * Path of the rendered artifact for a window, or null when there is
   * nothing to draw. A cached artifact is reused while its file exists, and
   * concurrent requests for the same artifact share one render.
   */
  renderChart(
    window: ChartWindow,
    artifactName: string,
    colors: Partial<ChartColors> = {},
  ): Promise<string | null> {
    const key = [window, artifactName, colors.primary ?? '', colors.secondary ?? ''].join('|');
    const cached = this.artifacts.get(key);
    if (cached !== undefined && cached !== null && !fs.existsSync(cached)) {
      this.artifacts.delete(key);
    }
    return this.artifacts.getOrCompute(key, () => this.render(window, artifactName, colors));
  }

  /** Drops entries older than twice the TTL and deletes their artifact files. */
  async sweep(): Promise<number> {
    const maxAge = this.ttlMs * 2;
    this.series.evictOlderThan(maxAge);
    const stale = this.artifacts
      .evictOlderThan(maxAge)
      .filter((file): file is string => file !== null);
    for (const file of stale) {
      await fs.promises.rm(file, { force: true });
    }
    if (stale.length > 0) {
      this.logger.log(`[CHARTS] Evicted ${stale.length} cached chart(s)`);
    }
    return stale.length;
  }

  private async render(
    window: ChartWindow,
    artifactName: string,
    colors: Partial<ChartColors>,
  ): Promise<string | null> {
    const series = padSeries(await this.getChartSeries(window));
    if (series.labels.length === 0) {
      return null;
    }

    const output = path.join(this.outputDir, `${artifactName}${this.renderer.extension}`);
    const resolved = resolveColors(window, series, colors);

    // One renderer at a time, whatever the artifact
    await this.renderMutex.runExclusive(() =>
      this.renderer.render({ window, series, colors: resolved, output }),
    );
    this.logger.debug(`[CHARTS] Rendered ${window} chart to ${output}`);
    return output;
  }

  private async buildSeries(window: ChartWindow, now: Date): Promise<ChartSeries> {
    const partition = WINDOW_PARTITIONS[window];
    switch (window) {
      case 'realtime':
        return this.perSampleSeries(partition, new Date(now.getTime() - REALTIME_LOOKBACK_HOURS * HOUR_MS), now);
      case 'daily':
        return this.perSampleSeries(partition, startOfUtcDay(now), now);
      case 'weekly':
        return this.perDaySeries(partition, startOfUtcWeek(now), now);
      case 'monthly':
        return this.perDaySeries(partition, startOfUtcMonth(now), now);
    }
  }

  private async perSampleSeries(partition: Partition, start: Date, now: Date): Promise<ChartSeries> {
    const points = await this.store.perSampleCounts(partition, start);
    if (points.length > 0) {
      return {
        labels: points.map((p) => formatUtcTime(p.timestamp)),
        participantCounts: points.map((p) => p.flights),
        controllerCounts: points.map((p) => p.sessions),
      };
    }

    // Nothing in the window yet: flat line from the last known sample
    const latest = await this.store.latest('short');
    const participants = latest?.flights.length ?? 0;
    const controllers = latest?.sessions.length ?? 0;
    return {
      labels: [formatUtcTime(start), formatUtcTime(now)],
      participantCounts: [participants, participants],
      controllerCounts: [controllers, controllers],
    };
  }

  private async perDaySeries(partition: Partition, start: Date, now: Date): Promise<ChartSeries> {
    const rows = await this.store.perDayCounts(partition, start);
    if (rows.length === 0) {
      return { labels: [], participantCounts: [], controllerCounts: [] };
    }

    const byDay = new Map(rows.map((row) => [row.day, row]));
    const series: ChartSeries = { labels: [], participantCounts: [], controllerCounts: [] };
    const today = startOfUtcDay(now).getTime();
    for (let day = start.getTime(); day <= today; day += DAY_MS) {
      const date = new Date(day);
      const row = byDay.get(utcDateKey(date));
      series.labels.push(formatUtcDayMonth(date));
      series.participantCounts.push(row?.pilots ?? 0);
      series.controllerCounts.push(row?.controllers ?? 0);
    }
    return series;
  }
}

/** A single point is repeated so the series always spans two points. */
export function padSeries(series: ChartSeries): ChartSeries {
  if (series.labels.length !== 1) {
    return series;
  }
  return {
    labels: [series.labels[0], series.labels[0]],
    participantCounts: [series.participantCounts[0], series.participantCounts[0]],
    controllerCounts: [series.controllerCounts[0], series.controllerCounts[0]],
  };
}

export function resolveColors(
  window: ChartWindow,
  series: ChartSeries,
  overrides: Partial<ChartColors>,
): ChartColors {
  let defaults: ChartColors;
  if (window === 'realtime') {
    const lastControllers = series.controllerCounts[series.controllerCounts.length - 1] ?? 0;
    defaults =
      lastControllers > 0 ? CHART_COLORS.realtimeControllersActive : CHART_COLORS.realtimeNoControllers;
  } else {
    defaults = CHART_COLORS[window];
  }
  return {
    primary: overrides.primary || defaults.primary,
    secondary: overrides.secondary || defaults.secondary,
  };
}
