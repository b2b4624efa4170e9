import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SnapshotStoreService } from '../snapshots/snapshot-store.service';
import { ChartRenderRequest } from './chart-renderer';
import { ChartSeriesService, padSeries } from './chart-series.service';
import { CHART_COLORS, CHART_RENDERER } from './chart.constants';

// Wednesday
const NOW = new Date(Date.UTC(2024, 4, 8, 12, 30, 0));

describe('ChartSeriesService', () => {
  let service: ChartSeriesService;
  let outputDir: string;

  const mockStore = {
    perSampleCounts: jest.fn(),
    perDayCounts: jest.fn(),
    latest: jest.fn(),
  };

  const mockRenderer = {
    extension: '.json',
    render: jest.fn(async (request: ChartRenderRequest) => {
      fs.writeFileSync(request.output, JSON.stringify(request.series));
    }),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    jest.useFakeTimers({ now: NOW, doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'charts-'));

    const settings: Record<string, unknown> = {
      'charts.cache_ttl_seconds': 60,
      'charts.output_dir': outputDir,
    };
    const mockConfigService = { get: jest.fn((key: string) => settings[key]) };

    mockStore.perSampleCounts.mockResolvedValue([]);
    mockStore.perDayCounts.mockResolvedValue([]);
    mockStore.latest.mockResolvedValue(null);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChartSeriesService,
        { provide: SnapshotStoreService, useValue: mockStore },
        { provide: ConfigService, useValue: mockConfigService },
        { provide: CHART_RENDERER, useValue: mockRenderer },
      ],
    }).compile();

    service = module.get<ChartSeriesService>(ChartSeriesService);
  });

  afterEach(() => {
    jest.useRealTimers();
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it('should map samples of the realtime window to points', async () => {
    mockStore.perSampleCounts.mockResolvedValue([
      { sampleId: 7, timestamp: new Date(Date.UTC(2024, 4, 8, 12, 28)), flights: 10, sessions: 1 },
      { sampleId: 8, timestamp: new Date(Date.UTC(2024, 4, 8, 12, 29)), flights: 12, sessions: 2 },
    ]);

    const series = await service.getChartSeries('realtime');

    expect(series).toEqual({
      labels: ['12:28', '12:29'],
      participantCounts: [10, 12],
      controllerCounts: [1, 2],
    });
    expect(mockStore.perSampleCounts).toHaveBeenCalledWith(
      'short',
      new Date(Date.UTC(2024, 4, 7, 10, 30)),
    );
  });

  it('should draw a flat line from the last sample when the window is empty', async () => {
    mockStore.latest.mockResolvedValue({
      id: 3,
      timestamp: new Date(Date.UTC(2024, 4, 6, 23, 0)),
      flights: new Array(5).fill(null),
      sessions: new Array(2).fill(null),
    });

    const series = await service.getChartSeries('daily');

    expect(series).toEqual({
      labels: ['00:00', '12:30'],
      participantCounts: [5, 5],
      controllerCounts: [2, 2],
    });
  });

  it('should draw a flat zero line when nothing was ever stored', async () => {
    const series = await service.getChartSeries('realtime');

    expect(series).toEqual({
      labels: ['10:30', '12:30'],
      participantCounts: [0, 0],
      controllerCounts: [0, 0],
    });
  });

  it('should fill every day of the week up to today', async () => {
    mockStore.perDayCounts.mockResolvedValue([{ day: '2024-05-07', pilots: 4, controllers: 1 }]);

    const series = await service.getChartSeries('weekly');

    expect(series).toEqual({
      labels: ['06/05', '07/05', '08/05'],
      participantCounts: [0, 4, 0],
      controllerCounts: [0, 1, 0],
    });
    expect(mockStore.perDayCounts).toHaveBeenCalledWith('medium', new Date(Date.UTC(2024, 4, 6)));
  });

  it('should return an empty monthly series without rows', async () => {
    const series = await service.getChartSeries('monthly');

    expect(series).toEqual({ labels: [], participantCounts: [], controllerCounts: [] });
    expect(mockStore.perDayCounts).toHaveBeenCalledWith('long', new Date(Date.UTC(2024, 4, 1)));
    expect(mockStore.latest).not.toHaveBeenCalled();
  });

  it('should serve the cached series within the TTL and recompute after it', async () => {
    const first = await service.getChartSeries('daily');
    const second = await service.getChartSeries('daily');

    expect(second).toBe(first);
    expect(mockStore.perSampleCounts).toHaveBeenCalledTimes(1);

    jest.setSystemTime(NOW.getTime() + 61 * 1000);
    const third = await service.getChartSeries('daily');

    expect(third).not.toBe(first);
    expect(mockStore.perSampleCounts).toHaveBeenCalledTimes(2);
  });

  it('should share one computation between concurrent callers', async () => {
    const [a, b] = await Promise.all([
      service.getChartSeries('realtime'),
      service.getChartSeries('realtime'),
    ]);

    expect(a).toBe(b);
    expect(mockStore.perSampleCounts).toHaveBeenCalledTimes(1);
  });

  it('should render with default colors and reuse the artifact within the TTL', async () => {
    mockStore.perSampleCounts.mockResolvedValue([
      { sampleId: 8, timestamp: new Date(Date.UTC(2024, 4, 8, 12, 29)), flights: 12, sessions: 2 },
    ]);

    const output = await service.renderChart('realtime', 'realtime-chart');
    const again = await service.renderChart('realtime', 'realtime-chart');

    expect(output).toBe(path.join(outputDir, 'realtime-chart.json'));
    expect(again).toBe(output);
    expect(mockRenderer.render).toHaveBeenCalledTimes(1);
    expect(mockRenderer.render).toHaveBeenCalledWith({
      window: 'realtime',
      output,
      colors: CHART_COLORS.realtimeControllersActive,
      series: {
        labels: ['12:29', '12:29'],
        participantCounts: [12, 12],
        controllerCounts: [2, 2],
      },
    });
  });

  it('should render again when the cached artifact file is gone', async () => {
    const output = await service.renderChart('daily', 'daily-chart', { primary: '#123456' });
    if (!output) throw new Error('expected an artifact');
    fs.rmSync(output);

    await service.renderChart('daily', 'daily-chart', { primary: '#123456' });

    expect(mockRenderer.render).toHaveBeenCalledTimes(2);
    expect(mockRenderer.render.mock.calls[1][0].colors).toEqual({
      primary: '#123456',
      secondary: CHART_COLORS.daily.secondary,
    });
  });

  it('should share one render between concurrent requests for the same artifact', async () => {
    const outputs = await Promise.all([
      service.renderChart('daily', 'daily-chart'),
      service.renderChart('daily', 'daily-chart'),
      service.renderChart('daily', 'daily-chart'),
    ]);

    expect(outputs).toEqual([
      path.join(outputDir, 'daily-chart.json'),
      path.join(outputDir, 'daily-chart.json'),
      path.join(outputDir, 'daily-chart.json'),
    ]);
    expect(mockRenderer.render).toHaveBeenCalledTimes(1);
  });

  it('should never run two renders at once', async () => {
    let active = 0;
    let maxActive = 0;
    const slowRender = async (request: ChartRenderRequest) => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setImmediate(resolve));
      fs.writeFileSync(request.output, JSON.stringify(request.series));
      active -= 1;
    };
    mockRenderer.render.mockImplementationOnce(slowRender).mockImplementationOnce(slowRender);

    await Promise.all([
      service.renderChart('daily', 'daily-chart'),
      service.renderChart('realtime', 'realtime-chart'),
    ]);

    expect(mockRenderer.render).toHaveBeenCalledTimes(2);
    expect(maxActive).toBe(1);
  });

  it('should return null for an empty series', async () => {
    expect(await service.renderChart('weekly', 'weekly-chart')).toBeNull();
    expect(mockRenderer.render).not.toHaveBeenCalled();
  });

  it('should evict entries older than twice the TTL and delete their files', async () => {
    const output = await service.renderChart('daily', 'daily-chart');
    if (!output) throw new Error('expected an artifact');

    jest.setSystemTime(NOW.getTime() + 100 * 1000);
    expect(await service.sweep()).toBe(0);

    jest.setSystemTime(NOW.getTime() + 121 * 1000);
    expect(await service.sweep()).toBe(1);
    expect(fs.existsSync(output)).toBe(false);
  });
});

describe('padSeries', () => {
  it('should leave series of two or more points untouched', () => {
    const series = { labels: ['a', 'b'], participantCounts: [1, 2], controllerCounts: [0, 1] };

    expect(padSeries(series)).toBe(series);
  });
});
