import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { Statistics } from '../statistics/statistics';
import { ConsolidationService } from './consolidation.service';
import { ChartArtifactQueryDto } from './dto/statistics-query.dto';
import { StatisticsController } from './statistics.controller';

describe('StatisticsController', () => {
  let controller: StatisticsController;

  const mockConsolidation = {
    getLiveStatistics: jest.fn(),
    getReport: jest.fn(),
    getControllerSessionMinutes: jest.fn(),
    getChartSeries: jest.fn(),
    renderChart: jest.fn(),
  };

  const stats = new Statistics({
    totalFlights: 4,
    domesticFlights: 2,
    outgoingFlights: 1,
    incomingFlights: 1,
    uniquePilots: 4,
    peopleOnBoard: 300,
    flightMinutes: 120,
    controlMinutes: 60,
    controllerCount: 2,
  });

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [StatisticsController],
      providers: [{ provide: ConsolidationService, useValue: mockConsolidation }],
    }).compile();

    controller = module.get<StatisticsController>(StatisticsController);
  });

  it('should return live statistics for the short partition by default', async () => {
    mockConsolidation.getLiveStatistics.mockResolvedValue(stats);

    expect(await controller.getLive({})).toBe(stats);
    expect(mockConsolidation.getLiveStatistics).toHaveBeenCalledWith('short');
  });

  it('should throw NotFoundException before the first sample', async () => {
    mockConsolidation.getLiveStatistics.mockResolvedValue(null);

    await expect(controller.getLive({ partition: 'long' })).rejects.toThrow(NotFoundException);
  });

  it('should throw NotFoundException for an empty report window', async () => {
    mockConsolidation.getReport.mockResolvedValue(null);

    await expect(controller.getReport({ window: 'weekly' })).rejects.toThrow(
      'No samples in the weekly window',
    );
  });

  it('should split the callsign list for session minutes', async () => {
    mockConsolidation.getControllerSessionMinutes.mockResolvedValue({ SCEL_TWR: 5, SCEL_APP: 0 });

    const minutes = await controller.getSessions({ callsigns: 'SCEL_TWR,scel_app' });

    expect(minutes).toEqual({ SCEL_TWR: 5, SCEL_APP: 0 });
    expect(mockConsolidation.getControllerSessionMinutes).toHaveBeenCalledWith([
      'SCEL_TWR',
      'scel_app',
    ]);
  });

  it('should return the chart series of a window', async () => {
    const series = { labels: ['00:00'], participantCounts: [1], controllerCounts: [0] };
    mockConsolidation.getChartSeries.mockResolvedValue(series);

    expect(await controller.getChart({ window: 'daily' })).toBe(series);
  });

  it('should render a chart artifact with the requested colors', async () => {
    mockConsolidation.renderChart.mockResolvedValue('/tmp/charts/daily-chart.json');

    const result = await controller.renderChart({
      window: 'daily',
      name: 'daily-chart',
      primary: '#123456',
    });

    expect(result).toEqual({ window: 'daily', path: '/tmp/charts/daily-chart.json' });
    expect(mockConsolidation.renderChart).toHaveBeenCalledWith('daily', 'daily-chart', {
      primary: '#123456',
      secondary: undefined,
    });
  });

  it('should throw NotFoundException when the chart has no points', async () => {
    mockConsolidation.renderChart.mockResolvedValue(null);

    await expect(controller.renderChart({ window: 'weekly', name: 'weekly-chart' })).rejects.toThrow(
      'No points in the weekly chart',
    );
  });

  it('should accept a well-formed artifact query', async () => {
    const query = plainToInstance(ChartArtifactQueryDto, {
      window: 'monthly',
      name: 'monthly_chart-2',
      primary: '#A1b2C3',
      secondary: '#000000',
    });

    expect(await validate(query)).toHaveLength(0);
  });

  it('should reject artifact names and colors outside the allowed forms', async () => {
    const query = plainToInstance(ChartArtifactQueryDto, {
      window: 'daily',
      name: '../etc/passwd',
      primary: 'red',
      secondary: '#12345',
    });

    const errors = await validate(query);

    expect(errors.map((error) => error.property).sort()).toEqual(['name', 'primary', 'secondary']);
  });
});
