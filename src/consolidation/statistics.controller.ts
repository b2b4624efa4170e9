import { Controller, Get, NotFoundException, Query } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { ChartSeries } from '../charts/chart-renderer';
import { Statistics } from '../statistics/statistics';
import { ConsolidationService } from './consolidation.service';
import {
  ChartArtifactQueryDto,
  ChartQueryDto,
  LiveQueryDto,
  ReportQueryDto,
  SessionsQueryDto,
} from './dto/statistics-query.dto';

@ApiTags('statistics')
@Controller('statistics')
export class StatisticsController {
  constructor(private readonly consolidation: ConsolidationService) {}

  @Get('live')
  async getLive(@Query() query: LiveQueryDto): Promise<Statistics> {
    const stats = await this.consolidation.getLiveStatistics(query.partition ?? 'short');
    if (!stats) {
      throw new NotFoundException('No samples collected yet');
    }
    return stats;
  }

  @Get('report')
  async getReport(@Query() query: ReportQueryDto): Promise<Statistics> {
    const stats = await this.consolidation.getReport(query.window);
    if (!stats) {
      throw new NotFoundException(`No samples in the ${query.window} window`);
    }
    return stats;
  }

  /**
   * Continuous on-position minutes per controller
   */
  @Get('sessions')
  @ApiOkResponse({ description: 'Minutes keyed by uppercased callsign' })
  getSessions(@Query() query: SessionsQueryDto): Promise<Record<string, number>> {
    return this.consolidation.getControllerSessionMinutes(query.callsigns.split(','));
  }

  @Get('chart')
  getChart(@Query() query: ChartQueryDto): Promise<ChartSeries> {
    return this.consolidation.getChartSeries(query.window);
  }

  @Get('chart/artifact')
  @ApiOkResponse({ description: 'Location of the rendered chart artifact' })
  async renderChart(@Query() query: ChartArtifactQueryDto): Promise<{ window: string; path: string }> {
    const output = await this.consolidation.renderChart(query.window, query.name, {
      primary: query.primary,
      secondary: query.secondary,
    });
    if (output === null) {
      throw new NotFoundException(`No points in the ${query.window} chart`);
    }
    return { window: query.window, path: output };
  }
}
