import { Module } from '@nestjs/common';
import { SnapshotsModule } from '../snapshots/snapshots.module';
import { JsonChartRenderer } from './chart-renderer';
import { ChartSeriesService } from './chart-series.service';
import { CHART_RENDERER } from './chart.constants';

@Module({
  imports: [SnapshotsModule],
  providers: [ChartSeriesService, { provide: CHART_RENDERER, useClass: JsonChartRenderer }],
  exports: [ChartSeriesService],
})
export class ChartsModule {}
