import { Module } from '@nestjs/common';
import { ChartsModule } from '../charts/charts.module';
import { RegionModule } from '../region/region.module';
import { SnapshotsModule } from '../snapshots/snapshots.module';
import { StatisticsModule } from '../statistics/statistics.module';
import { WeatherModule } from '../weather/weather.module';
import { ConsolidationService } from './consolidation.service';
import { LiveStatisticsGateway } from './live-statistics.gateway';
import { RetentionService } from './retention.service';
import { StatisticsController } from './statistics.controller';

@Module({
  imports: [SnapshotsModule, StatisticsModule, ChartsModule, RegionModule, WeatherModule],
  controllers: [StatisticsController],
  providers: [ConsolidationService, LiveStatisticsGateway, RetentionService],
  exports: [ConsolidationService, LiveStatisticsGateway],
})
export class ConsolidationModule {}
