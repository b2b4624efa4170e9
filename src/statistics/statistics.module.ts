import { Module } from '@nestjs/common';
import { SnapshotsModule } from '../snapshots/snapshots.module';
import { SessionContinuityService } from './session-continuity.service';
import { StatisticsAggregatorService } from './statistics-aggregator.service';

@Module({
  imports: [SnapshotsModule],
  providers: [StatisticsAggregatorService, SessionContinuityService],
  exports: [StatisticsAggregatorService, SessionContinuityService],
})
export class StatisticsModule {}
