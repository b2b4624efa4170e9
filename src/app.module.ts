import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';
import { ScheduleModule } from '@nestjs/schedule';
import appConfig from './common/utils/app.config';
import { CommonModule } from './common/common.module';
import { RegionModule } from './region/region.module';
import { SnapshotsModule } from './snapshots/snapshots.module';
import { SNAPSHOT_ENTITIES } from './snapshots/entities';
import { StatisticsModule } from './statistics/statistics.module';
import { ChartsModule } from './charts/charts.module';
import { WeatherModule } from './weather/weather.module';
import { ConsolidationModule } from './consolidation/consolidation.module';
import { CollectorModule } from './collector/collector.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),
    // Global rate limiting - 100 requests per minute
    ThrottlerModule.forRoot([{
      ttl: 60000,
      limit: 100,
    }]),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService) => ({
        type: 'sqlite',
        database: config.get<string>('database.path') ?? ':memory:',
        entities: SNAPSHOT_ENTITIES,
        synchronize: true,
      }),
      inject: [ConfigService],
    }),
    ScheduleModule.forRoot(),
    CommonModule,
    RegionModule,
    SnapshotsModule,
    StatisticsModule,
    ChartsModule,
    WeatherModule,
    ConsolidationModule,
    CollectorModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
