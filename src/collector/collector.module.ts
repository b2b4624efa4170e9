import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConsolidationModule } from '../consolidation/consolidation.module';
import { NetworkCollectorService } from './network-collector.service';

@Module({
  imports: [HttpModule, ConsolidationModule],
  providers: [NetworkCollectorService],
})
export class CollectorModule {}
