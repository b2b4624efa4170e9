import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SNAPSHOT_ENTITIES } from './entities';
import { SnapshotStoreService } from './snapshot-store.service';

@Module({
  imports: [TypeOrmModule.forFeature(SNAPSHOT_ENTITIES)],
  providers: [SnapshotStoreService],
  exports: [SnapshotStoreService],
})
export class SnapshotsModule {}
