import { Module } from '@nestjs/common';
import { CollectorModule } from '../collector/collector.module';
import { StorageModule } from '../storage/storage.module';
import { SnapshotService } from './snapshot.service';

@Module({
  imports: [StorageModule, CollectorModule],
  providers: [SnapshotService],
  exports: [SnapshotService],
})
export class SnapshotModule {}
