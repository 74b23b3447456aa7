import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { DiffService } from './diff.service';

@Module({
  imports: [StorageModule],
  providers: [DiffService],
  exports: [DiffService],
})
export class DiffModule {}
