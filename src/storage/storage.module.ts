import { Inject, Module, OnModuleDestroy } from '@nestjs/common';
import { SNAPSHOT_STORE, SnapshotStorePort } from '../common/interfaces/snapshot-store-port.interface';
import { SnapshotStoreFactory } from './factory/snapshot-store.factory';

@Module({
  providers: [
    SnapshotStoreFactory,
    {
      provide: SNAPSHOT_STORE,
      useFactory: async (factory: SnapshotStoreFactory) => factory.createSnapshotStore(),
      inject: [SnapshotStoreFactory],
    },
  ],
  exports: [SNAPSHOT_STORE],
})
export class StorageModule implements OnModuleDestroy {
  constructor(@Inject(SNAPSHOT_STORE) private readonly store: SnapshotStorePort) {}

  async onModuleDestroy() {
    if (this.store.isReady()) {
      await this.store.close();
    }
  }
}
