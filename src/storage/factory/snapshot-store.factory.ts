import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SnapshotStorePort } from '../../common/interfaces/snapshot-store-port.interface';
import { StorageConfig } from '../../config/configuration';
import { FilesystemAdapter } from '../adapters/filesystem.adapter';
import { MemoryAdapter } from '../adapters/memory.adapter';

@Injectable()
export class SnapshotStoreFactory {
  private readonly logger = new Logger(SnapshotStoreFactory.name);

  constructor(private readonly configService: ConfigService) {}

  async createSnapshotStore(): Promise<SnapshotStorePort> {
    const storageConfig = this.configService.get<StorageConfig>('storage');
    if (!storageConfig) {
      throw new Error('Storage configuration not found');
    }

    let store: SnapshotStorePort;

    switch (storageConfig.type) {
      case 'memory': {
        this.logger.debug('Using in-memory snapshot store; snapshots end with the process');
        store = new MemoryAdapter();
        break;
      }
      case 'filesystem':
      default: {
        this.logger.debug(`Using snapshot directory ${storageConfig.directory}`);
        store = new FilesystemAdapter({ directory: storageConfig.directory });
        break;
      }
    }

    await store.initialize();
    return store;
  }
}
