import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type { MemorySnapshot } from '../../db/types/index.js';
import { MemoryStore } from './memory-store.js';

@Injectable()
export class MemoryStoreService {
  constructor(private readonly content: ContentLoaderService) {}

  /** Fresh store, or one rebuilt from a persisted snapshot. */
  create(snapshot?: MemorySnapshot): MemoryStore {
    const config = this.content.getEngineConfig().memory;
    return snapshot ? MemoryStore.fromSnapshot(config, snapshot) : new MemoryStore(config);
  }
}
