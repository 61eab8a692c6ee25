/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Factory for the chunk store, image index and response cache
 * Implements Factory Pattern for storage backend selection
 *
 * @packageDocumentation
 */

import IORedis from 'ioredis';
import type { Logger } from 'winston';
import { IChunkStore, IImageIndex, IResponseCache } from '../interfaces';
import { ConfigService } from './ConfigService';
import { ImageClassifier } from './ImageClassifier';
import { ImageRanker } from './ImageRanker';
import { InMemoryChunkStore } from './InMemoryChunkStore';
import { InMemoryImageIndex } from './InMemoryImageIndex';
import { createPgPool, PgChunkStore } from './PgChunkStore';
import { PgImageIndex } from './PgImageIndex';
import { InMemoryResponseCache, RedisResponseCache } from './ResponseCache';

/**
 * Storage backends of one deployment
 */
export interface ManualRagStores {
  chunkStore: IChunkStore;
  imageIndex: IImageIndex;
  responseCache?: IResponseCache;
  /** Whether the backing database answers */
  healthCheck(): Promise<boolean>;
  /** Release pooled connections */
  close(): Promise<void>;
}

/**
 * Usage:
 * ```typescript
 * const stores = await StoreFactory.create(configService, logger);
 * ```
 */
export class StoreFactory {
  /**
   * Create and initialize the configured stores.
   * A PostgreSQL store that cannot be reached fails with StoreUnavailableError.
   */
  static async create(config: ConfigService, logger: Logger): Promise<ManualRagStores> {
    const settings = config.getConfig();
    const classifier = new ImageClassifier(settings.keywords);
    const ranker = new ImageRanker({ ...settings.images, stopWords: settings.keywords.stopWords });
    const responseCache = StoreFactory.createCache(config, logger);

    logger.info(`Creating stores: ${settings.store.type}, cache: ${settings.cache.type}`);

    switch (settings.store.type) {
      case 'postgresql': {
        const pgConfig = config.getPostgresConfig();
        const pool = createPgPool(pgConfig, logger);
        const chunkStore = new PgChunkStore(logger, pgConfig, pool);
        await chunkStore.migrate();
        await chunkStore.initialize();
        logger.info('PostgreSQL stores initialized successfully');

        return {
          chunkStore,
          imageIndex: new PgImageIndex(logger, pgConfig, classifier, ranker, pool),
          responseCache: responseCache?.cache,
          healthCheck: () => chunkStore.healthCheck(),
          close: async () => {
            await responseCache?.close();
            await chunkStore.close();
          },
        };
      }

      case 'memory':
      default: {
        logger.info('Using in-memory stores');
        return {
          chunkStore: new InMemoryChunkStore(logger),
          imageIndex: new InMemoryImageIndex(logger, classifier, ranker),
          responseCache: responseCache?.cache,
          healthCheck: async () => true,
          close: async () => {
            await responseCache?.close();
          },
        };
      }
    }
  }

  private static createCache(
    config: ConfigService,
    logger: Logger
  ): { cache: IResponseCache; close(): Promise<void> } | undefined {
    const { cache } = config.getConfig();

    switch (cache.type) {
      case 'redis': {
        const redis = new IORedis(cache.redisUrl ?? 'redis://localhost:6379', {
          maxRetriesPerRequest: 1,
          lazyConnect: true,
        });
        redis.on('error', (error: Error) => logger.warn(`Redis cache error: ${error.message}`));
        return {
          cache: new RedisResponseCache(redis, logger),
          close: async () => {
            await redis.quit();
          },
        };
      }
      case 'memory':
        return {
          cache: new InMemoryResponseCache(cache.maxEntries),
          close: async () => undefined,
        };
      default:
        return undefined;
    }
  }
}
