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
 * Query service implementation
 * Answers questions through the retrieval and consolidation pipeline
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IChunkStore, IConfigService, IImageIndex, IResponseCache, QueryServiceDependencies } from '../interfaces';
import {
  AnswerOptions,
  ChunkStoreStats,
  DEFAULT_SKILL_LEVEL,
  ImageIndexStats,
  RetrievalParams,
  StructuredResponse,
} from '../models';
import { ErrorCode, getErrorMessage, InvalidParametersError, isRagError } from '../errors';
import { IResponseConsolidator, IRetrievalOrchestrator } from '../rag/types';
import { RetrievalOrchestrator, validateRetrievalParams } from '../rag/RetrievalOrchestrator';
import { ResponseConsolidator } from '../rag/ResponseConsolidator';
import { throwIfAborted } from '../utils/async';
import { ImageRanker } from './ImageRanker';
import { IntentDetector } from './IntentDetector';
import { buildCacheKey } from './ResponseCache';
import { SafetyClassifier } from './SafetyClassifier';
import { SimilaritySearchEngine } from './SimilaritySearchEngine';

export const MAX_BATCH_QUERIES = 10;

export type BatchAnswerEntry =
  | { query: string; success: true; response: StructuredResponse }
  | { query: string; success: false; error: string; code: ErrorCode | null };

export interface QueryServiceStats {
  chunks: ChunkStoreStats;
  images: ImageIndexStats;
  cachedResponses: number | null;
}

/**
 * Read-only entry point of the pipeline: queries never write to the stores
 */
export class QueryService {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly chunkStore: IChunkStore;
  private readonly imageIndex: IImageIndex;
  private readonly responseCache?: IResponseCache;
  private readonly orchestrator: IRetrievalOrchestrator;
  private readonly consolidator: IResponseConsolidator;

  constructor(dependencies: QueryServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.chunkStore = dependencies.chunkStore;
    this.imageIndex = dependencies.imageIndex;
    this.responseCache = dependencies.responseCache;

    const config = this.configService.getConfig();
    this.orchestrator = new RetrievalOrchestrator({
      logger: this.logger,
      config: this.configService,
      embeddingProvider: dependencies.embeddingProvider,
      searchEngine: new SimilaritySearchEngine(this.chunkStore, this.logger),
      imageIndex: this.imageIndex,
      imageRanker: new ImageRanker({ ...config.images, stopWords: config.keywords.stopWords }),
    });
    this.consolidator = new ResponseConsolidator({
      logger: this.logger,
      config: this.configService,
      safetyClassifier: new SafetyClassifier(config.keywords.safety),
      intentDetector: new IntentDetector(config.keywords.intents),
      generativeModel: dependencies.generativeModel,
    });
  }

  /**
   * Answer a question from the indexed manuals
   */
  async answer(queryText: string, options: AnswerOptions = {}, signal?: AbortSignal): Promise<StructuredResponse> {
    const startedAt = Date.now();
    const params = this.resolveParams(options);
    const skillLevel = options.skillLevel ?? DEFAULT_SKILL_LEVEL;
    validateRetrievalParams(queryText, params);
    throwIfAborted(signal);

    const cacheKey = buildCacheKey(queryText, params, skillLevel);
    const cached = await this.readCache(cacheKey);
    if (cached) {
      this.logger.info('Serving cached response');
      return cached;
    }

    const result = await this.orchestrator.retrieve(queryText, params, signal);
    const response = await this.consolidator.consolidate(result, { startedAt, skillLevel }, signal);

    // only complete answers are cached
    if (!response.fallbackUsed && !response.imagesOmitted) {
      await this.writeCache(cacheKey, response);
    }

    this.logger.info(
      `Answered query with ${response.chunksFound} chunks in ${response.processingTimeMs}ms (fallback: ${response.fallbackUsed})`
    );
    return response;
  }

  /**
   * Answer up to ten questions; each entry reports its own success or error
   */
  async answerBatch(queries: string[], options: AnswerOptions = {}, signal?: AbortSignal): Promise<BatchAnswerEntry[]> {
    if (queries.length === 0 || queries.length > MAX_BATCH_QUERIES) {
      throw new InvalidParametersError(
        `A batch must contain between 1 and ${MAX_BATCH_QUERIES} queries (got ${queries.length})`
      );
    }

    const entries = await Promise.all(
      queries.map(async (query): Promise<BatchAnswerEntry> => {
        try {
          const response = await this.answer(query, options, signal);
          return { query, success: true, response };
        } catch (error) {
          this.logger.warn(`Batch query failed: ${getErrorMessage(error)}`);
          return {
            query,
            success: false,
            error: getErrorMessage(error),
            code: isRagError(error) ? error.code : null,
          };
        }
      })
    );

    throwIfAborted(signal);
    return entries;
  }

  async getStats(): Promise<QueryServiceStats> {
    const [chunks, images] = await Promise.all([this.chunkStore.getStats(), this.imageIndex.getStats()]);
    const cachedResponses = this.responseCache ? await this.responseCache.size() : null;
    return { chunks, images, cachedResponses };
  }

  private resolveParams(options: AnswerOptions): RetrievalParams {
    const defaults = this.configService.getConfig().retrieval;
    return {
      topK: options.topK ?? defaults.topK,
      similarityThreshold: options.similarityThreshold ?? defaults.similarityThreshold,
      includeImages: options.includeImages ?? defaults.includeImages,
      maxImages: options.maxImages ?? defaults.maxImages,
    };
  }

  private async readCache(key: string): Promise<StructuredResponse | null> {
    if (!this.responseCache) {
      return null;
    }
    try {
      return await this.responseCache.get(key);
    } catch (error) {
      this.logger.warn(`Response cache read failed: ${getErrorMessage(error)}`);
      return null;
    }
  }

  private async writeCache(key: string, response: StructuredResponse): Promise<void> {
    if (!this.responseCache) {
      return;
    }
    try {
      await this.responseCache.set(key, response, this.configService.getConfig().cache.ttlSeconds);
    } catch (error) {
      this.logger.warn(`Response cache write failed: ${getErrorMessage(error)}`);
    }
  }
}
