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
 * Retrieval orchestration: embedding, text search and image lookup
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IConfigService, IEmbeddingProvider, IImageIndex } from '../interfaces';
import { PageRef, QueryResult, RankedImage, RetrievalParams, ScoredChunk } from '../models';
import { EmbeddingUnavailableError, getErrorMessage, InvalidParametersError, isRagError } from '../errors';
import { ImageRanker, pageKey } from '../services/ImageRanker';
import { maxSafetyLevel } from '../services/SafetyClassifier';
import { SimilaritySearchEngine, validateSearchParams } from '../services/SimilaritySearchEngine';
import { throwIfAborted, withTimeout } from '../utils/async';
import { deduplicateChunks } from './deduplication';
import { IRetrievalOrchestrator, RetrievalDependencies } from './types';

/** Extra text candidates fetched so deduplication can still fill topK */
const CANDIDATE_FACTOR = 3;
/** Extra image candidates fetched before page-correlated re-ranking */
const IMAGE_CANDIDATE_FACTOR = 5;

interface ImageOutcome {
  images: RankedImage[];
  error?: string;
}

/**
 * Reject a malformed request before any external call
 */
export function validateRetrievalParams(queryText: string, params: RetrievalParams): void {
  if (queryText.trim().length === 0) {
    throw new InvalidParametersError('Query text must not be empty');
  }
  validateSearchParams(params.topK, params.similarityThreshold);
  if (!Number.isInteger(params.maxImages) || params.maxImages < 0) {
    throw new InvalidParametersError(`maxImages must be an integer >= 0 (got ${params.maxImages})`);
  }
}

/**
 * Pages the ranked chunks came from, in rank order without repeats
 */
export function correlatedPages(chunks: ScoredChunk[]): PageRef[] {
  const seen = new Set<string>();
  const pages: PageRef[] = [];
  for (const { chunk } of chunks) {
    const key = pageKey(chunk.source, chunk.pageNumber);
    if (!seen.has(key)) {
      seen.add(key);
      pages.push({ source: chunk.source, pageNumber: chunk.pageNumber });
    }
  }
  return pages;
}

/**
 * Text search and image lookup run concurrently. An image failure never
 * fails the request: it is logged and reported on the result.
 */
export class RetrievalOrchestrator implements IRetrievalOrchestrator {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly embeddingProvider: IEmbeddingProvider;
  private readonly searchEngine: SimilaritySearchEngine;
  private readonly imageIndex: IImageIndex;
  private readonly imageRanker: ImageRanker;

  constructor(dependencies: RetrievalDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.embeddingProvider = dependencies.embeddingProvider;
    this.searchEngine = dependencies.searchEngine;
    this.imageIndex = dependencies.imageIndex;
    this.imageRanker = dependencies.imageRanker;
  }

  async retrieve(queryText: string, params: RetrievalParams, signal?: AbortSignal): Promise<QueryResult> {
    validateRetrievalParams(queryText, params);
    throwIfAborted(signal);

    const config = this.configService.getConfig();
    const wantImages = params.includeImages && params.maxImages > 0;

    const imageLookup: Promise<ImageOutcome> = wantImages
      ? this.searchImages(queryText, params.maxImages * IMAGE_CANDIDATE_FACTOR, signal)
      : Promise.resolve({ images: [] });

    const [textChunks, imageOutcome] = await Promise.all([
      this.searchText(queryText, params, signal),
      imageLookup,
    ]);

    const chunks = deduplicateChunks(textChunks, config.retrieval.dedupThreshold).slice(0, params.topK);
    const images = wantImages
      ? this.imageRanker.rank(
          imageOutcome.images.map(candidate => candidate.image),
          queryText,
          params.maxImages,
          correlatedPages(chunks)
        )
      : [];

    this.logger.info(
      `Retrieved ${chunks.length} chunks (threshold ${params.similarityThreshold}) and ${images.length} images`
    );

    return {
      queryText,
      chunks,
      images,
      ...(imageOutcome.error !== undefined ? { imageError: imageOutcome.error } : {}),
      safetyLevel: maxSafetyLevel(...chunks.map(({ chunk }) => chunk.safetyLevel)),
      fallbackEligible: chunks.length === 0,
      params,
    };
  }

  private async searchText(queryText: string, params: RetrievalParams, signal?: AbortSignal): Promise<ScoredChunk[]> {
    const queryVector = await this.embedQuery(queryText, signal);
    throwIfAborted(signal);
    return this.searchEngine.search(queryVector, params.topK * CANDIDATE_FACTOR, params.similarityThreshold);
  }

  private async embedQuery(queryText: string, signal?: AbortSignal): Promise<number[]> {
    const { embeddingMs } = this.configService.getConfig().timeouts;

    try {
      return await withTimeout(
        'Query embedding',
        embeddingMs,
        taskSignal => this.embeddingProvider.embed(queryText, taskSignal),
        signal
      );
    } catch (error) {
      if (signal?.aborted || isRagError(error)) {
        throw error;
      }
      this.logger.error(`Query embedding failed: ${error}`);
      throw new EmbeddingUnavailableError('Embedding provider failed', error);
    }
  }

  private async searchImages(queryText: string, candidates: number, signal?: AbortSignal): Promise<ImageOutcome> {
    const { imageSearchMs } = this.configService.getConfig().timeouts;

    try {
      const images = await withTimeout(
        'Image search',
        imageSearchMs,
        () => this.imageIndex.search(queryText, { maxImages: candidates }),
        signal
      );
      return { images };
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.warn(`Image search failed, continuing without images: ${message}`);
      return { images: [], error: message };
    }
  }
}
