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
 * Similarity search over embedded chunks
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IChunkStore } from '../interfaces';
import { ScoredChunk } from '../models';
import { InvalidParametersError, isRagError, StoreUnavailableError } from '../errors';
import { compareScoredChunks } from '../utils/vector';

/**
 * Reject malformed search parameters before any I/O
 */
export function validateSearchParams(topK: number, similarityThreshold: number): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new InvalidParametersError(`topK must be an integer >= 1 (got ${topK})`);
  }
  if (!Number.isFinite(similarityThreshold) || similarityThreshold < 0 || similarityThreshold > 1) {
    throw new InvalidParametersError(`similarityThreshold must be within [0, 1] (got ${similarityThreshold})`);
  }
}

/**
 * Top-K cosine search over the chunks that currently have embeddings.
 * Chunks without an embedding are never returned. An empty result is a
 * valid outcome.
 */
export class SimilaritySearchEngine {
  constructor(
    private readonly store: IChunkStore,
    private readonly logger: Logger
  ) {}

  async search(queryVector: number[], topK: number, similarityThreshold: number): Promise<ScoredChunk[]> {
    validateSearchParams(topK, similarityThreshold);
    if (queryVector.length === 0) {
      throw new InvalidParametersError('Query vector is empty');
    }

    let candidates: ScoredChunk[];
    try {
      candidates = await this.store.searchSimilar(queryVector, similarityThreshold, topK);
    } catch (error) {
      if (isRagError(error)) {
        throw error;
      }
      this.logger.error(`Similarity search failed: ${error}`);
      throw new StoreUnavailableError('Chunk store unavailable during similarity search', error);
    }

    const results = candidates
      .filter(candidate => candidate.chunk.embedding !== undefined && candidate.similarity >= similarityThreshold)
      .sort(compareScoredChunks)
      .slice(0, topK);

    this.logger.debug(`Similarity search returned ${results.length}/${topK} chunks`);
    return results;
  }
}
