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
 * In-memory chunk store implementation
 * Provides chunk storage and similarity search capabilities
 * 
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { ChunkFilter, IChunkStore } from '../interfaces';
import { Chunk, ChunkStoreStats, ScoredChunk } from '../models';
import { InvalidParametersError } from '../errors';
import { clampScore, compareScoredChunks, cosineSimilarity } from '../utils/vector';

/**
 * In-memory chunk store using cosine similarity
 * Follows Single Responsibility Principle
 * 
 * Note: For production use, switch the store type to postgresql
 */
export class InMemoryChunkStore implements IChunkStore {
  private readonly logger: Logger;
  private readonly chunks: Map<string, Chunk> = new Map();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async upsertChunk(chunk: Chunk): Promise<boolean> {
    if (this.chunks.has(chunk.id)) {
      this.logger.debug(`Chunk already stored: ${chunk.id}`);
      return false;
    }

    this.chunks.set(chunk.id, { ...chunk });
    this.logger.debug(`Stored chunk: ${chunk.id}`);
    return true;
  }

  async attachEmbedding(chunkId: string, vector: number[]): Promise<void> {
    const chunk = this.chunks.get(chunkId);
    if (!chunk) {
      throw new InvalidParametersError(`Unknown chunk: ${chunkId}`);
    }

    chunk.embedding = [...vector];
    this.logger.debug(`Attached embedding to chunk: ${chunkId}`);
  }

  async attachEmbeddings(entries: Array<{ chunkId: string; vector: number[] }>): Promise<void> {
    // a batch with an unknown id writes nothing
    const missing = entries.find(entry => !this.chunks.has(entry.chunkId));
    if (missing) {
      throw new InvalidParametersError(`Unknown chunk: ${missing.chunkId}`);
    }

    for (const entry of entries) {
      await this.attachEmbedding(entry.chunkId, entry.vector);
    }
    this.logger.info(`Attached batch of ${entries.length} embeddings`);
  }

  async getChunk(chunkId: string): Promise<Chunk | null> {
    const chunk = this.chunks.get(chunkId);
    return chunk ? { ...chunk } : null;
  }

  async listChunks(filter: ChunkFilter = {}): Promise<Chunk[]> {
    return Array.from(this.chunks.values())
      .filter(chunk => filter.source === undefined || chunk.source === filter.source)
      .filter(chunk => filter.pageNumber === undefined || chunk.pageNumber === filter.pageNumber)
      .map(chunk => ({ ...chunk }));
  }

  async listPendingChunks(limit: number): Promise<Chunk[]> {
    return Array.from(this.chunks.values())
      .filter(chunk => chunk.embedding === undefined)
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .slice(0, limit)
      .map(chunk => ({ ...chunk }));
  }

  async searchSimilar(queryVector: number[], threshold: number, limit: number): Promise<ScoredChunk[]> {
    const results: ScoredChunk[] = [];

    for (const chunk of this.chunks.values()) {
      // chunks without embeddings are not searchable yet
      if (!chunk.embedding) {
        continue;
      }
      if (chunk.embedding.length !== queryVector.length) {
        this.logger.debug(`Skipping chunk ${chunk.id}: embedding dimension ${chunk.embedding.length}`);
        continue;
      }

      const similarity = clampScore(cosineSimilarity(queryVector, chunk.embedding));
      if (similarity >= threshold) {
        results.push({ chunk: { ...chunk }, similarity });
      }
    }

    results.sort(compareScoredChunks);
    const topResults = results.slice(0, limit);

    this.logger.info(`Found ${topResults.length} chunks above threshold ${threshold}`);
    return topResults;
  }

  async getStats(): Promise<ChunkStoreStats> {
    const sources = new Set<string>();
    let embeddedChunks = 0;

    for (const chunk of this.chunks.values()) {
      sources.add(chunk.source);
      if (chunk.embedding) {
        embeddedChunks++;
      }
    }

    const totalChunks = this.chunks.size;
    return {
      totalChunks,
      embeddedChunks,
      coverage: totalChunks === 0 ? 0 : embeddedChunks / totalChunks,
      sources: sources.size,
    };
  }

  async clear(): Promise<void> {
    const count = this.chunks.size;
    this.chunks.clear();
    this.logger.info(`Cleared ${count} chunks from store`);
  }
}
