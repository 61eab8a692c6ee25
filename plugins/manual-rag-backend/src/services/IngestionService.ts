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
 * Ingestion service implementation
 * Stores chunks and images, and embeds pending chunks in batches
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  IChunkStore,
  IConfigService,
  IEmbeddingProvider,
  IImageIndex,
  IngestionServiceDependencies,
} from '../interfaces';
import { Chunk, ImageInput } from '../models';
import { getErrorMessage, InvalidParametersError, isRagError, ErrorCode } from '../errors';
import { throwIfAborted, withTimeout } from '../utils/async';
import { chunkIdFor } from '../utils/vector';
import { DocumentProcessor } from './DocumentProcessor';
import { SafetyClassifier } from './SafetyClassifier';

export interface EmbedPendingOptions {
  batchSize?: number;
  concurrency?: number;
  /** Stop after this many batches; unbounded when omitted */
  maxBatches?: number;
  signal?: AbortSignal;
}

export interface EmbedPendingReport {
  processed: number;
  failedBatches: number;
  failedChunkIds: string[];
  remaining: number;
}

export interface DocumentIngestionReport {
  source: string;
  chunkIds: string[];
  created: number;
}

/**
 * Validate a vector before it reaches a store
 */
export function validateVector(vector: number[]): void {
  if (vector.length === 0) {
    throw new InvalidParametersError('Embedding vector must not be empty');
  }
  if (!vector.every(value => Number.isFinite(value))) {
    throw new InvalidParametersError('Embedding vector must contain only finite numbers');
  }
}

/**
 * Write side of the pipeline.
 * Ingestion is idempotent: chunk ids derive from their content and location.
 */
export class IngestionService {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly embeddingProvider: IEmbeddingProvider;
  private readonly chunkStore: IChunkStore;
  private readonly imageIndex: IImageIndex;
  private readonly safetyClassifier: SafetyClassifier;
  private readonly documentProcessor: DocumentProcessor;

  private embeddingInProgress = false;

  constructor(dependencies: IngestionServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.embeddingProvider = dependencies.embeddingProvider;
    this.chunkStore = dependencies.chunkStore;
    this.imageIndex = dependencies.imageIndex;
    this.safetyClassifier = new SafetyClassifier(this.configService.getConfig().keywords.safety);
    this.documentProcessor = new DocumentProcessor(this.logger, this.configService);
  }

  /**
   * Store a chunk and stamp its safety level
   * @returns the stable chunk id
   */
  async ingestChunk(content: string, source: string, pageNumber: number): Promise<string> {
    const text = content.trim();
    if (text.length === 0) {
      throw new InvalidParametersError('Chunk content must not be empty');
    }
    if (source.trim().length === 0) {
      throw new InvalidParametersError('Chunk source must not be empty');
    }
    if (!Number.isInteger(pageNumber) || pageNumber < 1) {
      throw new InvalidParametersError(`pageNumber must be an integer >= 1 (got ${pageNumber})`);
    }

    const chunk: Chunk = {
      id: chunkIdFor(source, pageNumber, text),
      content: text,
      source,
      pageNumber,
      safetyLevel: this.safetyClassifier.classify(text),
      createdAt: new Date(),
    };

    const created = await this.chunkStore.upsertChunk(chunk);
    this.logger.debug(`${created ? 'Stored' : 'Kept existing'} chunk ${chunk.id} (${source} page ${pageNumber})`);
    return chunk.id;
  }

  async attachEmbedding(chunkId: string, vector: number[]): Promise<void> {
    validateVector(vector);
    await this.chunkStore.attachEmbedding(chunkId, vector);
  }

  async ingestImage(input: ImageInput): Promise<string> {
    return this.imageIndex.ingestImage(input);
  }

  /**
   * Chunk the text of each page and store every piece.
   * `pages[0]` is page 1.
   */
  async ingestDocument(source: string, pages: string[]): Promise<DocumentIngestionReport> {
    const chunkIds: string[] = [];

    for (const [index, pageText] of pages.entries()) {
      for (const piece of this.documentProcessor.chunkText(pageText)) {
        chunkIds.push(await this.ingestChunk(piece, source, index + 1));
      }
    }

    const unique = Array.from(new Set(chunkIds));
    this.logger.info(`Ingested ${unique.length} chunks from ${pages.length} pages of ${source}`);
    return { source, chunkIds: unique, created: unique.length };
  }

  /**
   * Embed chunks that have no embedding yet.
   *
   * Up to `concurrency` batches of `batchSize` chunks run at a time; each
   * batch is embedded and attached as one unit. A batch whose embedding
   * fails is logged and skipped for the rest of the run. Store failures
   * abort the run; batches already attached stay attached.
   */
  async embedPending(options: EmbedPendingOptions = {}): Promise<EmbedPendingReport> {
    const defaults = this.configService.getConfig().ingestion;
    const batchSize = options.batchSize ?? defaults.batchSize;
    const concurrency = options.concurrency ?? defaults.concurrency;
    const maxBatches = options.maxBatches ?? Number.POSITIVE_INFINITY;

    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new InvalidParametersError(`batchSize must be an integer >= 1 (got ${batchSize})`);
    }
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new InvalidParametersError(`concurrency must be an integer >= 1 (got ${concurrency})`);
    }
    if (maxBatches < 1) {
      throw new InvalidParametersError(`maxBatches must be >= 1 (got ${maxBatches})`);
    }

    if (this.embeddingInProgress) {
      this.logger.warn('Embedding already in progress, skipping');
      const stats = await this.chunkStore.getStats();
      return { processed: 0, failedBatches: 0, failedChunkIds: [], remaining: stats.totalChunks - stats.embeddedChunks };
    }

    this.embeddingInProgress = true;
    const skipped = new Set<string>();
    let processed = 0;
    let failedBatches = 0;
    let batchesRun = 0;

    try {
      while (batchesRun < maxBatches) {
        throwIfAborted(options.signal);

        const round = Math.min(concurrency, maxBatches - batchesRun);
        const pending = (await this.chunkStore.listPendingChunks(round * batchSize + skipped.size))
          .filter(chunk => !skipped.has(chunk.id))
          .slice(0, round * batchSize);

        if (pending.length === 0) {
          break;
        }

        const batches: Chunk[][] = [];
        for (let i = 0; i < pending.length; i += batchSize) {
          batches.push(pending.slice(i, i + batchSize));
        }

        const outcomes = await Promise.all(batches.map(batch => this.embedBatch(batch, options.signal)));
        batchesRun += batches.length;

        outcomes.forEach((succeeded, index) => {
          const batch = batches[index];
          if (succeeded) {
            processed += batch.length;
          } else {
            failedBatches++;
            batch.forEach(chunk => skipped.add(chunk.id));
          }
        });

        this.logger.info(`Embedded ${processed} chunks so far (${failedBatches} failed batches)`);
      }
    } finally {
      this.embeddingInProgress = false;
    }

    const stats = await this.chunkStore.getStats();
    return {
      processed,
      failedBatches,
      failedChunkIds: Array.from(skipped),
      remaining: stats.totalChunks - stats.embeddedChunks,
    };
  }

  /**
   * @returns false when the embedding provider failed for this batch
   */
  private async embedBatch(batch: Chunk[], signal?: AbortSignal): Promise<boolean> {
    const { embeddingMs } = this.configService.getConfig().timeouts;

    let vectors: number[][];
    try {
      vectors = await withTimeout(
        'Batch embedding',
        embeddingMs,
        taskSignal => this.embeddingProvider.embedBatch(batch.map(chunk => chunk.content), taskSignal),
        signal
      );
      if (vectors.length !== batch.length) {
        throw new Error(`expected ${batch.length} embeddings, got ${vectors.length}`);
      }
      vectors.forEach(validateVector);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.logger.error(`Embedding batch of ${batch.length} chunks failed: ${getErrorMessage(error)}`);
      return false;
    }

    try {
      await this.chunkStore.attachEmbeddings(
        batch.map((chunk, index) => ({ chunkId: chunk.id, vector: vectors[index] }))
      );
    } catch (error) {
      if (isRagError(error, ErrorCode.INVALID_PARAMETERS)) {
        this.logger.error(`Attaching embedding batch failed: ${error.message}`);
        return false;
      }
      throw error;
    }
    return true;
  }
}
