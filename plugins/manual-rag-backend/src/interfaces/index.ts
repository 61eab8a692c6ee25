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
 * Service interfaces following SOLID principles
 * 
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  Chunk,
  ChunkStoreStats,
  GenerationConfig,
  ImageIndexStats,
  ImageInput,
  ImageRecord,
  ManualRagConfig,
  PageRef,
  RankedImage,
  SafetyLevel,
  ScoredChunk,
  StructuredResponse,
} from '../models';

/**
 * Turns text into a vector
 * Fails with EmbeddingUnavailableError
 */
export interface IEmbeddingProvider {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;

  /**
   * Embed several texts in one call, results in input order
   */
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/**
 * Generates text from a grounding prompt
 * Fails with GenerationUnavailableError
 */
export interface IGenerativeModel {
  readonly modelName: string;

  generate(prompt: string, config: GenerationConfig, signal?: AbortSignal): Promise<string>;
}

/**
 * Filter for bulk chunk reads
 */
export interface ChunkFilter {
  source?: string;
  pageNumber?: number;
}

/**
 * Persistent chunk storage with optional embeddings
 * Single Responsibility: owns the chunk lifecycle
 */
export interface IChunkStore {
  /**
   * Insert a chunk, or keep the existing one with the same id
   * @returns true when the chunk was new
   */
  upsertChunk(chunk: Chunk): Promise<boolean>;

  /**
   * Attach (or overwrite) the embedding of an existing chunk
   */
  attachEmbedding(chunkId: string, vector: number[]): Promise<void>;

  /**
   * Attach several embeddings as one unit of work
   */
  attachEmbeddings(entries: Array<{ chunkId: string; vector: number[] }>): Promise<void>;

  getChunk(chunkId: string): Promise<Chunk | null>;

  listChunks(filter?: ChunkFilter): Promise<Chunk[]>;

  /**
   * Chunks that do not have an embedding yet, ordered by id
   */
  listPendingChunks(limit: number): Promise<Chunk[]>;

  /**
   * Scored candidates among embedded chunks with similarity >= threshold.
   * Ordering is not guaranteed; the search engine ranks them.
   */
  searchSimilar(queryVector: number[], threshold: number, limit: number): Promise<ScoredChunk[]>;

  getStats(): Promise<ChunkStoreStats>;

  /**
   * Remove every chunk (full reprocessing only)
   */
  clear(): Promise<void>;
}

/**
 * Options for an image lookup
 */
export interface ImageSearchOptions {
  maxImages: number;
  correlatedPages?: PageRef[];
}

/**
 * Image storage and lexical lookup
 * Single Responsibility: owns the image record lifecycle
 */
export interface IImageIndex {
  ingestImage(input: ImageInput): Promise<string>;

  search(queryText: string, options: ImageSearchOptions): Promise<RankedImage[]>;

  listByPage(source: string, pageNumber: number): Promise<ImageRecord[]>;

  getStats(): Promise<ImageIndexStats>;
}

/**
 * Keyword-based risk classification
 */
export interface ISafetyClassifier {
  classify(text: string): SafetyLevel;

  bannerFor(level: SafetyLevel): string | null;
}

/**
 * Bounded-lifetime storage of finished responses
 */
export interface IResponseCache {
  get(key: string): Promise<StructuredResponse | null>;

  set(key: string, response: StructuredResponse, ttlSeconds: number): Promise<void>;

  clear(): Promise<void>;

  size(): Promise<number>;
}

/**
 * Interface for configuration management
 * Single Responsibility: Manages backend configuration
 */
export interface IConfigService {
  /**
   * Get the complete configuration
   */
  getConfig(): ManualRagConfig;
}

/**
 * Dependencies for service construction
 */
export interface ServiceDependencies {
  logger: Logger;
  config: IConfigService;
}

/**
 * Dependencies for the query pipeline
 */
export interface QueryServiceDependencies extends ServiceDependencies {
  embeddingProvider: IEmbeddingProvider;
  generativeModel?: IGenerativeModel;
  chunkStore: IChunkStore;
  imageIndex: IImageIndex;
  responseCache?: IResponseCache;
}

/**
 * Dependencies for the ingestion pipeline
 */
export interface IngestionServiceDependencies extends ServiceDependencies {
  embeddingProvider: IEmbeddingProvider;
  chunkStore: IChunkStore;
  imageIndex: IImageIndex;
}
