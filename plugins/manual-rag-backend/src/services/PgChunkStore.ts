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
 * PostgreSQL chunk store implementation with pgvector
 * Provides persistent chunk storage and similarity search capabilities
 * 
 * @packageDocumentation
 */

import * as fs from 'fs';
import * as path from 'path';
import { Pool, PoolClient } from 'pg';
import type { Logger } from 'winston';
import { ChunkFilter, IChunkStore } from '../interfaces';
import { Chunk, ChunkStoreStats, PostgresConfig, ScoredChunk, toLevel } from '../models';
import { InvalidParametersError, isRagError, StoreUnavailableError } from '../errors';
import { clampScore, compareScoredChunks } from '../utils/vector';

export const MIGRATIONS_DIR = path.resolve(__dirname, '../../migrations');

type ChunkRow = {
  id: string;
  content: string;
  source: string;
  page_number: number;
  safety_level: number;
  embedding: string | null;
  created_at: Date;
};

type ScoredChunkRow = ChunkRow & { similarity: string };

type StatsRow = {
  total_chunks: string;
  embedded_chunks: string;
  sources: string;
};

const CHUNK_COLUMNS = 'id, content, source, page_number, safety_level, embedding::text AS embedding, created_at';

/**
 * Create a connection pool from configuration
 */
export function createPgPool(config: PostgresConfig, logger: Logger): Pool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ? { rejectUnauthorized: false } : false,
    max: config.maxConnections || 10,
    idleTimeoutMillis: config.idleTimeoutMillis || 30000,
    connectionTimeoutMillis: config.connectionTimeoutMillis || 5000,
  });

  // Handle pool errors
  pool.on('error', err => {
    logger.error('Unexpected PostgreSQL pool error', err);
  });

  return pool;
}

/**
 * Convert number array to PostgreSQL vector format
 */
export function vectorToSql(vector: number[]): string {
  return `[${vector.join(',')}]`;
}

/**
 * Parse the text form of a pgvector value
 */
export function vectorFromSql(value: string | null): number[] | undefined {
  if (value === null) {
    return undefined;
  }
  const body = value.trim().replace(/^\[/, '').replace(/\]$/, '');
  return body.length === 0 ? [] : body.split(',').map(Number);
}

function rowToChunk(row: ChunkRow): Chunk {
  const embedding = vectorFromSql(row.embedding);
  return {
    id: row.id,
    content: row.content,
    source: row.source,
    pageNumber: row.page_number,
    safetyLevel: toLevel(row.safety_level) ?? 1,
    createdAt: row.created_at,
    ...(embedding ? { embedding } : {}),
  };
}

/**
 * PostgreSQL chunk store using the pgvector extension
 * Follows Single Responsibility Principle
 * 
 * Features:
 * - Nullable embedding column: chunks are stored before they are embedded
 * - Idempotent ingestion keyed by the stable chunk id
 * - Transaction support for embedding batches
 * - Connection pooling shared with the image index
 */
export class PgChunkStore implements IChunkStore {
  private readonly logger: Logger;
  private readonly pool: Pool;
  private initialized: boolean = false;

  constructor(logger: Logger, config: PostgresConfig, pool?: Pool) {
    this.logger = logger;
    this.pool = pool ?? createPgPool(config, logger);
  }

  /**
   * Initialize the store (verify connection, extension and schema)
   * Should be called after construction
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      this.logger.debug('PgChunkStore already initialized');
      return;
    }

    try {
      this.logger.info('Initializing PgChunkStore...');

      await this.testConnection();
      await this.verifyPgVector();
      await this.verifySchema();

      this.initialized = true;
      this.logger.info('PgChunkStore initialized successfully');
    } catch (error) {
      this.logger.error('Failed to initialize PgChunkStore', error);
      throw new StoreUnavailableError(`PgChunkStore initialization failed: ${error}`, error);
    }
  }

  /**
   * Apply the bundled schema migration
   */
  async migrate(): Promise<void> {
    const sql = fs.readFileSync(path.join(MIGRATIONS_DIR, '001_initial_schema.sql'), 'utf8');
    await this.withClient('apply migrations', async client => {
      await client.query(sql);
    });
    this.logger.info('Applied migration 001_initial_schema');
  }

  private async testConnection(): Promise<void> {
    const client = await this.pool.connect();
    try {
      const result = await client.query<{ now: Date }>('SELECT NOW() AS now');
      this.logger.debug(`Database connection successful: ${result.rows[0].now}`);
    } finally {
      client.release();
    }
  }

  private async verifyPgVector(): Promise<void> {
    const client = await this.pool.connect();
    try {
      const result = await client.query<{ installed: boolean }>(
        "SELECT EXISTS(SELECT 1 FROM pg_extension WHERE extname = 'vector') as installed"
      );

      if (!result.rows[0].installed) {
        throw new Error('pgvector extension is not installed. Please run: CREATE EXTENSION vector;');
      }

      this.logger.debug('pgvector extension verified');
    } finally {
      client.release();
    }
  }

  private async verifySchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      const result = await client.query<{ exists: boolean }>(
        "SELECT EXISTS(SELECT 1 FROM information_schema.tables WHERE table_name = 'manual_chunks') as exists"
      );

      if (!result.rows[0].exists) {
        this.logger.warn('manual_chunks table does not exist. Please run migrations.');
        throw new Error('manual_chunks table not found. Run migrations first.');
      }

      this.logger.debug('Database schema verified');
    } finally {
      client.release();
    }
  }

  /**
   * Insert a chunk; an existing id is left untouched
   */
  async upsertChunk(chunk: Chunk): Promise<boolean> {
    this.ensureInitialized();

    return this.withClient(`store chunk ${chunk.id}`, async client => {
      const result = await client.query(
        `INSERT INTO manual_chunks (id, content, source, page_number, safety_level, embedding, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         ON CONFLICT (id) DO NOTHING`,
        [
          chunk.id,
          chunk.content,
          chunk.source,
          chunk.pageNumber,
          chunk.safetyLevel,
          chunk.embedding ? vectorToSql(chunk.embedding) : null,
          chunk.createdAt,
        ]
      );

      const inserted = (result.rowCount ?? 0) > 0;
      this.logger.debug(inserted ? `Stored chunk: ${chunk.id}` : `Chunk already stored: ${chunk.id}`);
      return inserted;
    });
  }

  async attachEmbedding(chunkId: string, vector: number[]): Promise<void> {
    this.ensureInitialized();

    await this.withClient(`attach embedding to ${chunkId}`, async client => {
      await this.updateEmbedding(client, chunkId, vector);
    });
    this.logger.debug(`Attached embedding to chunk: ${chunkId}`);
  }

  /**
   * Attach a batch of embeddings in one transaction
   */
  async attachEmbeddings(entries: Array<{ chunkId: string; vector: number[] }>): Promise<void> {
    this.ensureInitialized();

    if (entries.length === 0) {
      return;
    }

    await this.withClient('attach embedding batch', async client => {
      await client.query('BEGIN');
      try {
        for (const entry of entries) {
          await this.updateEmbedding(client, entry.chunkId, entry.vector);
        }
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
    });
    this.logger.info(`Attached batch of ${entries.length} embeddings`);
  }

  private async updateEmbedding(client: PoolClient, chunkId: string, vector: number[]): Promise<void> {
    const result = await client.query(
      'UPDATE manual_chunks SET embedding = $2, updated_at = CURRENT_TIMESTAMP WHERE id = $1',
      [chunkId, vectorToSql(vector)]
    );
    if ((result.rowCount ?? 0) === 0) {
      throw new InvalidParametersError(`Unknown chunk: ${chunkId}`);
    }
  }

  async getChunk(chunkId: string): Promise<Chunk | null> {
    this.ensureInitialized();

    return this.withClient(`read chunk ${chunkId}`, async client => {
      const result = await client.query<ChunkRow>(
        `SELECT ${CHUNK_COLUMNS} FROM manual_chunks WHERE id = $1`,
        [chunkId]
      );
      return result.rows.length > 0 ? rowToChunk(result.rows[0]) : null;
    });
  }

  async listChunks(filter: ChunkFilter = {}): Promise<Chunk[]> {
    this.ensureInitialized();

    return this.withClient('list chunks', async client => {
      const result = await client.query<ChunkRow>(
        `SELECT ${CHUNK_COLUMNS} FROM manual_chunks
         WHERE ($1::TEXT IS NULL OR source = $1)
           AND ($2::INTEGER IS NULL OR page_number = $2)
         ORDER BY source, page_number, created_at, id`,
        [filter.source ?? null, filter.pageNumber ?? null]
      );
      return result.rows.map(rowToChunk);
    });
  }

  async listPendingChunks(limit: number): Promise<Chunk[]> {
    this.ensureInitialized();

    return this.withClient('list pending chunks', async client => {
      const result = await client.query<ChunkRow>(
        `SELECT ${CHUNK_COLUMNS} FROM manual_chunks WHERE embedding IS NULL ORDER BY id LIMIT $1`,
        [limit]
      );
      return result.rows.map(rowToChunk);
    });
  }

  /**
   * Cosine search through pgvector's <=> operator over embedded chunks only
   */
  async searchSimilar(queryVector: number[], threshold: number, limit: number): Promise<ScoredChunk[]> {
    this.ensureInitialized();

    return this.withClient('search chunks', async client => {
      const result = await client.query<ScoredChunkRow>(
        `SELECT ${CHUNK_COLUMNS}, 1 - (embedding <=> $1::vector) AS similarity
         FROM manual_chunks
         WHERE embedding IS NOT NULL
           AND vector_dims(embedding) = $4
           AND 1 - (embedding <=> $1::vector) >= $2
         ORDER BY embedding <=> $1::vector, id
         LIMIT $3`,
        [vectorToSql(queryVector), threshold, limit, queryVector.length]
      );

      const results = result.rows
        .map(row => ({ chunk: rowToChunk(row), similarity: clampScore(parseFloat(row.similarity)) }))
        .sort(compareScoredChunks);

      this.logger.info(`Found ${results.length} chunks above threshold ${threshold}`);
      return results;
    });
  }

  async getStats(): Promise<ChunkStoreStats> {
    this.ensureInitialized();

    return this.withClient('read stats', async client => {
      const result = await client.query<StatsRow>('SELECT * FROM manual_chunk_stats');

      if (result.rows.length === 0) {
        return { totalChunks: 0, embeddedChunks: 0, coverage: 0, sources: 0 };
      }

      const stats = result.rows[0];
      const totalChunks = parseInt(stats.total_chunks, 10);
      const embeddedChunks = parseInt(stats.embedded_chunks, 10);
      return {
        totalChunks,
        embeddedChunks,
        coverage: totalChunks === 0 ? 0 : embeddedChunks / totalChunks,
        sources: parseInt(stats.sources, 10),
      };
    });
  }

  async clear(): Promise<void> {
    this.ensureInitialized();

    await this.withClient('clear chunks', async client => {
      const result = await client.query('DELETE FROM manual_chunks');
      this.logger.info(`Cleared ${result.rowCount ?? 0} chunks from store`);
    });
  }

  /**
   * Close the connection pool
   * Should be called on application shutdown
   */
  async close(): Promise<void> {
    try {
      await this.pool.end();
      this.logger.info('PgChunkStore connection pool closed');
    } catch (error) {
      this.logger.error('Error closing PgChunkStore pool', error);
      throw error;
    }
  }

  /**
   * Health check for the store
   */
  async healthCheck(): Promise<boolean> {
    try {
      const client = await this.pool.connect();
      try {
        await client.query('SELECT 1');
        return true;
      } finally {
        client.release();
      }
    } catch (error) {
      this.logger.error('Health check failed', error);
      return false;
    }
  }

  /**
   * Run work on a pooled client; driver failures become StoreUnavailableError
   */
  private async withClient<T>(operation: string, work: (client: PoolClient) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      this.logger.error(`Failed to ${operation}: no database connection`, error);
      throw new StoreUnavailableError(`Chunk store unavailable: ${operation}`, error);
    }

    try {
      return await work(client);
    } catch (error) {
      if (isRagError(error)) {
        throw error;
      }
      this.logger.error(`Failed to ${operation}`, error);
      throw new StoreUnavailableError(`Chunk store unavailable: ${operation}`, error);
    } finally {
      client.release();
    }
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('PgChunkStore not initialized. Call initialize() first.');
    }
  }
}
