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
 * PostgreSQL image index implementation
 *
 * @packageDocumentation
 */

import { Pool, PoolClient } from 'pg';
import type { Logger } from 'winston';
import { IImageIndex, ImageSearchOptions } from '../interfaces';
import {
  ComplexityLevel,
  ImageIndexStats,
  ImageInput,
  ImageRecord,
  ImageTieBreak,
  isImageType,
  PostgresConfig,
  RankedImage,
  toLevel,
} from '../models';
import { ImageIndexError, isRagError } from '../errors';
import { ImageClassifier } from './ImageClassifier';
import { ImageRanker } from './ImageRanker';
import { buildImageRecord } from './InMemoryImageIndex';
import { createPgPool } from './PgChunkStore';

type ImageRow = {
  id: string;
  source: string;
  page_number: number;
  image_type: string;
  complexity_level: number;
  ocr_text: string;
  description: string | null;
  storage_reference: string;
  created_at: Date;
};

type ImageCountRow = {
  image_type: string;
  complexity_level: number;
  count: string;
};

const IMAGE_COLUMNS =
  'id, source, page_number, image_type, complexity_level, ocr_text, description, storage_reference, created_at';

/** Lower-cased words of an image, each preceded by a space, for word-prefix LIKE matches */
const IMAGE_WORDS_SQL =
  "' ' || regexp_replace(lower(ocr_text || ' ' || COALESCE(description, '') || ' ' || image_type), '[^[:alnum:]]+', ' ', 'g')";

const COMPLEXITY_ORDER: Record<ImageTieBreak, string> = {
  'complexity-asc': 'complexity_level ASC, ',
  'complexity-desc': 'complexity_level DESC, ',
  none: '',
};

function rowToImage(row: ImageRow): ImageRecord {
  return {
    id: row.id,
    source: row.source,
    pageNumber: row.page_number,
    imageType: isImageType(row.image_type) ? row.image_type : 'general',
    complexityLevel: toLevel(row.complexity_level) ?? 1,
    ocrText: row.ocr_text,
    description: row.description ?? undefined,
    storageReference: row.storage_reference,
    createdAt: row.created_at,
  };
}

/**
 * Image index backed by the manual_images table.
 * Relevance (matched query terms plus the page boost) is scored and ordered in
 * SQL with the same rules as ImageRanker, so LIMIT keeps the best images; the
 * ranker then fills in the matched terms.
 */
export class PgImageIndex implements IImageIndex {
  private readonly pool: Pool;

  constructor(
    private readonly logger: Logger,
    config: PostgresConfig,
    private readonly classifier: ImageClassifier,
    private readonly ranker: ImageRanker,
    pool?: Pool
  ) {
    this.pool = pool ?? createPgPool(config, logger);
  }

  async ingestImage(input: ImageInput): Promise<string> {
    const record = buildImageRecord(input, this.classifier);

    await this.withClient(`store image for ${record.source} page ${record.pageNumber}`, async client => {
      await client.query(
        `INSERT INTO manual_images (${IMAGE_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
        [
          record.id,
          record.source,
          record.pageNumber,
          record.imageType,
          record.complexityLevel,
          record.ocrText,
          record.description ?? null,
          record.storageReference,
          record.createdAt,
        ]
      );
    });

    this.logger.debug(`Indexed image ${record.id} (${record.imageType})`);
    return record.id;
  }

  async search(queryText: string, options: ImageSearchOptions): Promise<RankedImage[]> {
    const terms = this.ranker.queryTerms(queryText);
    const pages = options.correlatedPages ?? [];

    if (options.maxImages <= 0 || (terms.length === 0 && pages.length === 0)) {
      return [];
    }

    const rows = await this.withClient('search images', async client => {
      const result = await client.query<ImageRow>(
        `WITH scored AS (
           SELECT ${IMAGE_COLUMNS}, seq,
                  (SELECT COUNT(*) FROM unnest($1::TEXT[]) AS term
                    WHERE words LIKE '% ' || term || '%')
                  + CASE WHEN (source, page_number) IN (SELECT * FROM unnest($2::TEXT[], $3::INTEGER[]))
                         THEN $4::DOUBLE PRECISION ELSE 0 END AS relevance
           FROM (SELECT *, ${IMAGE_WORDS_SQL} AS words FROM manual_images) AS images
         )
         SELECT ${IMAGE_COLUMNS} FROM scored
         WHERE relevance > 0
         ORDER BY relevance DESC, ${COMPLEXITY_ORDER[this.ranker.tieBreak]}seq
         LIMIT $5`,
        [
          terms,
          pages.map(page => page.source),
          pages.map(page => page.pageNumber),
          this.ranker.pageMatchBoost,
          options.maxImages,
        ]
      );
      return result.rows;
    });

    return this.ranker.rank(rows.map(rowToImage), queryText, options.maxImages, pages);
  }

  async listByPage(source: string, pageNumber: number): Promise<ImageRecord[]> {
    return this.withClient(`list images for ${source} page ${pageNumber}`, async client => {
      const result = await client.query<ImageRow>(
        `SELECT ${IMAGE_COLUMNS} FROM manual_images WHERE source = $1 AND page_number = $2 ORDER BY seq`,
        [source, pageNumber]
      );
      return result.rows.map(rowToImage);
    });
  }

  async getStats(): Promise<ImageIndexStats> {
    return this.withClient('read image stats', async client => {
      const result = await client.query<ImageCountRow>(
        'SELECT image_type, complexity_level, COUNT(*) AS count FROM manual_images GROUP BY image_type, complexity_level'
      );

      const stats: ImageIndexStats = { totalImages: 0, byType: {}, byComplexity: { 1: 0, 2: 0, 3: 0 } };
      for (const row of result.rows) {
        const count = parseInt(row.count, 10);
        const imageType = isImageType(row.image_type) ? row.image_type : 'general';
        const complexity: ComplexityLevel = toLevel(row.complexity_level) ?? 1;
        stats.totalImages += count;
        stats.byType[imageType] = (stats.byType[imageType] ?? 0) + count;
        stats.byComplexity[complexity] += count;
      }
      return stats;
    });
  }

  /**
   * Run work on a pooled client; any failure becomes ImageIndexError
   */
  private async withClient<T>(operation: string, work: (client: PoolClient) => Promise<T>): Promise<T> {
    let client: PoolClient | undefined;
    try {
      client = await this.pool.connect();
      return await work(client);
    } catch (error) {
      if (isRagError(error)) {
        throw error;
      }
      this.logger.error(`Failed to ${operation}`, error);
      throw new ImageIndexError(`Image index unavailable: ${operation}`, error);
    } finally {
      client?.release();
    }
  }
}
