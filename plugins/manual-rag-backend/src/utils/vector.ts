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

import { createHash } from 'crypto';
import { ScoredChunk } from '../models';

/**
 * Stable chunk identifier derived from its origin and text.
 * Re-ingesting the same span yields the same id.
 */
export function chunkIdFor(source: string, pageNumber: number, content: string): string {
  return createHash('sha256')
    .update(`${source}\u0000${pageNumber}\u0000${content}`)
    .digest('hex')
    .slice(0, 32);
}

/**
 * Cosine similarity between two vectors of equal length
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vectors must have the same length (${a.length} vs ${b.length})`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);

  if (denominator === 0) {
    return 0;
  }

  return dotProduct / denominator;
}

/**
 * Similarity scores are reported in [0, 1]
 */
export function clampScore(score: number): number {
  return Math.min(1, Math.max(0, score));
}

/**
 * Ranking order: similarity descending, then chunk id ascending
 */
export function compareScoredChunks(a: ScoredChunk, b: ScoredChunk): number {
  if (a.similarity !== b.similarity) {
    return b.similarity - a.similarity;
  }
  return a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0;
}
