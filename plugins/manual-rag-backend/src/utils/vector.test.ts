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

import { describe, expect, it } from '@jest/globals';
import { makeChunk } from '../testUtils';
import { chunkIdFor, clampScore, compareScoredChunks, cosineSimilarity } from './vector';

describe('vector utilities', () => {
  it('derives a stable 32 character id from source, page and content', () => {
    const id = chunkIdFor('manual.pdf', 3, 'Torque the bolts to 25 Nm.');

    expect(id).toMatch(/^[0-9a-f]{32}$/);
    expect(chunkIdFor('manual.pdf', 3, 'Torque the bolts to 25 Nm.')).toBe(id);
    expect(chunkIdFor('manual.pdf', 4, 'Torque the bolts to 25 Nm.')).not.toBe(id);
  });

  it('computes cosine similarity', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([3, 4], [6, 8])).toBeCloseTo(1);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects vectors of different lengths', () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow('Vectors must have the same length (2 vs 3)');
  });

  it('clamps scores into [0, 1]', () => {
    expect(clampScore(-0.2)).toBe(0);
    expect(clampScore(1.0000001)).toBe(1);
    expect(clampScore(0.42)).toBe(0.42);
  });

  it('orders by similarity, then by id', () => {
    const ranked = [
      { chunk: makeChunk({ id: 'b' }), similarity: 0.8 },
      { chunk: makeChunk({ id: 'c' }), similarity: 0.9 },
      { chunk: makeChunk({ id: 'a' }), similarity: 0.8 },
    ].sort(compareScoredChunks);

    expect(ranked.map(entry => entry.chunk.id)).toEqual(['c', 'a', 'b']);
  });
});
