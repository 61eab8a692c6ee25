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

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { SimilaritySearchEngine } from './SimilaritySearchEngine';
import { InMemoryChunkStore } from './InMemoryChunkStore';
import { InvalidParametersError, StoreUnavailableError } from '../errors';
import { makeChunk, testLogger } from '../testUtils';

describe('SimilaritySearchEngine', () => {
  let store: InMemoryChunkStore;
  let engine: SimilaritySearchEngine;

  beforeEach(async () => {
    store = new InMemoryChunkStore(testLogger());
    engine = new SimilaritySearchEngine(store, testLogger());

    await store.upsertChunk(makeChunk({ id: 'oil-change', embedding: [1, 0, 0] }));
    await store.upsertChunk(makeChunk({ id: 'oil-level', embedding: [0.8, 0.6, 0] }));
    await store.upsertChunk(makeChunk({ id: 'tyres', embedding: [0, 1, 0] }));
    await store.upsertChunk(makeChunk({ id: 'not-embedded' }));
  });

  it('returns only the chunks that clear the threshold', async () => {
    const results = await engine.search([1, 0, 0], 3, 0.6);

    expect(results.map(result => result.chunk.id)).toEqual(['oil-change', 'oil-level']);
  });

  it('returns an empty result when nothing clears the threshold', async () => {
    expect(await engine.search([0, 0, 1], 3, 0.6)).toEqual([]);
  });

  it('is deterministic', async () => {
    const first = await engine.search([0.6, 0.8, 0], 3, 0);
    const second = await engine.search([0.6, 0.8, 0], 3, 0);

    expect(second).toEqual(first);
  });

  it('returns a subset when the threshold is raised', async () => {
    const loose = (await engine.search([1, 0, 0], 10, 0.5)).map(result => result.chunk.id);
    const strict = (await engine.search([1, 0, 0], 10, 0.9)).map(result => result.chunk.id);

    expect(strict).toEqual(['oil-change']);
    expect(loose).toEqual(expect.arrayContaining(strict));
  });

  it('breaks score ties by chunk id', async () => {
    await store.upsertChunk(makeChunk({ id: 'a-duplicate', embedding: [1, 0, 0] }));

    const results = await engine.search([1, 0, 0], 2, 0.6);

    expect(results.map(result => result.chunk.id)).toEqual(['a-duplicate', 'oil-change']);
  });

  it('never returns chunks without an embedding', async () => {
    const ids = (await engine.search([1, 0, 0], 10, 0)).map(result => result.chunk.id);

    expect(ids).not.toContain('not-embedded');
    expect(ids).toHaveLength(3);
  });

  describe('parameter validation', () => {
    it('rejects topK below 1 before touching the store', async () => {
      const searchSpy = jest.spyOn(store, 'searchSimilar');

      await expect(engine.search([1, 0, 0], 0, 0.6)).rejects.toThrow(
        new InvalidParametersError('topK must be an integer >= 1 (got 0)')
      );
      expect(searchSpy).not.toHaveBeenCalled();
    });

    it('rejects a threshold outside [0, 1]', async () => {
      await expect(engine.search([1, 0, 0], 3, 1.2)).rejects.toBeInstanceOf(InvalidParametersError);
      await expect(engine.search([1, 0, 0], 3, -0.1)).rejects.toBeInstanceOf(InvalidParametersError);
    });

    it('rejects an empty query vector', async () => {
      await expect(engine.search([], 3, 0.6)).rejects.toThrow('Query vector is empty');
    });
  });

  it('reports store failures as StoreUnavailableError', async () => {
    jest.spyOn(store, 'searchSimilar').mockRejectedValueOnce(new Error('disk failure'));

    await expect(engine.search([1, 0, 0], 3, 0.6)).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});
