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

import { describe, expect, it, jest } from '@jest/globals';
import { MAX_BATCH_QUERIES, QueryService } from './QueryService';
import { IEmbeddingProvider, IGenerativeModel, IResponseCache } from '../interfaces';
import { ConfigService, loadKeywordTables } from './ConfigService';
import { ImageClassifier } from './ImageClassifier';
import { ImageRanker } from './ImageRanker';
import { InMemoryChunkStore } from './InMemoryChunkStore';
import { InMemoryImageIndex } from './InMemoryImageIndex';
import { InMemoryResponseCache } from './ResponseCache';
import { EMBEDDING_UNAVAILABLE_MESSAGE, ErrorCode, ImageIndexError, InvalidParametersError } from '../errors';
import { StubEmbeddingProvider, StubGenerativeModel, makeChunk, testConfig, testLogger } from '../testUtils';

const QUERY = 'How do I check the oil level?';

interface SetupOptions {
  config?: ConfigService;
  embeddingProvider?: IEmbeddingProvider;
  generativeModel?: IGenerativeModel;
  responseCache?: IResponseCache;
}

async function setup(options: SetupOptions = {}) {
  const logger = testLogger();
  const tables = loadKeywordTables();
  const chunkStore = new InMemoryChunkStore(logger);
  const imageIndex = new InMemoryImageIndex(
    logger,
    new ImageClassifier(tables),
    new ImageRanker({ tieBreak: 'complexity-asc', pageMatchBoost: 1, stopWords: tables.stopWords })
  );
  await chunkStore.upsertChunk(
    makeChunk({ id: 'oil-level', content: 'Check the oil level with the dipstick.', embedding: [1, 0, 0] })
  );

  const service = new QueryService({
    logger,
    config: options.config ?? testConfig(),
    embeddingProvider: options.embeddingProvider ?? new StubEmbeddingProvider({ [QUERY]: [1, 0, 0] }),
    generativeModel: options.generativeModel,
    chunkStore,
    imageIndex,
    responseCache: options.responseCache,
  });

  return { service, chunkStore, imageIndex };
}

const answering = (text: string) => new StubGenerativeModel(async () => text);

describe('QueryService', () => {
  describe('answer', () => {
    it('answers from the indexed chunks', async () => {
      const { service } = await setup({ generativeModel: answering('Use the dipstick [1].') });

      const response = await service.answer(QUERY);

      expect(response).toMatchObject({
        query: QUERY,
        answerText: 'Use the dipstick [1].',
        fallbackUsed: false,
        model: 'test-model',
        chunksFound: 1,
        confidence: 1,
        intent: 'maintenance',
        skillLevel: 'intermediate',
      });
      expect(response.sources.map(source => source.chunkId)).toEqual(['oil-level']);
    });

    it('searches with the configured defaults', async () => {
      const { service, chunkStore } = await setup();
      const searchSimilar = jest.spyOn(chunkStore, 'searchSimilar');

      await service.answer(QUERY);

      expect(searchSimilar).toHaveBeenCalledWith([1, 0, 0], 0.6, 9);
    });

    it('lets options override the defaults', async () => {
      const { service, chunkStore } = await setup({
        config: testConfig({ retrieval: { topK: 5, similarityThreshold: 0.7 } }),
      });
      const searchSimilar = jest.spyOn(chunkStore, 'searchSimilar');

      await service.answer(QUERY, { topK: 1, similarityThreshold: 0.8 });

      expect(searchSimilar).toHaveBeenCalledWith([1, 0, 0], 0.8, 3);
    });

    it('rejects invalid options before embedding the query', async () => {
      const embeddingProvider = new StubEmbeddingProvider();
      const { service } = await setup({ embeddingProvider });

      await expect(service.answer(QUERY, { topK: 0 })).rejects.toBeInstanceOf(InvalidParametersError);
      await expect(service.answer(QUERY, { similarityThreshold: -0.1 })).rejects.toBeInstanceOf(
        InvalidParametersError
      );
      expect(embeddingProvider.calls).toEqual([]);
    });

    it('answers without images when the image index fails', async () => {
      const responseCache = new InMemoryResponseCache(10);
      const { service, imageIndex } = await setup({
        generativeModel: answering('Use the dipstick [1].'),
        responseCache,
      });
      jest.spyOn(imageIndex, 'search').mockRejectedValue(new ImageIndexError('Image index unavailable: search'));

      const response = await service.answer(QUERY, { includeImages: true });

      expect(response).toMatchObject({ images: [], imagesOmitted: true, fallbackUsed: false, chunksFound: 1 });
      expect(await responseCache.size()).toBe(0);
    });

    it('rejects with the abort reason when already cancelled', async () => {
      const { service } = await setup();
      const controller = new AbortController();
      controller.abort(new Error('client went away'));

      await expect(service.answer(QUERY, {}, controller.signal)).rejects.toThrow('client went away');
    });
  });

  describe('response cache', () => {
    it('serves a repeated query from the cache', async () => {
      const generativeModel = answering('Use the dipstick [1].');
      const responseCache = new InMemoryResponseCache(10);
      const set = jest.spyOn(responseCache, 'set');
      const { service } = await setup({ generativeModel, responseCache });

      const first = await service.answer(QUERY);
      const second = await service.answer('  how do I check the OIL level? ');

      expect(second).toEqual(first);
      expect(second).not.toBe(first);
      expect(generativeModel.prompts).toHaveLength(1);
      expect(set).toHaveBeenCalledWith(expect.any(String), first, 86400);
    });

    it('keeps separate entries per skill level', async () => {
      const generativeModel = answering('Use the dipstick [1].');
      const { service } = await setup({ generativeModel, responseCache: new InMemoryResponseCache(10) });

      await service.answer(QUERY);
      const expert = await service.answer(QUERY, { skillLevel: 'expert' });

      expect(expert.skillLevel).toBe('expert');
      expect(generativeModel.prompts).toHaveLength(2);
      expect(generativeModel.prompts[1]).toContain('Assume technical knowledge.');
    });

    it('does not cache fallback answers', async () => {
      const responseCache = new InMemoryResponseCache(10);
      const { service } = await setup({ responseCache });

      const response = await service.answer(QUERY);

      expect(response.fallbackUsed).toBe(true);
      expect(await responseCache.size()).toBe(0);
    });

    it('answers when the cache cannot be read', async () => {
      const responseCache: IResponseCache = {
        get: async () => {
          throw new Error('cache offline');
        },
        set: async () => undefined,
        clear: async () => undefined,
        size: async () => 0,
      };
      const { service } = await setup({ generativeModel: answering('Use the dipstick [1].'), responseCache });

      const response = await service.answer(QUERY);

      expect(response.answerText).toBe('Use the dipstick [1].');
    });
  });

  describe('answerBatch', () => {
    it('reports each query on its own', async () => {
      const { service } = await setup({ generativeModel: answering('Use the dipstick [1].') });

      const entries = await service.answerBatch([QUERY, '   ']);

      expect(entries[0]).toMatchObject({ query: QUERY, success: true });
      expect(entries[1]).toEqual({
        query: '   ',
        success: false,
        error: 'Query text must not be empty',
        code: ErrorCode.INVALID_PARAMETERS,
      });
    });

    it('reports an embedding failure with the user-facing message', async () => {
      const { service } = await setup({
        embeddingProvider: {
          embed: async () => {
            throw new Error('connection refused');
          },
          embedBatch: async () => [],
        },
      });

      const [entry] = await service.answerBatch([QUERY]);

      expect(entry).toEqual({
        query: QUERY,
        success: false,
        error: EMBEDDING_UNAVAILABLE_MESSAGE,
        code: ErrorCode.EMBEDDING_UNAVAILABLE,
      });
    });

    it('accepts between one and ten queries', async () => {
      const { service } = await setup();
      const tooMany = Array.from({ length: MAX_BATCH_QUERIES + 1 }, (_, i) => `question ${i}`);

      await expect(service.answerBatch([])).rejects.toThrow('A batch must contain between 1 and 10 queries (got 0)');
      await expect(service.answerBatch(tooMany)).rejects.toThrow(
        'A batch must contain between 1 and 10 queries (got 11)'
      );
    });
  });

  describe('getStats', () => {
    it('reports store counts and the cache size', async () => {
      const { service } = await setup({ responseCache: new InMemoryResponseCache(10) });

      expect(await service.getStats()).toEqual({
        chunks: { totalChunks: 1, embeddedChunks: 1, coverage: 1, sources: 1 },
        images: { totalImages: 0, byType: {}, byComplexity: { 1: 0, 2: 0, 3: 0 } },
        cachedResponses: 0,
      });
    });

    it('reports no cache size without a cache', async () => {
      const { service } = await setup();

      expect((await service.getStats()).cachedResponses).toBeNull();
    });
  });
});
