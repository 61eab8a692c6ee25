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
import { PgImageIndex } from './PgImageIndex';
import { ImageClassifier } from './ImageClassifier';
import { ImageRanker } from './ImageRanker';
import { loadKeywordTables } from './ConfigService';
import { ImageIndexError } from '../errors';
import { testLogger } from '../testUtils';

type MockQueryResult = { rows: Array<Record<string, unknown>>; rowCount?: number };

const mockClient = {
  query: jest.fn<(text: string, values?: unknown[]) => Promise<MockQueryResult>>(),
  release: jest.fn(),
};

const mockPool = {
  connect: jest.fn(async () => mockClient),
  end: jest.fn(async () => undefined),
  on: jest.fn(),
};

jest.mock('pg', () => ({
  Pool: jest.fn(() => mockPool),
}));

const PG_CONFIG = {
  host: 'localhost',
  port: 5432,
  database: 'test_db',
  user: 'test_user',
  password: 'test-secret',
};

const createdAt = new Date('2026-01-01T00:00:00Z');

const imageRow = (overrides: Record<string, unknown>) => ({
  id: 'image-1',
  source: 'service-manual.pdf',
  page_number: 1,
  image_type: 'general',
  complexity_level: 1,
  ocr_text: '',
  description: null,
  storage_reference: 'images/1.png',
  created_at: createdAt,
  ...overrides,
});

describe('PgImageIndex', () => {
  const tables = loadKeywordTables();
  let index: PgImageIndex;

  beforeEach(() => {
    jest.clearAllMocks();
    mockClient.query.mockReset();
    mockClient.query.mockResolvedValue({ rows: [], rowCount: 1 });

    index = new PgImageIndex(
      testLogger(),
      PG_CONFIG,
      new ImageClassifier(tables),
      new ImageRanker({ tieBreak: 'complexity-asc', pageMatchBoost: 1, stopWords: tables.stopWords })
    );
  });

  it('inserts a classified record', async () => {
    const id = await index.ingestImage({
      source: 'service-manual.pdf',
      pageNumber: 8,
      storageReference: 'images/p8.png',
      description: 'Exploded parts view',
      ocrText: 'brake caliper',
    });

    const [text, values] = mockClient.query.mock.calls[0];
    expect(text).toContain('INSERT INTO manual_images');
    expect(values).toEqual([
      id,
      'service-manual.pdf',
      8,
      'parts_diagram',
      1,
      'brake caliper',
      'Exploded parts view',
      'images/p8.png',
      expect.any(Date),
    ]);
  });

  it('scores and orders images in SQL before the limit', async () => {
    mockClient.query.mockResolvedValueOnce({
      rows: [
        imageRow({ id: 'lube', page_number: 3, ocr_text: 'Chain lubrication' }),
        imageRow({ id: 'slack', page_number: 4, ocr_text: 'Chain slack 25-35 mm' }),
      ],
    });

    const results = await index.search('How do I adjust chain slack?', {
      maxImages: 2,
      correlatedPages: [{ source: 'service-manual.pdf', pageNumber: 3 }],
    });

    const [text, values] = mockClient.query.mock.calls[0];
    expect(text).toContain("WHERE words LIKE '% ' || term || '%'");
    expect(text).toContain('ORDER BY relevance DESC, complexity_level ASC, seq');
    expect(text).toContain('LIMIT $5');
    expect(values).toEqual([['adjust', 'chain', 'slack'], ['service-manual.pdf'], [3], 1, 2]);
    expect(results.map(result => [result.image.id, result.relevance])).toEqual([
      ['lube', 2],
      ['slack', 2],
    ]);
    expect(results[0].image.description).toBeUndefined();
  });

  it('follows the configured complexity tie-break in SQL', async () => {
    const unordered = new PgImageIndex(
      testLogger(),
      PG_CONFIG,
      new ImageClassifier(tables),
      new ImageRanker({ tieBreak: 'none', pageMatchBoost: 2, stopWords: tables.stopWords })
    );

    await unordered.search('chain slack', { maxImages: 4 });

    const [text, values] = mockClient.query.mock.calls[0];
    expect(text).toContain('ORDER BY relevance DESC, seq');
    expect(values).toEqual([['chain', 'slack'], [], [], 2, 4]);
  });

  it('skips the query when there is nothing to match', async () => {
    expect(await index.search('how to', { maxImages: 3 })).toEqual([]);
    expect(await index.search('chain', { maxImages: 0 })).toEqual([]);
    expect(mockClient.query).not.toHaveBeenCalled();
  });

  it('aggregates counts by type and complexity', async () => {
    mockClient.query.mockResolvedValueOnce({
      rows: [
        { image_type: 'photograph', complexity_level: 1, count: '2' },
        { image_type: 'photograph', complexity_level: 3, count: '1' },
        { image_type: 'table_chart', complexity_level: 2, count: '4' },
      ],
    });

    expect(await index.getStats()).toEqual({
      totalImages: 7,
      byType: { photograph: 3, table_chart: 4 },
      byComplexity: { 1: 2, 2: 4, 3: 1 },
    });
  });

  it('reports database failures as ImageIndexError', async () => {
    mockClient.query.mockRejectedValueOnce(new Error('connection reset'));

    await expect(index.listByPage('service-manual.pdf', 1)).rejects.toThrow(
      new ImageIndexError('Image index unavailable: list images for service-manual.pdf page 1')
    );
    expect(mockClient.release).toHaveBeenCalledTimes(1);
  });
});
