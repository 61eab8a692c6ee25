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

import { beforeEach, describe, expect, it } from '@jest/globals';
import { InMemoryResponseCache, RedisLike, RedisResponseCache, buildCacheKey } from './ResponseCache';
import { RetrievalParams, StructuredResponse } from '../models';
import { testLogger } from '../testUtils';

const params: RetrievalParams = { topK: 3, similarityThreshold: 0.6, includeImages: false, maxImages: 3 };

const response = (answerText: string): StructuredResponse => ({
  schemaVersion: 2,
  query: 'How do I check the oil level?',
  answerText,
  citations: '',
  sources: [],
  images: [],
  imagesOmitted: false,
  safetyLevel: 1,
  fallbackUsed: false,
  fallbackReason: null,
  model: 'test-model',
  chunksFound: 1,
  confidence: 0.9,
  intent: 'maintenance',
  intentConfidence: 0.75,
  skillLevel: 'intermediate',
  processingTimeMs: 12,
});

/**
 * Map-backed stand-in for the ioredis client; SCAN returns one key per page
 */
class FakeRedis implements RedisLike {
  readonly values = new Map<string, string>();
  readonly expiries = new Map<string, number>();

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, _token: 'PX', milliseconds: number): Promise<unknown> {
    this.values.set(key, value);
    this.expiries.set(key, milliseconds);
    return 'OK';
  }

  async scan(cursor: string, _match: 'MATCH', pattern: string): Promise<[string, string[]]> {
    const prefix = pattern.replace(/\*$/, '');
    const keys = Array.from(this.values.keys()).filter(key => key.startsWith(prefix));
    const index = Number(cursor);
    const next = index + 1 < keys.length ? String(index + 1) : '0';
    return [next, keys.slice(index, index + 1)];
  }

  async del(...keys: string[]): Promise<number> {
    return keys.filter(key => this.values.delete(key)).length;
  }
}

describe('buildCacheKey', () => {
  it('ignores case and surrounding or repeated whitespace', () => {
    expect(buildCacheKey('  How do I   check the OIL? ', params)).toBe(buildCacheKey('how do i check the oil?', params));
  });

  it('distinguishes retrieval parameters', () => {
    const key = buildCacheKey('oil level', params);

    expect(key).toMatch(/^[0-9a-f]{64}$/);
    expect(buildCacheKey('oil level', { ...params, topK: 5 })).not.toBe(key);
    expect(buildCacheKey('oil level', { ...params, includeImages: true })).not.toBe(key);
  });

  it('distinguishes skill levels and defaults to intermediate', () => {
    expect(buildCacheKey('oil level', params, 'beginner')).not.toBe(buildCacheKey('oil level', params, 'expert'));
    expect(buildCacheKey('oil level', params, 'intermediate')).toBe(buildCacheKey('oil level', params));
  });

  it('ignores maxImages when images are not requested', () => {
    expect(buildCacheKey('oil level', { ...params, maxImages: 1 })).toBe(buildCacheKey('oil level', params));
  });
});

describe('InMemoryResponseCache', () => {
  let clock: number;
  let cache: InMemoryResponseCache;

  beforeEach(() => {
    clock = 1000;
    cache = new InMemoryResponseCache(2, () => clock);
  });

  it('serves an entry until its TTL has passed', async () => {
    await cache.set('a', response('first'), 10);

    clock = 10999;
    expect(await cache.get('a')).toEqual(response('first'));

    clock = 11000;
    expect(await cache.get('a')).toBeNull();
    expect(await cache.size()).toBe(0);
  });

  it('evicts the oldest entry when full', async () => {
    await cache.set('a', response('a'), 60);
    await cache.set('b', response('b'), 60);
    await cache.set('a', response('a2'), 60);
    await cache.set('c', response('c'), 60);

    expect(await cache.get('b')).toBeNull();
    expect(await cache.get('a')).toEqual(response('a2'));
    expect(await cache.size()).toBe(2);
  });

  it('hands out copies so callers cannot change a cached entry', async () => {
    const stored = response('first');
    await cache.set('a', stored, 60);
    stored.answerText = 'changed before read';

    const hit = await cache.get('a');
    expect(hit?.answerText).toBe('first');
    hit?.sources.push({ chunkId: 'c1', source: 'm.pdf', page: 1, similarity: 0.9, safetyLevel: 1 });

    expect(await cache.get('a')).toEqual(response('first'));
  });

  it('clears every entry', async () => {
    await cache.set('a', response('a'), 60);
    await cache.clear();

    expect(await cache.size()).toBe(0);
  });
});

describe('RedisResponseCache', () => {
  let redis: FakeRedis;
  let cache: RedisResponseCache;

  beforeEach(() => {
    redis = new FakeRedis();
    cache = new RedisResponseCache(redis, testLogger(), 'test:');
  });

  it('stores responses as JSON with a millisecond expiry', async () => {
    await cache.set('key', response('cached'), 30);

    expect(redis.expiries.get('test:key')).toBe(30000);
    expect(await cache.get('key')).toEqual(response('cached'));
  });

  it('misses on absent, unreadable or foreign entries', async () => {
    await redis.set('test:broken', '{not json', 'PX', 1000);
    await redis.set('test:foreign', JSON.stringify({ schemaVersion: 0 }), 'PX', 1000);

    expect(await cache.get('absent')).toBeNull();
    expect(await cache.get('broken')).toBeNull();
    expect(await cache.get('foreign')).toBeNull();
  });

  it('counts and clears only its own keys', async () => {
    await cache.set('a', response('a'), 30);
    await cache.set('b', response('b'), 30);
    await redis.set('other:c', 'unrelated', 'PX', 1000);

    expect(await cache.size()).toBe(2);

    await cache.clear();

    expect(await cache.size()).toBe(0);
    expect(Array.from(redis.values.keys())).toEqual(['other:c']);
  });
});
