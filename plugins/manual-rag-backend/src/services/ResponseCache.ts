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
 * Response caches keyed by normalized query and retrieval parameters
 *
 * @packageDocumentation
 */

import { createHash } from 'crypto';
import type { Logger } from 'winston';
import { IResponseCache } from '../interfaces';
import { DEFAULT_SKILL_LEVEL, RESPONSE_SCHEMA_VERSION, RetrievalParams, SkillLevel, StructuredResponse } from '../models';

/**
 * Cache key of a query: whitespace- and case-normalized text plus parameters
 * and the reader's skill level
 */
export function buildCacheKey(
  queryText: string,
  params: RetrievalParams,
  skillLevel: SkillLevel = DEFAULT_SKILL_LEVEL
): string {
  const normalized = queryText.trim().replace(/\s+/g, ' ').toLowerCase();
  const payload = JSON.stringify([
    normalized,
    params.topK,
    params.similarityThreshold,
    params.includeImages,
    params.includeImages ? params.maxImages : 0,
    skillLevel,
  ]);
  return createHash('sha256').update(payload).digest('hex');
}

function isStructuredResponse(value: unknown): value is StructuredResponse {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'schemaVersion' in value &&
    value.schemaVersion === RESPONSE_SCHEMA_VERSION &&
    'answerText' in value &&
    typeof value.answerText === 'string' &&
    'sources' in value &&
    Array.isArray(value.sources)
  );
}

interface CacheEntry {
  response: StructuredResponse;
  expiresAt: number;
}

/**
 * Process-local cache with a TTL and a bounded number of entries.
 * The oldest entry is evicted when full. Entries are copied in and out.
 */
export class InMemoryResponseCache implements IResponseCache {
  private readonly entries: Map<string, CacheEntry> = new Map();

  constructor(
    private readonly maxEntries: number,
    private readonly now: () => number = Date.now
  ) {}

  async get(key: string): Promise<StructuredResponse | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return structuredClone(entry.response);
  }

  async set(key: string, response: StructuredResponse, ttlSeconds: number): Promise<void> {
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, { response: structuredClone(response), expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async size(): Promise<number> {
    return this.entries.size;
  }
}

/**
 * The subset of the ioredis client used by the cache
 */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, millisecondsToken: 'PX', milliseconds: number): Promise<unknown>;
  scan(
    cursor: string,
    patternToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number
  ): Promise<[string, string[]]>;
  del(...keys: string[]): Promise<number>;
}

/**
 * Shared cache in Redis; entries expire through PX
 */
export class RedisResponseCache implements IResponseCache {
  constructor(
    private readonly redis: RedisLike,
    private readonly logger: Logger,
    private readonly prefix: string = 'manual-rag:response:'
  ) {}

  async get(key: string): Promise<StructuredResponse | null> {
    const raw = await this.redis.get(this.prefix + key);
    if (raw === null) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (isStructuredResponse(parsed)) {
        return parsed;
      }
      this.logger.warn(`Discarding cached response with unexpected shape: ${key}`);
    } catch (error) {
      this.logger.warn(`Discarding unreadable cached response ${key}: ${error}`);
    }
    return null;
  }

  async set(key: string, response: StructuredResponse, ttlSeconds: number): Promise<void> {
    await this.redis.set(this.prefix + key, JSON.stringify(response), 'PX', ttlSeconds * 1000);
  }

  async clear(): Promise<void> {
    for (const keys of await this.scanKeys()) {
      await this.redis.del(...keys);
    }
  }

  async size(): Promise<number> {
    const batches = await this.scanKeys();
    return batches.reduce((total, keys) => total + keys.length, 0);
  }

  private async scanKeys(): Promise<string[][]> {
    const batches: string[][] = [];
    let cursor = '0';
    do {
      const [next, keys] = await this.redis.scan(cursor, 'MATCH', `${this.prefix}*`, 'COUNT', 100);
      if (keys.length > 0) {
        batches.push(keys);
      }
      cursor = next;
    } while (cursor !== '0');
    return batches;
  }
}
