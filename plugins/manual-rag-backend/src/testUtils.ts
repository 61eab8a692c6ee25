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
 * Shared fixtures for unit tests
 */

import type { JsonObject } from '@backstage/types';
import { IEmbeddingProvider, IGenerativeModel } from './interfaces';
import { Chunk, GenerationConfig } from './models';
import { ConfigService } from './services/ConfigService';
import { createLogger } from './services/logger';

export const testLogger = () => createLogger({ silent: true });

/**
 * Configuration with defaults, the cache disabled and `overrides` merged into `manualRag`
 */
export function testConfig(overrides: JsonObject = {}): ConfigService {
  return ConfigService.fromData({
    manualRag: {
      cache: { type: 'none' },
      ...overrides,
    },
  });
}

export function makeChunk(overrides: Partial<Chunk> = {}): Chunk {
  return {
    id: 'chunk-1',
    content: 'Check the tyre pressure every month.',
    source: 'owner-manual.pdf',
    pageNumber: 1,
    safetyLevel: 1,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

/**
 * Embeds known texts to fixed vectors, anything else to `fallback`
 */
export class StubEmbeddingProvider implements IEmbeddingProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly vectors: Record<string, number[]> = {},
    private readonly fallback: number[] = [0, 0, 1]
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    return this.vectors[text] ?? this.fallback;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map(text => this.embed(text)));
  }
}

/**
 * Generative model answering through `respond`; records every prompt
 */
export class StubGenerativeModel implements IGenerativeModel {
  readonly modelName = 'test-model';
  readonly prompts: string[] = [];

  constructor(private readonly respond: (prompt: string, signal?: AbortSignal) => Promise<string>) {}

  async generate(prompt: string, _config: GenerationConfig, signal?: AbortSignal): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt, signal);
  }
}

/**
 * Promise that never settles on its own; rejects with the abort reason
 */
export function untilAborted<T>(signal?: AbortSignal): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
