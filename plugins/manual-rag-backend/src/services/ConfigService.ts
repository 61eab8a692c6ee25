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
 * Configuration service implementation
 * Manages backend configuration with type-safe access
 * 
 * @packageDocumentation
 */

import * as fs from 'fs';
import * as path from 'path';
import { Config, ConfigReader } from '@backstage/config';
import type { JsonObject } from '@backstage/types';
import { parse } from 'yaml';
import { getErrorMessage } from '../errors';
import { IConfigService } from '../interfaces';
import {
  CacheConfig,
  ImageTieBreak,
  isImageType,
  isQueryIntent,
  KeywordTables,
  ManualRagConfig,
  PostgresConfig,
  StoreConfig,
} from '../models';

export const DEFAULT_KEYWORD_TABLES_PATH = path.resolve(__dirname, '../../data/keyword-tables.json');

const TIE_BREAKS: readonly ImageTieBreak[] = ['complexity-asc', 'complexity-desc', 'none'];

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new Error(`Keyword table field ${field} must be an array of strings`);
  }
  return value.map(item => item.toLowerCase());
}

function readPatterns(value: unknown, field: string): string[] {
  const patterns = readStringArray(value, field);
  for (const pattern of patterns) {
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new Error(`Keyword table field ${field} has an invalid pattern: ${pattern} (${getErrorMessage(error)})`);
    }
  }
  return patterns;
}

/**
 * Validate a parsed keyword table document
 */
export function parseKeywordTables(value: unknown): KeywordTables {
  if (!isJsonObject(value)) {
    throw new Error('Keyword tables must be a JSON object');
  }

  const { safety, imageTypes, complexity, stopWords } = value;
  if (!isJsonObject(safety) || !isJsonObject(imageTypes) || !isJsonObject(complexity)) {
    throw new Error('Keyword tables require safety, imageTypes and complexity sections');
  }

  const parsedImageTypes: KeywordTables['imageTypes'] = {};
  for (const [type, keywords] of Object.entries(imageTypes)) {
    if (!isImageType(type)) {
      throw new Error(`Unknown image type in keyword tables: ${type}`);
    }
    parsedImageTypes[type] = readStringArray(keywords, `imageTypes.${type}`);
  }

  const parsedIntents: KeywordTables['intents'] = {};
  if (value.intents !== undefined) {
    if (!isJsonObject(value.intents)) {
      throw new Error('Keyword table field intents must be a JSON object');
    }
    for (const [intent, patterns] of Object.entries(value.intents)) {
      if (!isQueryIntent(intent) || intent === 'general') {
        throw new Error(`Unknown intent in keyword tables: ${intent}`);
      }
      parsedIntents[intent] = readPatterns(patterns, `intents.${intent}`);
    }
  }

  return {
    safety: {
      high: readStringArray(safety.high, 'safety.high'),
      medium: readStringArray(safety.medium, 'safety.medium'),
    },
    imageTypes: parsedImageTypes,
    complexity: {
      advanced: readStringArray(complexity.advanced, 'complexity.advanced'),
      intermediate: readStringArray(complexity.intermediate, 'complexity.intermediate'),
    },
    stopWords: stopWords === undefined ? [] : readStringArray(stopWords, 'stopWords'),
    intents: parsedIntents,
  };
}

/**
 * Read keyword tables from a JSON file
 */
export function loadKeywordTables(filePath: string = DEFAULT_KEYWORD_TABLES_PATH): KeywordTables {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return parseKeywordTables(raw);
}

/**
 * Configuration service that wraps a ConfigReader
 * Follows Single Responsibility Principle
 */
export class ConfigService implements IConfigService {
  private readonly config: Config;
  private readonly cachedConfig: ManualRagConfig;

  constructor(config: Config) {
    this.config = config;
    this.cachedConfig = this.loadConfig();
  }

  /**
   * Build a configuration service from a YAML file
   */
  static fromFile(filePath: string): ConfigService {
    const data: unknown = parse(fs.readFileSync(filePath, 'utf8'));
    if (!isJsonObject(data)) {
      throw new Error(`Configuration file ${filePath} must contain a mapping`);
    }
    return new ConfigService(new ConfigReader(data, path.basename(filePath)));
  }

  /**
   * Build a configuration service from plain data (tests, embedding callers)
   */
  static fromData(data: JsonObject): ConfigService {
    return new ConfigService(new ConfigReader(data));
  }

  /**
   * Load and validate configuration
   */
  private loadConfig(): ManualRagConfig {
    const similarityThreshold = this.config.getOptionalNumber('manualRag.retrieval.similarityThreshold') ?? 0.6;
    if (similarityThreshold < 0 || similarityThreshold > 1) {
      throw new Error('manualRag.retrieval.similarityThreshold must be between 0 and 1');
    }

    const dedupThreshold = this.config.getOptionalNumber('manualRag.retrieval.dedupThreshold') ?? 0.9;
    if (dedupThreshold <= 0 || dedupThreshold > 1) {
      throw new Error('manualRag.retrieval.dedupThreshold must be in (0, 1]');
    }

    const temperature = this.config.getOptionalNumber('manualRag.generation.temperature') ?? 0.2;
    if (temperature < 0 || temperature > 1) {
      throw new Error('manualRag.generation.temperature must be between 0 and 1');
    }

    const chunkSize = this.config.getOptionalNumber('manualRag.ingestion.chunkSize') || 1000;
    const chunkOverlap = this.config.getOptionalNumber('manualRag.ingestion.chunkOverlap') ?? 200;
    if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new Error('manualRag.ingestion.chunkOverlap must be smaller than chunkSize');
    }

    const format = this.config.getOptionalString('manualRag.logging.format') || 'json';
    if (format !== 'json' && format !== 'simple') {
      throw new Error(`Unsupported log format: ${format}`);
    }

    return {
      generationModel: this.config.getOptionalString('manualRag.generationModel') || 'llama3.2',
      embeddingModel: this.config.getOptionalString('manualRag.embeddingModel') || 'all-minilm',
      ollamaBaseUrl: this.config.getOptionalString('manualRag.ollamaBaseUrl') || 'http://localhost:11434',
      generation: {
        maxTokens: this.config.getOptionalNumber('manualRag.generation.maxTokens') || 2048,
        temperature,
      },
      retrieval: {
        topK: this.config.getOptionalNumber('manualRag.retrieval.topK') || 3,
        similarityThreshold,
        includeImages: this.config.getOptionalBoolean('manualRag.retrieval.includeImages') ?? false,
        maxImages: this.config.getOptionalNumber('manualRag.retrieval.maxImages') ?? 3,
        dedupThreshold,
      },
      images: {
        tieBreak: this.loadTieBreak(),
        pageMatchBoost: this.config.getOptionalNumber('manualRag.images.pageMatchBoost') ?? 1,
      },
      timeouts: {
        embeddingMs: this.config.getOptionalNumber('manualRag.timeouts.embeddingMs') || 10000,
        generationMs: this.config.getOptionalNumber('manualRag.timeouts.generationMs') || 30000,
        imageSearchMs: this.config.getOptionalNumber('manualRag.timeouts.imageSearchMs') || 5000,
      },
      fallback: {
        maxLength: this.config.getOptionalNumber('manualRag.fallback.maxLength') || 4000,
      },
      ingestion: {
        chunkSize,
        chunkOverlap,
        batchSize: this.config.getOptionalNumber('manualRag.ingestion.batchSize') || 5,
        concurrency: this.config.getOptionalNumber('manualRag.ingestion.concurrency') || 2,
      },
      logging: {
        level: this.config.getOptionalString('manualRag.logging.level') || 'info',
        format,
      },
      keywords: this.loadKeywords(),
      store: this.loadStoreConfig(),
      cache: this.loadCacheConfig(),
    };
  }

  private loadTieBreak(): ImageTieBreak {
    const value = this.config.getOptionalString('manualRag.images.tieBreak') || 'complexity-asc';
    const tieBreak = TIE_BREAKS.find(candidate => candidate === value);
    if (!tieBreak) {
      throw new Error(`Unsupported image tie-break: ${value}`);
    }
    return tieBreak;
  }

  /**
   * Keyword tables come from a JSON file; inline lists under manualRag.safety
   * and manualRag.images replace the matching file entries
   */
  private loadKeywords(): KeywordTables {
    const tablesPath = this.config.getOptionalString('manualRag.keywordTablesPath');
    const tables = loadKeywordTables(tablesPath ?? DEFAULT_KEYWORD_TABLES_PATH);

    const high = this.readKeywords('manualRag.safety.highRiskKeywords');
    const medium = this.readKeywords('manualRag.safety.mediumRiskKeywords');
    const advanced = this.readKeywords('manualRag.images.complexityKeywords.advanced');
    const intermediate = this.readKeywords('manualRag.images.complexityKeywords.intermediate');

    const imageTypes = { ...tables.imageTypes };
    const typeKeywords = this.config.getOptionalConfig('manualRag.images.typeKeywords');
    for (const type of typeKeywords?.keys() ?? []) {
      if (!isImageType(type)) {
        throw new Error(`Unknown image type in manualRag.images.typeKeywords: ${type}`);
      }
      imageTypes[type] = this.readKeywords(`manualRag.images.typeKeywords.${type}`);
    }

    return {
      ...tables,
      safety: {
        high: high ?? tables.safety.high,
        medium: medium ?? tables.safety.medium,
      },
      imageTypes,
      complexity: {
        advanced: advanced ?? tables.complexity.advanced,
        intermediate: intermediate ?? tables.complexity.intermediate,
      },
    };
  }

  private readKeywords(key: string): string[] | undefined {
    return this.config.getOptionalStringArray(key)?.map(keyword => keyword.toLowerCase());
  }

  /**
   * Load chunk/image store configuration
   */
  private loadStoreConfig(): StoreConfig {
    const type = this.config.getOptionalString('manualRag.store.type');

    if (type === 'postgresql') {
      return {
        type: 'postgresql',
        postgresql: this.loadPostgresConfig(),
      };
    }

    // Default to in-memory store
    return {
      type: 'memory',
    };
  }

  /**
   * Load PostgreSQL configuration with validation
   */
  private loadPostgresConfig(): PostgresConfig {
    const host = this.config.getOptionalString('manualRag.store.postgresql.host') || 'localhost';
    const port = this.config.getOptionalNumber('manualRag.store.postgresql.port') || 5432;
    const database = this.config.getOptionalString('manualRag.store.postgresql.database') || 'manual_rag';
    const user = this.config.getOptionalString('manualRag.store.postgresql.user') || 'manual_rag';
    const password = this.config.getOptionalString('manualRag.store.postgresql.password') || '';
    const ssl = this.config.getOptionalBoolean('manualRag.store.postgresql.ssl') ?? false;
    const maxConnections = this.config.getOptionalNumber('manualRag.store.postgresql.maxConnections') || 10;
    const idleTimeoutMillis = this.config.getOptionalNumber('manualRag.store.postgresql.idleTimeoutMillis') || 30000;
    const connectionTimeoutMillis = this.config.getOptionalNumber('manualRag.store.postgresql.connectionTimeoutMillis') || 5000;

    if (!password) {
      throw new Error('PostgreSQL password is required when using the postgresql store');
    }
    if (port < 1 || port > 65535) {
      throw new Error('PostgreSQL port must be between 1 and 65535');
    }

    return {
      host,
      port,
      database,
      user,
      password,
      ssl,
      maxConnections,
      idleTimeoutMillis,
      connectionTimeoutMillis,
    };
  }

  private loadCacheConfig(): CacheConfig {
    const type = this.config.getOptionalString('manualRag.cache.type') || 'memory';
    if (type !== 'none' && type !== 'memory' && type !== 'redis') {
      throw new Error(`Unsupported cache type: ${type}`);
    }

    const redisUrl = this.config.getOptionalString('manualRag.cache.redisUrl');
    if (type === 'redis' && !redisUrl) {
      throw new Error('manualRag.cache.redisUrl is required when using the redis cache');
    }

    return {
      type,
      ttlSeconds: this.config.getOptionalNumber('manualRag.cache.ttlSeconds') || 86400,
      maxEntries: this.config.getOptionalNumber('manualRag.cache.maxEntries') || 1000,
      redisUrl,
    };
  }

  getConfig(): ManualRagConfig {
    return this.cachedConfig;
  }

  /**
   * Get PostgreSQL configuration
   * Throws error if not configured
   */
  getPostgresConfig(): PostgresConfig {
    if (this.cachedConfig.store.type !== 'postgresql' || !this.cachedConfig.store.postgresql) {
      throw new Error('PostgreSQL store is not configured');
    }
    return this.cachedConfig.store.postgresql;
  }
}
