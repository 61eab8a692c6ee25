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
 * Domain models and data structures
 * 
 * @packageDocumentation
 */

/**
 * Discrete risk classification: 1 informational, 2 medium risk, 3 high risk
 */
export type SafetyLevel = 1 | 2 | 3;

/**
 * Technical complexity of an image: 1 user level, 2 mechanic level, 3 specialist level
 */
export type ComplexityLevel = 1 | 2 | 3;

export const IMAGE_TYPES = [
  'technical_diagram',
  'photograph',
  'table_chart',
  'safety_warning',
  'parts_diagram',
  'procedure_illustration',
  'general',
] as const;

export type ImageType = (typeof IMAGE_TYPES)[number];

/**
 * Reader expertise; shapes the instructions given to the generative model
 */
export const SKILL_LEVELS = ['beginner', 'intermediate', 'expert'] as const;

export type SkillLevel = (typeof SKILL_LEVELS)[number];

export const DEFAULT_SKILL_LEVEL: SkillLevel = 'intermediate';

/**
 * Detected question categories, in tie-break order. `general` means no pattern matched.
 */
export const QUERY_INTENTS = ['maintenance', 'troubleshooting', 'specifications', 'procedure', 'safety', 'general'] as const;

export type QueryIntent = (typeof QUERY_INTENTS)[number];

export interface IntentMatch {
  intent: QueryIntent;
  /** Share of the intent's pattern groups found in the query, in [0, 1] */
  confidence: number;
}

/**
 * A bounded span of source document text.
 * `embedding` is absent until the chunk has been processed.
 */
export interface Chunk {
  id: string;
  content: string;
  embedding?: number[];
  source: string;
  pageNumber: number;
  safetyLevel: SafetyLevel;
  createdAt: Date;
}

/**
 * A chunk paired with its cosine similarity to a query
 */
export interface ScoredChunk {
  chunk: Chunk;
  similarity: number;
}

/**
 * A unit of visual content extracted from a source document
 */
export interface ImageRecord {
  id: string;
  source: string;
  pageNumber: number;
  imageType: ImageType;
  complexityLevel: ComplexityLevel;
  ocrText: string;
  description?: string;
  storageReference: string;
  createdAt: Date;
}

/**
 * Input accepted by the image ingestion API.
 * Type and complexity are derived from the text when omitted.
 */
export interface ImageInput {
  source: string;
  pageNumber: number;
  storageReference: string;
  ocrText?: string;
  description?: string;
  imageType?: ImageType;
  complexityLevel?: ComplexityLevel;
}

/**
 * An image matched against a query
 */
export interface RankedImage {
  image: ImageRecord;
  relevance: number;
  matchedTerms: string[];
  pageCorrelated: boolean;
}

/**
 * A (source, page) pair used to correlate images with retrieved text
 */
export interface PageRef {
  source: string;
  pageNumber: number;
}

/**
 * Parameters of a single retrieval
 */
export interface RetrievalParams {
  topK: number;
  similarityThreshold: number;
  includeImages: boolean;
  maxImages: number;
}

/**
 * Per-request retrieval result. Never persisted.
 */
export interface QueryResult {
  queryText: string;
  chunks: ScoredChunk[];
  images: RankedImage[];
  /** Set when the image lookup failed; text results are still valid */
  imageError?: string;
  safetyLevel: SafetyLevel;
  /** No chunk cleared the similarity threshold */
  fallbackEligible: boolean;
  params: RetrievalParams;
}

/**
 * Source attribution entry of a response
 */
export interface SourceCitation {
  chunkId: string;
  source: string;
  page: number;
  similarity: number;
  safetyLevel: SafetyLevel;
}

/**
 * Image attached to a response
 */
export interface ImageSummary {
  id: string;
  source: string;
  page: number;
  imageType: ImageType;
  complexityLevel: ComplexityLevel;
  ocrExcerpt: string;
  description?: string;
  storageReference: string;
  relevance: number;
  pageCorrelated: boolean;
}

export const RESPONSE_SCHEMA_VERSION = 2;

/**
 * Final answer returned by the Query API.
 * The generative and fallback paths produce the same field set.
 */
export interface StructuredResponse {
  schemaVersion: typeof RESPONSE_SCHEMA_VERSION;
  query: string;
  answerText: string;
  /** Delimited citation block, kept apart from the answer prose */
  citations: string;
  sources: SourceCitation[];
  images: ImageSummary[];
  imagesOmitted: boolean;
  safetyLevel: SafetyLevel;
  fallbackUsed: boolean;
  fallbackReason: string | null;
  model: string | null;
  chunksFound: number;
  /** Mean similarity of the cited chunks; 0 without any */
  confidence: number;
  intent: QueryIntent;
  intentConfidence: number;
  skillLevel: SkillLevel;
  processingTimeMs: number;
}

/**
 * Options accepted by the Query API
 */
export interface AnswerOptions {
  topK?: number;
  similarityThreshold?: number;
  includeImages?: boolean;
  maxImages?: number;
  skillLevel?: SkillLevel;
}

/**
 * Per-request inputs of response consolidation
 */
export interface AnswerContext {
  /** Epoch milliseconds the request started at */
  startedAt: number;
  skillLevel: SkillLevel;
}

/**
 * Generation options understood by the generative model provider
 */
export interface GenerationConfig {
  maxTokens: number;
  temperature: number;
}

/**
 * Ollama embed API response structure
 */
export interface OllamaEmbedResponse {
  model: string;
  embeddings: number[][];
}

/**
 * Ollama generate API response structure
 */
export interface OllamaGenerateResponse {
  model: string;
  created_at: string;
  response: string;
  done: boolean;
}

/**
 * Chunk store statistics
 */
export interface ChunkStoreStats {
  totalChunks: number;
  embeddedChunks: number;
  coverage: number;
  sources: number;
}

/**
 * Image index statistics
 */
export interface ImageIndexStats {
  totalImages: number;
  byType: Partial<Record<ImageType, number>>;
  byComplexity: Record<ComplexityLevel, number>;
}

/**
 * PostgreSQL connection configuration
 */
export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Chunk/image store configuration
 */
export interface StoreConfig {
  type: 'memory' | 'postgresql';
  postgresql?: PostgresConfig;
}

/**
 * Response cache configuration
 */
export interface CacheConfig {
  type: 'none' | 'memory' | 'redis';
  ttlSeconds: number;
  maxEntries: number;
  redisUrl?: string;
}

export type ImageTieBreak = 'complexity-asc' | 'complexity-desc' | 'none';

/**
 * Keyword tables driving safety and image classification
 */
export interface KeywordTables {
  safety: {
    high: string[];
    medium: string[];
  };
  imageTypes: Partial<Record<ImageType, string[]>>;
  complexity: {
    advanced: string[];
    intermediate: string[];
  };
  stopWords: string[];
  /** Regular expression groups per intent; each group that matches scores one */
  intents: Partial<Record<QueryIntent, string[]>>;
}

/**
 * Configuration for the manual RAG backend
 */
export interface ManualRagConfig {
  generationModel: string;
  embeddingModel: string;
  ollamaBaseUrl: string;
  generation: GenerationConfig;
  retrieval: RetrievalParams & {
    dedupThreshold: number;
  };
  images: {
    tieBreak: ImageTieBreak;
    pageMatchBoost: number;
  };
  timeouts: {
    embeddingMs: number;
    generationMs: number;
    imageSearchMs: number;
  };
  fallback: {
    maxLength: number;
  };
  ingestion: {
    chunkSize: number;
    chunkOverlap: number;
    batchSize: number;
    concurrency: number;
  };
  logging: {
    level: string;
    format: 'json' | 'simple';
  };
  keywords: KeywordTables;
  store: StoreConfig;
  cache: CacheConfig;
}

/**
 * Narrow a number read from storage or a request to a 1..3 level
 */
export function toLevel(value: unknown): SafetyLevel | null {
  return value === 1 || value === 2 || value === 3 ? value : null;
}

export function isImageType(value: unknown): value is ImageType {
  return IMAGE_TYPES.some(type => type === value);
}

export function isSkillLevel(value: unknown): value is SkillLevel {
  return SKILL_LEVELS.some(level => level === value);
}

export function isQueryIntent(value: unknown): value is QueryIntent {
  return QUERY_INTENTS.some(intent => intent === value);
}
