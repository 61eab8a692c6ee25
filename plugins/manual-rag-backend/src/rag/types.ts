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
 * Retrieval pipeline contracts
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  IConfigService,
  IEmbeddingProvider,
  IGenerativeModel,
  IImageIndex,
} from '../interfaces';
import { AnswerContext, QueryResult, RetrievalParams, StructuredResponse } from '../models';
import type { ImageRanker } from '../services/ImageRanker';
import type { IntentDetector } from '../services/IntentDetector';
import type { SafetyClassifier } from '../services/SafetyClassifier';
import type { SimilaritySearchEngine } from '../services/SimilaritySearchEngine';

/**
 * Turns a question into ranked text chunks and images
 */
export interface IRetrievalOrchestrator {
  retrieve(queryText: string, params: RetrievalParams, signal?: AbortSignal): Promise<QueryResult>;
}

/**
 * Turns a retrieval result into the final structured response
 */
export interface IResponseConsolidator {
  consolidate(result: QueryResult, context: AnswerContext, signal?: AbortSignal): Promise<StructuredResponse>;
}

export interface RetrievalDependencies {
  logger: Logger;
  config: IConfigService;
  embeddingProvider: IEmbeddingProvider;
  searchEngine: SimilaritySearchEngine;
  imageIndex: IImageIndex;
  imageRanker: ImageRanker;
}

export interface ConsolidationDependencies {
  logger: Logger;
  config: IConfigService;
  safetyClassifier: SafetyClassifier;
  intentDetector: IntentDetector;
  generativeModel?: IGenerativeModel;
}
