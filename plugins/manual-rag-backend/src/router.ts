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
 * Express router for the manual RAG backend
 * Exposes the Query and Ingestion APIs over HTTP
 *
 * @packageDocumentation
 */

import express, { Request, Response, Router } from 'express';
import type { Logger } from 'winston';
import {
  ConfigService,
  IngestionService,
  OllamaModelService,
  QueryService,
  StoreFactory,
} from './services';
import type { ManualRagStores } from './services/StoreFactory';
import { ErrorCode, getErrorMessage, isRagError, isRetryable } from './errors';
import {
  parseBatchQueryRequest,
  parseChunkRequest,
  parseDocumentRequest,
  parseEmbeddingRequest,
  parseEmbedPendingRequest,
  parseImageRequest,
  parseQueryRequest,
} from './requests';

/**
 * Anything that can report whether its backend is reachable
 */
export interface HealthCheckable {
  healthCheck(): Promise<boolean>;
}

/**
 * Services behind the router
 */
export interface ManualRagServices {
  queryService: QueryService;
  ingestionService: IngestionService;
  modelService: HealthCheckable;
  stores: ManualRagStores;
}

export interface RouterOptions {
  logger: Logger;
  services: ManualRagServices;
}

/**
 * Wire every service from configuration
 * Follows Dependency Injection pattern
 */
export async function buildServices(configService: ConfigService, logger: Logger): Promise<ManualRagServices> {
  const modelService = new OllamaModelService({ logger, config: configService });
  const stores = await StoreFactory.create(configService, logger);

  const queryService = new QueryService({
    logger,
    config: configService,
    embeddingProvider: modelService,
    generativeModel: modelService,
    chunkStore: stores.chunkStore,
    imageIndex: stores.imageIndex,
    responseCache: stores.responseCache,
  });

  const ingestionService = new IngestionService({
    logger,
    config: configService,
    embeddingProvider: modelService,
    chunkStore: stores.chunkStore,
    imageIndex: stores.imageIndex,
  });

  return { queryService, ingestionService, modelService, stores };
}

/**
 * HTTP status of a pipeline error
 */
export function statusFor(error: unknown): number {
  if (!isRagError(error)) {
    return 500;
  }

  switch (error.code) {
    case ErrorCode.INVALID_PARAMETERS:
      return 400;
    case ErrorCode.EMBEDDING_UNAVAILABLE:
    case ErrorCode.STORE_UNAVAILABLE:
      return 503;
    case ErrorCode.TIMEOUT:
      return 504;
    case ErrorCode.GENERATION_UNAVAILABLE:
    case ErrorCode.IMAGE_INDEX_ERROR:
      return 502;
    default:
      return 500;
  }
}

/**
 * Abort signal that fires when the client goes away before the response is sent
 */
function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort(new Error('Client closed the request'));
    }
  });
  return controller.signal;
}

/**
 * Create and configure the manual RAG router
 */
export function createManualRagRouter(options: RouterOptions): Router {
  const router = Router();
  router.use(express.json({ limit: '5mb' }));

  const { logger, services } = options;
  const { queryService, ingestionService } = services;

  const fail = (res: Response, action: string, error: unknown) => {
    const status = statusFor(error);
    if (status >= 500) {
      logger.error(`Failed to ${action}: ${error}`);
    } else {
      logger.warn(`Rejected request to ${action}: ${getErrorMessage(error)}`);
    }
    res.status(status).json({
      error: isRagError(error) ? error.code : 'INTERNAL_ERROR',
      message: getErrorMessage(error),
      retryable: isRetryable(error),
    });
  };

  /**
   * POST /query
   * Answer a question from the indexed manuals
   */
  router.post('/query', async (req: Request, res: Response) => {
    try {
      const { query, options: answerOptions } = parseQueryRequest(req.body);
      logger.info(`Processing question: "${query.substring(0, 50)}..."`);

      res.json(await queryService.answer(query, answerOptions, requestSignal(res)));
    } catch (error) {
      fail(res, 'answer question', error);
    }
  });

  /**
   * POST /query/batch
   * Answer up to ten questions
   */
  router.post('/query/batch', async (req: Request, res: Response) => {
    try {
      const { queries, options: answerOptions } = parseBatchQueryRequest(req.body);
      const results = await queryService.answerBatch(queries, answerOptions, requestSignal(res));

      res.json({
        results,
        successful: results.filter(entry => entry.success).length,
        failed: results.filter(entry => !entry.success).length,
      });
    } catch (error) {
      fail(res, 'answer batch', error);
    }
  });

  /**
   * GET /stats
   * Chunk coverage, image counts and cache size
   */
  router.get('/stats', async (_req: Request, res: Response) => {
    try {
      res.json(await queryService.getStats());
    } catch (error) {
      fail(res, 'read stats', error);
    }
  });

  /**
   * GET /health
   * Health check endpoint
   */
  router.get('/health', async (_req: Request, res: Response) => {
    try {
      const [modelHealthy, storeHealthy] = await Promise.all([
        services.modelService.healthCheck(),
        services.stores.healthCheck(),
      ]);

      if (!storeHealthy) {
        res.status(503).json({ status: 'unhealthy', model: modelHealthy, store: false });
        return;
      }

      const stats = await queryService.getStats();
      res.json({
        status: modelHealthy ? 'healthy' : 'degraded',
        model: modelHealthy,
        store: true,
        chunks: stats.chunks.totalChunks,
        embeddedChunks: stats.chunks.embeddedChunks,
        images: stats.images.totalImages,
      });
    } catch (error) {
      logger.error(`Health check failed: ${error}`);
      res.status(503).json({
        status: 'unhealthy',
        error: getErrorMessage(error),
      });
    }
  });

  /**
   * POST /ingest/chunks
   * Store one chunk; repeating the call is harmless
   */
  router.post('/ingest/chunks', async (req: Request, res: Response) => {
    try {
      const { content, source, pageNumber } = parseChunkRequest(req.body);
      const chunkId = await ingestionService.ingestChunk(content, source, pageNumber);
      res.status(201).json({ chunkId });
    } catch (error) {
      fail(res, 'ingest chunk', error);
    }
  });

  /**
   * POST /ingest/documents
   * Chunk and store the page texts of one document
   */
  router.post('/ingest/documents', async (req: Request, res: Response) => {
    try {
      const { source, pages } = parseDocumentRequest(req.body);
      res.status(201).json(await ingestionService.ingestDocument(source, pages));
    } catch (error) {
      fail(res, 'ingest document', error);
    }
  });

  /**
   * POST /ingest/embeddings
   * Attach a precomputed embedding to a chunk
   */
  router.post('/ingest/embeddings', async (req: Request, res: Response) => {
    try {
      const { chunkId, vector } = parseEmbeddingRequest(req.body);
      await ingestionService.attachEmbedding(chunkId, vector);
      res.status(204).end();
    } catch (error) {
      fail(res, 'attach embedding', error);
    }
  });

  /**
   * POST /ingest/images
   * Index one image by its extracted text
   */
  router.post('/ingest/images', async (req: Request, res: Response) => {
    try {
      const imageId = await ingestionService.ingestImage(parseImageRequest(req.body));
      res.status(201).json({ imageId });
    } catch (error) {
      fail(res, 'ingest image', error);
    }
  });

  /**
   * POST /ingest/embed-pending
   * Embed every chunk that has no embedding yet
   */
  router.post('/ingest/embed-pending', async (req: Request, res: Response) => {
    try {
      const embedOptions = parseEmbedPendingRequest(req.body);
      res.json(await ingestionService.embedPending({ ...embedOptions, signal: requestSignal(res) }));
    } catch (error) {
      fail(res, 'embed pending chunks', error);
    }
  });

  return router;
}
