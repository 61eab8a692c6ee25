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
 * Model provider implementation for Ollama integration
 * Handles all interactions with the Ollama API
 * 
 * @packageDocumentation
 */

import fetch from 'node-fetch';
import type { Logger } from 'winston';
import { IEmbeddingProvider, IGenerativeModel, ServiceDependencies } from '../interfaces';
import { GenerationConfig, OllamaEmbedResponse, OllamaGenerateResponse } from '../models';
import { EmbeddingUnavailableError, GenerationUnavailableError } from '../errors';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isEmbedResponse(value: unknown): value is OllamaEmbedResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'embeddings' in value &&
    Array.isArray(value.embeddings) &&
    value.embeddings.every(
      (vector: unknown) => Array.isArray(vector) && vector.every(item => typeof item === 'number')
    )
  );
}

function isGenerateResponse(value: unknown): value is OllamaGenerateResponse {
  return typeof value === 'object' && value !== null && 'response' in value && typeof value.response === 'string';
}

/**
 * Embedding and generation through a local Ollama server
 * Follows Single Responsibility and Dependency Inversion principles
 */
export class OllamaModelService implements IEmbeddingProvider, IGenerativeModel {
  private readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly embeddingModel: string;
  readonly modelName: string;

  constructor(dependencies: ServiceDependencies) {
    const config = dependencies.config.getConfig();
    this.logger = dependencies.logger;
    this.baseUrl = config.ollamaBaseUrl.replace(/\/+$/, '');
    this.embeddingModel = config.embeddingModel;
    this.modelName = config.generationModel;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embedBatch([text], signal);
    if (!vector) {
      throw new EmbeddingUnavailableError('Ollama returned no embedding');
    }
    return vector;
  }

  /**
   * Generate embeddings using Ollama
   */
  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    this.logger.debug(`Generating embeddings for ${texts.length} inputs with model: ${this.embeddingModel}`);

    try {
      const response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.embeddingModel,
          input: texts,
        }),
        signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Ollama API error (${response.status}): ${errorText}`);
      }

      const json: unknown = await response.json();

      if (!isEmbedResponse(json) || json.embeddings.length !== texts.length) {
        throw new Error('Invalid embeddings response format from Ollama');
      }

      return json.embeddings;
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      this.logger.error(`Failed to generate embeddings: ${error}`);
      throw new EmbeddingUnavailableError(`Embedding generation failed: ${describeError(error)}`, error);
    }
  }

  /**
   * Generate a grounded completion using Ollama
   */
  async generate(prompt: string, config: GenerationConfig, signal?: AbortSignal): Promise<string> {
    this.logger.info(`Generating completion with model: ${this.modelName}`);

    try {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.modelName,
          prompt,
          stream: false,
          options: {
            num_predict: config.maxTokens,
            temperature: config.temperature,
          },
        }),
        signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Ollama API error (${response.status}): ${errorText}`);
      }

      const json: unknown = await response.json();

      if (!isGenerateResponse(json) || json.response.trim().length === 0) {
        throw new Error('Invalid response format from Ollama');
      }

      return json.response;
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      this.logger.error(`Failed to generate completion: ${error}`);
      throw new GenerationUnavailableError(`Completion failed: ${describeError(error)}`, error);
    }
  }

  /**
   * Health check for Ollama service
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch (error) {
      this.logger.error(`Ollama health check failed: ${error}`);
      return false;
    }
  }
}
