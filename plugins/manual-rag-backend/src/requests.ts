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
 * Request body parsing for the HTTP API
 *
 * @packageDocumentation
 */

import { AnswerOptions, ImageInput, ImageType, isImageType, isSkillLevel, SKILL_LEVELS, SkillLevel, toLevel } from './models';
import { InvalidParametersError } from './errors';
import { EmbedPendingOptions } from './services/IngestionService';

type Body = Record<string, unknown>;

function asBody(value: unknown): Body {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new InvalidParametersError('Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(value));
}

function requiredString(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidParametersError(`${field} is required`);
  }
  return value;
}

function optionalString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new InvalidParametersError(`${field} must be a string`);
  }
  return value;
}

function optionalNumber(body: Body, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidParametersError(`${field} must be a number`);
  }
  return value;
}

function optionalBoolean(body: Body, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new InvalidParametersError(`${field} must be a boolean`);
  }
  return value;
}

function requiredNumber(body: Body, field: string): number {
  const value = optionalNumber(body, field);
  if (value === undefined) {
    throw new InvalidParametersError(`${field} is required`);
  }
  return value;
}

function stringArray(body: Body, field: string): string[] {
  const value = body[field];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidParametersError(`${field} must be an array of strings`);
  }
  return value;
}

function optionalSkillLevel(body: Body): SkillLevel | undefined {
  const value = optionalString(body, 'skillLevel');
  if (value === undefined) {
    return undefined;
  }
  if (!isSkillLevel(value)) {
    throw new InvalidParametersError(`skillLevel must be one of ${SKILL_LEVELS.join(', ')}`);
  }
  return value;
}

export function parseAnswerOptions(value: unknown): AnswerOptions {
  const body = asBody(value);
  return {
    topK: optionalNumber(body, 'topK'),
    similarityThreshold: optionalNumber(body, 'similarityThreshold'),
    includeImages: optionalBoolean(body, 'includeImages'),
    maxImages: optionalNumber(body, 'maxImages'),
    skillLevel: optionalSkillLevel(body),
  };
}

export function parseQueryRequest(value: unknown): { query: string; options: AnswerOptions } {
  return { query: requiredString(asBody(value), 'query'), options: parseAnswerOptions(value) };
}

export function parseBatchQueryRequest(value: unknown): { queries: string[]; options: AnswerOptions } {
  return { queries: stringArray(asBody(value), 'queries'), options: parseAnswerOptions(value) };
}

export function parseChunkRequest(value: unknown): { content: string; source: string; pageNumber: number } {
  const body = asBody(value);
  return {
    content: requiredString(body, 'content'),
    source: requiredString(body, 'source'),
    pageNumber: requiredNumber(body, 'pageNumber'),
  };
}

export function parseDocumentRequest(value: unknown): { source: string; pages: string[] } {
  const body = asBody(value);
  return { source: requiredString(body, 'source'), pages: stringArray(body, 'pages') };
}

export function parseEmbeddingRequest(value: unknown): { chunkId: string; vector: number[] } {
  const body = asBody(value);
  const vector = body.vector;
  if (!Array.isArray(vector) || !vector.every((item): item is number => typeof item === 'number')) {
    throw new InvalidParametersError('vector must be an array of numbers');
  }
  return { chunkId: requiredString(body, 'chunkId'), vector };
}

export function parseImageRequest(value: unknown): ImageInput {
  const body = asBody(value);

  let imageType: ImageType | undefined;
  if (body.imageType !== undefined) {
    if (!isImageType(body.imageType)) {
      throw new InvalidParametersError(`imageType is not a known image type: ${String(body.imageType)}`);
    }
    imageType = body.imageType;
  }

  const complexityLevel = body.complexityLevel === undefined ? undefined : toLevel(body.complexityLevel);
  if (complexityLevel === null) {
    throw new InvalidParametersError('complexityLevel must be 1, 2 or 3');
  }

  return {
    source: requiredString(body, 'source'),
    pageNumber: requiredNumber(body, 'pageNumber'),
    storageReference: requiredString(body, 'storageReference'),
    ocrText: optionalString(body, 'ocrText'),
    description: optionalString(body, 'description'),
    imageType,
    complexityLevel,
  };
}

export function parseEmbedPendingRequest(value: unknown): Omit<EmbedPendingOptions, 'signal'> {
  const body = value === undefined ? {} : asBody(value);
  return {
    batchSize: optionalNumber(body, 'batchSize'),
    concurrency: optionalNumber(body, 'concurrency'),
    maxBatches: optionalNumber(body, 'maxBatches'),
  };
}
