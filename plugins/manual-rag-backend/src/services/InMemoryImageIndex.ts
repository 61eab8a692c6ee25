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
 * In-memory image index implementation
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { v4 as uuidv4 } from 'uuid';
import { IImageIndex, ImageSearchOptions } from '../interfaces';
import { ComplexityLevel, ImageIndexStats, ImageInput, ImageRecord, RankedImage } from '../models';
import { InvalidParametersError } from '../errors';
import { ImageClassifier } from './ImageClassifier';
import { ImageRanker } from './ImageRanker';

/**
 * Check an image ingestion request and derive missing classification
 */
export function buildImageRecord(input: ImageInput, classifier: ImageClassifier): ImageRecord {
  if (!input.source || input.source.trim().length === 0) {
    throw new InvalidParametersError('Image source is required');
  }
  if (!Number.isInteger(input.pageNumber) || input.pageNumber < 1) {
    throw new InvalidParametersError(`Invalid page number: ${input.pageNumber}`);
  }
  if (!input.storageReference) {
    throw new InvalidParametersError('Image storage reference is required');
  }

  const ocrText = input.ocrText ?? '';
  const description = input.description ?? '';

  return {
    id: uuidv4(),
    source: input.source,
    pageNumber: input.pageNumber,
    imageType: input.imageType ?? classifier.classifyType(description, ocrText),
    complexityLevel: input.complexityLevel ?? classifier.assessComplexity(description, ocrText),
    ocrText,
    description: input.description,
    storageReference: input.storageReference,
    createdAt: new Date(),
  };
}

/**
 * Summarize a set of image records by type and complexity
 */
export function summarizeImages(images: ImageRecord[]): ImageIndexStats {
  const byType: ImageIndexStats['byType'] = {};
  const byComplexity: Record<ComplexityLevel, number> = { 1: 0, 2: 0, 3: 0 };

  for (const image of images) {
    byType[image.imageType] = (byType[image.imageType] ?? 0) + 1;
    byComplexity[image.complexityLevel] += 1;
  }

  return { totalImages: images.length, byType, byComplexity };
}

export class InMemoryImageIndex implements IImageIndex {
  // Map iteration follows insertion order, which ranking relies on for ties
  private readonly images: Map<string, ImageRecord> = new Map();

  constructor(
    private readonly logger: Logger,
    private readonly classifier: ImageClassifier,
    private readonly ranker: ImageRanker
  ) {}

  async ingestImage(input: ImageInput): Promise<string> {
    const record = buildImageRecord(input, this.classifier);
    this.images.set(record.id, record);
    this.logger.debug(
      `Indexed image ${record.id} (${record.imageType}) for ${record.source} page ${record.pageNumber}`
    );
    return record.id;
  }

  async search(queryText: string, options: ImageSearchOptions): Promise<RankedImage[]> {
    const results = this.ranker.rank(
      Array.from(this.images.values()),
      queryText,
      options.maxImages,
      options.correlatedPages
    );
    this.logger.debug(`Image search matched ${results.length} images`);
    return results;
  }

  async listByPage(source: string, pageNumber: number): Promise<ImageRecord[]> {
    return Array.from(this.images.values()).filter(
      image => image.source === source && image.pageNumber === pageNumber
    );
  }

  async getStats(): Promise<ImageIndexStats> {
    return summarizeImages(Array.from(this.images.values()));
  }
}
