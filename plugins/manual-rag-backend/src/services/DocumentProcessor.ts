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
 * Document processor for chunking page text
 * Handles document preparation for embedding
 * 
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IConfigService } from '../interfaces';

/**
 * Splits page text into overlapping character windows
 * Follows Single Responsibility Principle
 */
export class DocumentProcessor {
  private readonly logger: Logger;
  private readonly configService: IConfigService;

  constructor(logger: Logger, configService: IConfigService) {
    this.logger = logger;
    this.configService = configService;
  }

  /**
   * Chunk page text into windows of `chunkSize` characters that overlap by
   * `chunkOverlap`. A window is cut after its last period when that still
   * moves the next window forward.
   */
  chunkText(content: string): string[] {
    const { chunkSize, chunkOverlap } = this.configService.getConfig().ingestion;
    const text = this.normalizeText(content);

    if (text.length === 0) {
      return [];
    }

    const chunks: string[] = [];
    let start = 0;

    while (start < text.length) {
      let end = Math.min(start + chunkSize, text.length);
      let chunk = text.slice(start, end);

      if (end < text.length) {
        const lastPeriod = chunk.lastIndexOf('.');
        if (lastPeriod + 1 > chunkOverlap) {
          chunk = chunk.slice(0, lastPeriod + 1);
          end = start + lastPeriod + 1;
        }
      }

      const trimmed = chunk.trim();
      if (trimmed.length > 0) {
        chunks.push(trimmed);
      }

      if (end >= text.length) {
        break;
      }
      start = end - chunkOverlap;
    }

    this.logger.debug(`Created ${chunks.length} chunks from ${text.length} characters`);
    return chunks;
  }

  /**
   * Collapse whitespace runs; page text is otherwise kept verbatim
   */
  normalizeText(content: string): string {
    return content.replace(/\s+/g, ' ').trim();
  }
}
