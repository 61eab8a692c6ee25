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
 * Image type and complexity classification from extracted text
 *
 * @packageDocumentation
 */

import { ComplexityLevel, IMAGE_TYPES, ImageType, KeywordTables } from '../models';

export class ImageClassifier {
  constructor(private readonly tables: Pick<KeywordTables, 'imageTypes' | 'complexity'>) {}

  /**
   * First image type (in declaration order) whose keywords appear in the description or OCR text
   */
  classifyType(description: string, ocrText: string = ''): ImageType {
    const lower = `${description} ${ocrText}`.toLowerCase();

    for (const type of IMAGE_TYPES) {
      const keywords = this.tables.imageTypes[type] ?? [];
      if (keywords.some(keyword => lower.includes(keyword))) {
        return type;
      }
    }

    return 'general';
  }

  assessComplexity(description: string, ocrText: string): ComplexityLevel {
    const content = `${description} ${ocrText}`.toLowerCase();

    const advanced = this.tables.complexity.advanced.filter(keyword => content.includes(keyword)).length;
    const intermediate = this.tables.complexity.intermediate.filter(keyword => content.includes(keyword)).length;

    if (advanced >= 2) {
      return 3;
    }
    if (intermediate >= 2 || advanced >= 1) {
      return 2;
    }
    return 1;
  }
}
