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
 * Keyword-based safety classification
 *
 * @packageDocumentation
 */

import { ISafetyClassifier } from '../interfaces';
import { Chunk, KeywordTables, SafetyLevel } from '../models';
import { splitSentences } from '../utils/text';

export const HIGH_RISK_BANNER = '🚨 SAFETY WARNING (HIGH RISK): This information involves a risk of serious injury or death.';
export const MEDIUM_RISK_BANNER = '⚠️ SAFETY NOTICE (MEDIUM RISK): Proceed with caution and follow all safety instructions.';

/**
 * Highest of the given safety levels, 1 when none are given
 */
export function maxSafetyLevel(...levels: SafetyLevel[]): SafetyLevel {
  return levels.reduce<SafetyLevel>((highest, level) => (level > highest ? level : highest), 1);
}

/**
 * Stateless classifier over a swappable keyword table.
 * High-risk keywords win over medium-risk ones; matching is case-insensitive.
 */
export class SafetyClassifier implements ISafetyClassifier {
  private readonly highRisk: string[];
  private readonly mediumRisk: string[];

  constructor(tables: KeywordTables['safety']) {
    this.highRisk = tables.high.map(keyword => keyword.toLowerCase());
    this.mediumRisk = tables.medium.map(keyword => keyword.toLowerCase());
  }

  classify(text: string): SafetyLevel {
    const lower = text.toLowerCase();

    if (this.highRisk.some(keyword => lower.includes(keyword))) {
      return 3;
    }
    if (this.mediumRisk.some(keyword => lower.includes(keyword))) {
      return 2;
    }
    return 1;
  }

  combine(...levels: SafetyLevel[]): SafetyLevel {
    return maxSafetyLevel(...levels);
  }

  bannerFor(level: SafetyLevel): string | null {
    switch (level) {
      case 3:
        return HIGH_RISK_BANNER;
      case 2:
        return MEDIUM_RISK_BANNER;
      default:
        return null;
    }
  }

  /**
   * Sentences of the given chunks that carry a safety keyword, in chunk order, without repeats
   */
  extractSafetySentences(chunks: Chunk[], limit: number): string[] {
    const keywords = [...this.highRisk, ...this.mediumRisk];
    const seen = new Set<string>();
    const sentences: string[] = [];

    for (const chunk of chunks) {
      for (const sentence of splitSentences(chunk.content)) {
        const lower = sentence.toLowerCase();
        if (!keywords.some(keyword => lower.includes(keyword)) || seen.has(lower)) {
          continue;
        }
        seen.add(lower);
        sentences.push(sentence);
        if (sentences.length >= limit) {
          return sentences;
        }
      }
    }

    return sentences;
  }
}
