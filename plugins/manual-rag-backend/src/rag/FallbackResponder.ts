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
 * Template answers used whenever generation is unavailable
 *
 * @packageDocumentation
 */

import { ScoredChunk } from '../models';
import { truncateAtBoundary } from '../utils/text';

export const NO_RELEVANT_INFORMATION_MESSAGE =
  'No relevant information found in the indexed manuals for this question. Try rephrasing it or naming the component or procedure.';

export const FALLBACK_DELIMITER = '\n\n---\n\n';

/**
 * Deterministic composer: every ranked chunk verbatim under a numbered source label
 */
export class FallbackResponder {
  constructor(private readonly maxLength: number) {}

  compose(rankedChunks: ScoredChunk[]): string {
    if (rankedChunks.length === 0) {
      return NO_RELEVANT_INFORMATION_MESSAGE;
    }

    const sections = rankedChunks.map(
      ({ chunk }, index) => `Source ${index + 1}: ${chunk.source} (Page ${chunk.pageNumber})\n${chunk.content.trim()}`
    );

    return truncateAtBoundary(sections.join(FALLBACK_DELIMITER), this.maxLength);
  }
}
