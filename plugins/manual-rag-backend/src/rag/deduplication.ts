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
 * Near-duplicate removal over ranked chunks
 *
 * @packageDocumentation
 */

import { ScoredChunk } from '../models';
import { tokenize, tokenOverlap } from '../utils/text';

/**
 * Drop every chunk whose token overlap with an already kept, higher-ranked
 * chunk reaches `threshold`. Input must be in rank order; output keeps it.
 * Applying it to its own output changes nothing.
 */
export function deduplicateChunks(ranked: ScoredChunk[], threshold: number): ScoredChunk[] {
  const kept: Array<{ entry: ScoredChunk; tokens: Set<string> }> = [];

  for (const entry of ranked) {
    const tokens = new Set(tokenize(entry.chunk.content));
    const duplicate = kept.some(existing => tokenOverlap(existing.tokens, tokens) >= threshold);
    if (!duplicate) {
      kept.push({ entry, tokens });
    }
  }

  return kept.map(({ entry }) => entry);
}
